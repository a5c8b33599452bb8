/**
 * @module backends
 * @description In-process implementations of the driver boundaries.
 */

export { QueueProducer, ProducerError } from "./memory-producer.js";
