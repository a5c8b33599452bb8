/**
 * @module cycles/comm-cycles
 * @description Transmission cycles: one chunk per pass for each chunked stream.
 */

import type { TransmissionSession } from "../primitives/transmission-session.js";
import {
  expectRegistered,
  type ICycleManager,
} from "../interfaces/cycle-manager.js";
import type { ITransportLink } from "../interfaces/transport.js";
import type { CycleId } from "../types/branded.js";
import { CYCLE_OK } from "../types/cycle.js";

interface TransmissionContext {
  readonly session: TransmissionSession;
  readonly link: ITransportLink;
}

/**
 * Registers `DataTransmission:<stream>`. It fires while the session has a
 * transfer in flight and the link is ready, sending one frame per pass.
 * An aborted step is not a cycle failure: the session already released
 * its buffer and reported the abort.
 */
export function registerDataTransmission(
  manager: ICycleManager,
  session: TransmissionSession,
  link: ITransportLink
): CycleId {
  return expectRegistered(
    manager.register<TransmissionContext>({
      name: `DataTransmission:${session.stream.toLowerCase()}`,
      mode: "CONDITION",
      priority: "HIGH",
      condition: (context) => context.session.isActive() && context.link.isReady(),
      execute: ({ context }) => {
        context.session.step();
        return CYCLE_OK;
      },
      context: { session, link },
    })
  );
}
