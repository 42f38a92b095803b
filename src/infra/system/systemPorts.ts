import type { ClockPort } from "../../core/ports/outboundPorts";

/**
 * Adapts wall-clock access so staleness checks remain deterministic in tests.
 */
export class SystemClock implements ClockPort {
  now(): Date {
    return new Date();
  }
}
