import { randomUUID } from "node:crypto";
import type { ClockPort, IdGeneratorPort } from "../../core/ports/outboundPorts";

/**
 * Wall-clock access behind a port so run windows stay deterministic in tests.
 */
export class SystemClock implements ClockPort {
  now(): Date {
    return new Date();
  }
}

export class UuidIdGenerator implements IdGeneratorPort {
  next(): string {
    return randomUUID();
  }
}
