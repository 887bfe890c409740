import { randomUUID } from "node:crypto";
import type { IdGeneratorPort } from "../../core/ports/outboundPorts";

/**
 * Short hex ids used as per-request log correlation keys.
 */
export class ShortHexIdGenerator implements IdGeneratorPort {
  constructor(private readonly length = 8) {}

  next(): string {
    return randomUUID().replace(/-/g, "").slice(0, this.length);
  }
}
