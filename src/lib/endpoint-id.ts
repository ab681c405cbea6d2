/**
 * Endpoint Identity
 *
 * Immutable (host, orchestrator, workload, endpoint) value.
 */

import { endpointKey, statusEndpointKey } from "./keys.js";
import { sharedInterner, type Interner } from "./intern.js";

export type EndpointIdFields = {
  host: string;
  orchestrator: string;
  workload: string;
  endpoint: string;
};

/**
 * 32-bit string hash (31-multiplier polynomial over UTF-16 code units)
 */
export function hashString(value: string): number {
  let hash = 0;
  for (let i = 0; i < value.length; i++) {
    hash = (Math.imul(hash, 31) + value.charCodeAt(i)) | 0;
  }
  return hash;
}

export class EndpointId implements EndpointIdFields {
  readonly host: string;
  readonly orchestrator: string;
  readonly workload: string;
  readonly endpoint: string;

  constructor(
    host: string,
    orchestrator: string,
    workload: string,
    endpoint: string,
    interner: Interner = sharedInterner
  ) {
    this.host = interner.intern(host);
    this.orchestrator = interner.intern(orchestrator);
    this.workload = interner.intern(workload);
    this.endpoint = interner.intern(endpoint);
    Object.freeze(this);
  }

  static from(fields: EndpointIdFields, interner?: Interner): EndpointId {
    return new EndpointId(
      fields.host,
      fields.orchestrator,
      fields.workload,
      fields.endpoint,
      interner
    );
  }

  /**
   * Key of this endpoint's status entry
   */
  pathForStatus(): string {
    return statusEndpointKey(this.host, this.orchestrator, this.workload, this.endpoint);
  }

  /**
   * Key of this endpoint's live configuration
   */
  path(): string {
    return endpointKey(this.host, this.orchestrator, this.workload, this.endpoint);
  }

  equals(other: unknown): boolean {
    if (other === this) return true;
    if (!(other instanceof EndpointId)) return false;
    return (
      other.endpoint === this.endpoint &&
      other.workload === this.workload &&
      other.host === this.host &&
      other.orchestrator === this.orchestrator
    );
  }

  /**
   * Hashes endpoint and workload only; host and orchestrator are excluded.
   */
  hashCode(): number {
    return (hashString(this.endpoint) + hashString(this.workload)) | 0;
  }

  toString(): string {
    return `EndpointId<${this.endpoint}>`;
  }

  toDebugString(): string {
    const parts = [this.host, this.orchestrator, this.workload, this.endpoint];
    return `EndpointId(${parts.map((p) => JSON.stringify(p)).join(",")})`;
  }

  toJSON(): EndpointIdFields {
    return {
      host: this.host,
      orchestrator: this.orchestrator,
      workload: this.workload,
      endpoint: this.endpoint,
    };
  }
}
