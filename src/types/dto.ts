/**
 * Data Transfer Objects (DTOs)
 *
 * JSON shapes returned by the inspection API.
 */

import type { EndpointIdFields } from "../lib/endpoint-id.js";
import type { KeyMatch } from "../lib/matchers.js";
import type { EndpointStatus } from "../lib/paths.js";

export type EndpointIdDTO = EndpointIdFields;

export type EndpointMatchDTO = {
  kind: "endpoint" | "endpoint-status";
  endpointId: EndpointIdDTO;
  key: string; // live configuration key
  statusKey: string;
};

export type KeyMatchDTO =
  | Exclude<KeyMatch, { kind: "endpoint" | "endpoint-status" }>
  | EndpointMatchDTO;

export type DecodeResponse = {
  key: string;
  match: KeyMatchDTO | null; // null: not a key of this schema, ignore it
};

export type EndpointKeysDTO = {
  endpointId: EndpointIdDTO;
  key: string;
  statusKey: string;
};

export type ProfileKeysDTO = {
  profileId: string;
  key: string;
  rulesKey: string;
  tagsKey: string;
};

export type HostKeysDTO = {
  hostname: string;
  dir: string;
  configDir: string;
  hostIpKey: string;
  statusDir: string;
  statusKey: string;
  lastStatusKey: string;
};

export type EndpointStatusDTO = {
  endpointId: EndpointIdDTO;
  statusKey: string;
  status: EndpointStatus;
};

export type HealthDTO = {
  ok: boolean;
  ready: boolean;
  services: {
    kv: boolean;
  };
  details: Record<string, unknown>;
  timestamp: string;
};
