/**
 * Normalization Helpers
 *
 * Convert codec values to the compact DTOs the API returns.
 */

import type { EndpointId } from "./endpoint-id.js";
import type { KeyMatch } from "./matchers.js";
import {
  hostConfigDir,
  hostDir,
  hostIpKey,
  lastStatusKey,
  profileKey,
  profileRulesKey,
  profileTagsKey,
  statusDir,
  statusKey,
} from "./keys.js";
import type {
  EndpointKeysDTO,
  HostKeysDTO,
  KeyMatchDTO,
  ProfileKeysDTO,
} from "../types/dto.js";

export function toEndpointKeysDTO(id: EndpointId): EndpointKeysDTO {
  return {
    endpointId: id.toJSON(),
    key: id.path(),
    statusKey: id.pathForStatus(),
  };
}

/**
 * Endpoint matches carry plain fields plus both derived keys
 */
export function toKeyMatchDTO(match: KeyMatch): KeyMatchDTO {
  switch (match.kind) {
    case "endpoint":
    case "endpoint-status":
      return { kind: match.kind, ...toEndpointKeysDTO(match.endpointId) };
    default:
      return match;
  }
}

export function toProfileKeysDTO(profileId: string): ProfileKeysDTO {
  return {
    profileId,
    key: profileKey(profileId),
    rulesKey: profileRulesKey(profileId),
    tagsKey: profileTagsKey(profileId),
  };
}

export function toHostKeysDTO(hostname: string): HostKeysDTO {
  return {
    hostname,
    dir: hostDir(hostname),
    configDir: hostConfigDir(hostname),
    hostIpKey: hostIpKey(hostname),
    statusDir: statusDir(hostname),
    statusKey: statusKey(hostname),
    lastStatusKey: lastStatusKey(hostname),
  };
}
