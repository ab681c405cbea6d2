/**
 * Key Matchers
 *
 * Recover identifiers from raw keys seen on store events. Any key the
 * namespace does not define (other schema versions, unrelated subtrees,
 * garbage) yields null, and consumers skip it.
 *
 * The segment matchers anchor at the start only: a key that extends a
 * known shape (".../endpoint/e1/status") still matches it.
 */

import {
  CONFIG_DIR,
  FELIX_STATUS_DIR,
  HOST_DIR,
  IPAM_V4_POOL_DIR,
  NEUTRON_ELECTION_KEY,
  PROFILE_DIR,
  READY_KEY,
} from "./paths.js";
import { EndpointId } from "./endpoint-id.js";
import type { Interner } from "./intern.js";

const SEGMENT = "([^/]+)";

export const RULES_KEY_RE = new RegExp(`^${PROFILE_DIR}/${SEGMENT}/rules`);
export const TAGS_KEY_RE = new RegExp(`^${PROFILE_DIR}/${SEGMENT}/tags`);
export const ENDPOINT_KEY_RE = new RegExp(
  `^(?:${HOST_DIR}|${FELIX_STATUS_DIR})/${SEGMENT}/workload/${SEGMENT}/${SEGMENT}/endpoint/${SEGMENT}`
);
export const HOST_IP_KEY_RE = new RegExp(`^${HOST_DIR}/${SEGMENT}/bird_ip`);
export const IPAM_V4_CIDR_KEY_RE = new RegExp(`^${IPAM_V4_POOL_DIR}/${SEGMENT}`);

const HOST_DIR_RE = new RegExp(`^${HOST_DIR}/${SEGMENT}/*$`);
const CONFIG_KEY_RE = new RegExp(`^${CONFIG_DIR}/${SEGMENT}$`);
const HOST_CONFIG_KEY_RE = new RegExp(`^${HOST_DIR}/${SEGMENT}/config/${SEGMENT}$`);

function firstCapture(re: RegExp, key: string): string | null {
  const m = re.exec(key);
  return m ? m[1] : null;
}

export function profileIdFromRulesKey(key: string): string | null {
  return firstCapture(RULES_KEY_RE, key);
}

export function profileIdFromTagsKey(key: string): string | null {
  return firstCapture(TAGS_KEY_RE, key);
}

/**
 * Profile ID if key is a profile directory (trailing slashes ignored)
 */
export function profileIdFromProfileDir(key: string): string | null {
  const trimmed = key.replace(/\/+$/, "");
  const slash = trimmed.lastIndexOf("/");
  if (slash < 0) return null;
  return trimmed.slice(0, slash) === PROFILE_DIR ? trimmed.slice(slash + 1) : null;
}

/**
 * Endpoint identity from a live endpoint key or an endpoint status key
 */
export function endpointIdFromKey(key: string, interner?: Interner): EndpointId | null {
  const m = ENDPOINT_KEY_RE.exec(key);
  if (!m) return null;
  const [, host, orchestrator, workload, endpoint] = m;
  return new EndpointId(host, orchestrator, workload, endpoint, interner);
}

export function hostnameFromHostIpKey(key: string): string | null {
  return firstCapture(HOST_IP_KEY_RE, key);
}

export function encodedCidrFromIpamKey(key: string): string | null {
  return firstCapture(IPAM_V4_CIDR_KEY_RE, key);
}

export function hostnameFromHostDir(key: string): string | null {
  return firstCapture(HOST_DIR_RE, key);
}

export function configNameFromKey(key: string): string | null {
  return firstCapture(CONFIG_KEY_RE, key);
}

export function hostConfigNameFromKey(key: string): { hostname: string; name: string } | null {
  const m = HOST_CONFIG_KEY_RE.exec(key);
  return m ? { hostname: m[1], name: m[2] } : null;
}

/**
 * Owning host of any status leaf: FELIX_STATUS_DIR/<hostname>/.../status.
 * Looser than ENDPOINT_KEY_RE on purpose; it accepts host-level and
 * endpoint-level status alike.
 */
export function hostnameFromStatusKey(key: string): string | null {
  const prefix = `${FELIX_STATUS_DIR}/`;
  if (!key.startsWith(prefix) || !key.endsWith("/status")) return null;
  const inHostDir = key.slice(prefix.length);
  const slash = inHostDir.indexOf("/");
  return slash > 0 ? inHostDir.slice(0, slash) : null;
}

export type KeyMatch =
  | { kind: "ready" }
  | { kind: "neutron-election" }
  | { kind: "profile-rules"; profileId: string }
  | { kind: "profile-tags"; profileId: string }
  | { kind: "profile"; profileId: string }
  | { kind: "endpoint"; endpointId: EndpointId }
  | { kind: "endpoint-status"; endpointId: EndpointId }
  | { kind: "host-ip"; hostname: string }
  | { kind: "host"; hostname: string }
  | { kind: "config"; name: string }
  | { kind: "host-config"; hostname: string; name: string }
  | { kind: "ipam-v4-pool"; encodedCidr: string }
  | { kind: "host-status"; hostname: string };

export type KeyKind = KeyMatch["kind"];

/**
 * Classify a raw key, or null when this schema does not define it.
 * Endpoint status leaves classify as "endpoint-status"; "host-status"
 * covers the remaining status leaves.
 */
export function classifyKey(key: string, interner?: Interner): KeyMatch | null {
  if (key === READY_KEY) return { kind: "ready" };
  if (key === NEUTRON_ELECTION_KEY) return { kind: "neutron-election" };

  const rulesProfile = profileIdFromRulesKey(key);
  if (rulesProfile !== null) return { kind: "profile-rules", profileId: rulesProfile };

  const tagsProfile = profileIdFromTagsKey(key);
  if (tagsProfile !== null) return { kind: "profile-tags", profileId: tagsProfile };

  const profileId = profileIdFromProfileDir(key);
  if (profileId !== null) return { kind: "profile", profileId };

  const endpointId = endpointIdFromKey(key, interner);
  if (endpointId !== null) {
    return key.startsWith(`${FELIX_STATUS_DIR}/`)
      ? { kind: "endpoint-status", endpointId }
      : { kind: "endpoint", endpointId };
  }

  const ipHost = hostnameFromHostIpKey(key);
  if (ipHost !== null) return { kind: "host-ip", hostname: ipHost };

  const hostname = hostnameFromHostDir(key);
  if (hostname !== null) return { kind: "host", hostname };

  const name = configNameFromKey(key);
  if (name !== null) return { kind: "config", name };

  const hostConfig = hostConfigNameFromKey(key);
  if (hostConfig !== null) return { kind: "host-config", ...hostConfig };

  const encodedCidr = encodedCidrFromIpamKey(key);
  if (encodedCidr !== null) return { kind: "ipam-v4-pool", encodedCidr };

  const statusHost = hostnameFromStatusKey(key);
  if (statusHost !== null) return { kind: "host-status", hostname: statusHost };

  return null;
}
