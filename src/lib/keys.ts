/**
 * Keyspace Helpers
 *
 * Centralizes all key generation logic so writers and watchers agree on
 * the exact path strings. Components are used as given: callers pass
 * non-empty, slash-free identifiers (see validation.ts for the HTTP edge).
 */

import {
  CONFIG_DIR,
  FELIX_STATUS_DIR,
  HOST_DIR,
  IPAM_V4_POOL_DIR,
  PROFILE_DIR,
} from "./paths.js";

/**
 * Host directory
 */
export function hostDir(hostname: string): string {
  return `${HOST_DIR}/${hostname}`;
}

/**
 * Per-host config directory
 */
export function hostConfigDir(hostname: string): string {
  return `${hostDir(hostname)}/config`;
}

/**
 * Per-host config value (overrides the global value of the same name)
 */
export function hostConfigKey(hostname: string, name: string): string {
  return `${hostConfigDir(hostname)}/${name}`;
}

/**
 * Host's BIRD peering IP
 */
export function hostIpKey(hostname: string): string {
  return `${hostDir(hostname)}/bird_ip`;
}

/**
 * Agent status directory for a host
 */
export function statusDir(hostname: string): string {
  return `${FELIX_STATUS_DIR}/${hostname}`;
}

/**
 * Last status the agent reported for its host
 */
export function lastStatusKey(hostname: string): string {
  return `${statusDir(hostname)}/last_reported_status`;
}

export function statusKey(hostname: string): string {
  return `${statusDir(hostname)}/status`;
}

function workloadEndpointPath(
  root: string,
  host: string,
  orchestrator: string,
  workloadId: string,
  endpointId: string
): string {
  return `${root}/${host}/workload/${orchestrator}/${workloadId}/endpoint/${endpointId}`;
}

/**
 * Endpoint configuration
 */
export function endpointKey(
  host: string,
  orchestrator: string,
  workloadId: string,
  endpointId: string
): string {
  return workloadEndpointPath(HOST_DIR, host, orchestrator, workloadId, endpointId);
}

/**
 * Endpoint status (same shape as endpointKey, under the status root)
 */
export function statusEndpointKey(
  host: string,
  orchestrator: string,
  workloadId: string,
  endpointId: string
): string {
  return workloadEndpointPath(FELIX_STATUS_DIR, host, orchestrator, workloadId, endpointId);
}

/**
 * Profile directory
 */
export function profileKey(profileId: string): string {
  return `${PROFILE_DIR}/${profileId}`;
}

export function profileRulesKey(profileId: string): string {
  return `${profileKey(profileId)}/rules`;
}

export function profileTagsKey(profileId: string): string {
  return `${profileKey(profileId)}/tags`;
}

/**
 * Global config value
 */
export function configKey(name: string): string {
  return `${CONFIG_DIR}/${name}`;
}

/**
 * IPv4 pool, keyed by its already-encoded CIDR (e.g. "10.0.0.0-8")
 */
export function ipamV4PoolKey(encodedCidr: string): string {
  return `${IPAM_V4_POOL_DIR}/${encodedCidr}`;
}
