/**
 * Keyspace Layout (schema v1)
 *
 * Literal namespace constants shared by key builders and matchers.
 * A layout change that is not back-compatible goes into a new, parallel
 * module with a bumped version suffix so both can be served during a migration.
 */

/**
 * All datamodel keys live under this root
 */
export const ROOT_DIR = "/calico";

export const FELIX_VERSION = "/v1";
export const OPENSTACK_VERSION = "/v1";

/**
 * Orchestrator-specific data
 */
export const OPENSTACK_DIR = `${ROOT_DIR}/openstack`;
export const OPENSTACK_VERSION_DIR = `${OPENSTACK_DIR}${OPENSTACK_VERSION}`;

/**
 * Per-host status reported by the agent
 */
export const FELIX_STATUS_DIR = `${ROOT_DIR}/felix${FELIX_VERSION}/host`;

/**
 * Versioned subtree for data flowing from the orchestrator to the agents
 */
export const VERSION_DIR = `${ROOT_DIR}${FELIX_VERSION}`;

/**
 * Global ready flag, holds "true" or "false"
 */
export const READY_KEY = `${VERSION_DIR}/Ready`;

export const CONFIG_DIR = `${VERSION_DIR}/config`;
export const HOST_DIR = `${VERSION_DIR}/host`;
export const POLICY_DIR = `${VERSION_DIR}/policy`;
export const PROFILE_DIR = `${POLICY_DIR}/profile`;
export const IPAM_V4_POOL_DIR = `${VERSION_DIR}/ipam/v4/pool`;

/**
 * Leader election key for the Neutron mechanism drivers
 */
export const NEUTRON_ELECTION_KEY = `${OPENSTACK_VERSION_DIR}/neutron_election`;

export const ENDPOINT_STATUS_UP = "up";
export const ENDPOINT_STATUS_DOWN = "down";
export const ENDPOINT_STATUS_ERROR = "error";

export const ENDPOINT_STATUSES = [
  ENDPOINT_STATUS_UP,
  ENDPOINT_STATUS_DOWN,
  ENDPOINT_STATUS_ERROR,
] as const;

export type EndpointStatus = (typeof ENDPOINT_STATUSES)[number];
