/**
 * Key Builder Tests
 */

import { describe, it, expect } from "vitest";
import {
  configKey,
  endpointKey,
  hostConfigDir,
  hostConfigKey,
  hostDir,
  hostIpKey,
  ipamV4PoolKey,
  lastStatusKey,
  profileKey,
  profileRulesKey,
  profileTagsKey,
  statusDir,
  statusEndpointKey,
  statusKey,
} from "../src/lib/keys.js";
import {
  CONFIG_DIR,
  FELIX_STATUS_DIR,
  HOST_DIR,
  NEUTRON_ELECTION_KEY,
  PROFILE_DIR,
  READY_KEY,
  VERSION_DIR,
} from "../src/lib/paths.js";
import * as keyspace from "../src/index.js";

describe("Namespace layout", () => {
  it("should expose the v1 literal roots", () => {
    expect(VERSION_DIR).toBe("/calico/v1");
    expect(READY_KEY).toBe("/calico/v1/Ready");
    expect(CONFIG_DIR).toBe("/calico/v1/config");
    expect(HOST_DIR).toBe("/calico/v1/host");
    expect(PROFILE_DIR).toBe("/calico/v1/policy/profile");
    expect(FELIX_STATUS_DIR).toBe("/calico/felix/v1/host");
    expect(NEUTRON_ELECTION_KEY).toBe("/calico/openstack/v1/neutron_election");
  });
});

describe("Host keys", () => {
  it("should build host directories", () => {
    expect(hostDir("node-1")).toBe("/calico/v1/host/node-1");
    expect(hostConfigDir("node-1")).toBe("/calico/v1/host/node-1/config");
    expect(hostConfigKey("node-1", "LogSeverity")).toBe("/calico/v1/host/node-1/config/LogSeverity");
    expect(hostIpKey("node-1")).toBe("/calico/v1/host/node-1/bird_ip");
  });

  it("should build status keys under the status root", () => {
    expect(statusDir("node-1")).toBe("/calico/felix/v1/host/node-1");
    expect(statusKey("node-1")).toBe("/calico/felix/v1/host/node-1/status");
    expect(lastStatusKey("node-1")).toBe("/calico/felix/v1/host/node-1/last_reported_status");
  });
});

describe("Endpoint keys", () => {
  it("should build the live endpoint key", () => {
    expect(endpointKey("h1", "orc", "w1", "e1")).toBe(
      "/calico/v1/host/h1/workload/orc/w1/endpoint/e1"
    );
  });

  it("should build the status endpoint key with the same shape", () => {
    expect(statusEndpointKey("h1", "orc", "w1", "e1")).toBe(
      "/calico/felix/v1/host/h1/workload/orc/w1/endpoint/e1"
    );
  });
});

describe("Profile, config and IPAM keys", () => {
  it("should build profile keys", () => {
    expect(profileKey("web")).toBe("/calico/v1/policy/profile/web");
    expect(profileRulesKey("web")).toBe("/calico/v1/policy/profile/web/rules");
    expect(profileTagsKey("web")).toBe("/calico/v1/policy/profile/web/tags");
  });

  it("should build config and pool keys", () => {
    expect(configKey("LogSeverity")).toBe("/calico/v1/config/LogSeverity");
    expect(ipamV4PoolKey("10.65.0.0-16")).toBe("/calico/v1/ipam/v4/pool/10.65.0.0-16");
  });

  it("should not validate components", () => {
    expect(profileKey("")).toBe("/calico/v1/policy/profile/");
    expect(configKey("a/b")).toBe("/calico/v1/config/a/b");
  });
});

describe("Package entry", () => {
  it("should expose builders, matchers and the identity type together", () => {
    const id = keyspace.endpointIdFromKey(keyspace.endpointKey("h1", "orc", "w1", "e1"));
    expect(id).toBeInstanceOf(keyspace.EndpointId);
    expect(id?.pathForStatus()).toBe(keyspace.statusEndpointKey("h1", "orc", "w1", "e1"));
  });
});
