export * from "./lib/paths.js";
export * from "./lib/keys.js";
export * from "./lib/matchers.js";
export { EndpointId, hashString, type EndpointIdFields } from "./lib/endpoint-id.js";
export { EndpointIdMap } from "./lib/endpoint-id-map.js";
export { StringInterner, identityInterner, sharedInterner, type Interner } from "./lib/intern.js";
