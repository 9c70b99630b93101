export { Backend, type BackendProps, buildBackendId, InvalidBackendError } from "./backend.js";
export { Host, type HostPath } from "./host.js";
export { HostBackend } from "./host-backend.js";
export { type HostDelta, HostRegistry, type HostRegistryOptions } from "./host-registry.js";
export { comparePathLinks, PathLink } from "./path-link.js";
export { getHostRegistry, resetHostRegistry } from "./singleton.js";
export {
  type BackendRef,
  createTLSConfig,
  type HostAliasConfig,
  type HostTLSConfig,
  hasTLS,
  MATCH_TYPES,
  type MatchType,
  type PassthroughCounter,
  tlsConfigEquals,
} from "./types.js";
