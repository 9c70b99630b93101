import { config } from "../config/index.js";
import { HostRegistry } from "./host-registry.js";

let _registry: HostRegistry | null = null;

export function getHostRegistry(): HostRegistry {
  if (!_registry) {
    _registry = new HostRegistry({ defaultHostname: config.hosts.defaultHostname });
  }
  return _registry;
}

/** Drop the process-wide registry; the next {@link getHostRegistry} call builds a fresh one. */
export function resetHostRegistry(): void {
  _registry = null;
}
