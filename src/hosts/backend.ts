import { comparePathLinks, type PathLink } from "./path-link.js";
import type { BackendRef } from "./types.js";

export interface BackendProps {
  namespace: string;
  name: string;
  port: string;
}

/**
 * A backend service with a reverse index of the routing rules that point at
 * it. The index is for reporting only and owns nothing.
 */
export class Backend implements BackendRef {
  private readonly paths: PathLink[] = [];

  private constructor(
    readonly id: string,
    readonly namespace: string,
    readonly name: string,
    readonly port: string,
  ) {}

  /**
   * @throws InvalidBackendError if namespace or name is empty
   */
  static create(props: BackendProps): Backend {
    if (!props.namespace || !props.name) {
      throw new InvalidBackendError(props);
    }
    return new Backend(buildBackendId(props), props.namespace, props.name, props.port);
  }

  /** Record a routing rule against this backend. Already-known links are ignored. */
  addBackendPath(link: PathLink): void {
    if (this.findBackendPath(link)) return;
    this.paths.push(link);
  }

  findBackendPath(link: PathLink): PathLink | null {
    return this.paths.find((p) => p.equals(link)) ?? null;
  }

  /** Links routed to this backend, by hostname then path ascending. */
  backendPaths(): PathLink[] {
    return [...this.paths].sort(comparePathLinks(false));
  }

  hasPaths(): boolean {
    return this.paths.length > 0;
  }
}

export function buildBackendId(props: BackendProps): string {
  return `${props.namespace}_${props.name}_${props.port}`;
}

export class InvalidBackendError extends Error {
  constructor(props: BackendProps) {
    super(`Invalid backend "${props.namespace}/${props.name}": namespace and name are required`);
    this.name = "InvalidBackendError";
  }
}
