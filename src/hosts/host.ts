import { HostBackend } from "./host-backend.js";
import { PathLink } from "./path-link.js";
import {
  type BackendRef,
  createTLSConfig,
  type HostAliasConfig,
  type HostTLSConfig,
  hasTLS,
  type MatchType,
  type PassthroughCounter,
  tlsConfigEquals,
} from "./types.js";

/**
 * One routing rule of a host. Built by {@link Host.addPath} only.
 */
export class HostPath {
  constructor(
    readonly path: string,
    readonly link: PathLink,
    readonly match: MatchType,
    readonly backend: HostBackend,
  ) {}

  equals(other: HostPath): boolean {
    return (
      this.path === other.path &&
      this.match === other.match &&
      this.link.equals(other.link) &&
      this.backend.equals(other.backend)
    );
  }

  toJSON() {
    return {
      path: this.path,
      link: this.link.toJSON(),
      match: this.match,
      backend: this.backend.toJSON(),
    };
  }
}

/**
 * A virtual host and its routing rules.
 *
 * Paths are kept sorted by path string, descending, so that a longer path is
 * tried before a shorter one it overlaps with ("/api/v1" before "/api" before "/").
 *
 * `sslPassthrough` is counted by the owning registry; the host only holds a
 * handle to that counter, never the registry itself. The registry ignores
 * changes on a host it no longer holds.
 */
export class Host {
  private readonly pathList: HostPath[] = [];
  alias: HostAliasConfig = { aliasName: "", aliasRegex: "" };
  rootRedirect = "";
  httpPassthroughBackend = "";
  tls: HostTLSConfig = createTLSConfig();
  varNamespace = false;
  private passthrough = false;

  constructor(
    readonly hostname: string,
    private readonly counter: PassthroughCounter,
  ) {}

  /** Routing rules, longest path first. Extend through {@link addPath} only. */
  get paths(): readonly HostPath[] {
    return this.pathList;
  }

  /** First path with an exact string match, or null. */
  findPath(path: string): HostPath | null {
    return this.paths.find((p) => p.path === path) ?? null;
  }

  /**
   * Bind `path` to a snapshot of `backend`, or to the 404 backend when there
   * is none. Also registers the new link in the backend's own path index.
   * Adding the same path twice yields two entries.
   */
  addPath(backend: BackendRef | null | undefined, path: string, match: MatchType): HostPath {
    const link = PathLink.create(this.hostname, path);
    let hostBackend: HostBackend;
    if (backend) {
      hostBackend = HostBackend.fromBackend(backend);
      backend.addBackendPath(link);
    } else {
      hostBackend = HostBackend.notFound();
    }
    const hostPath = new HostPath(path, link, match, hostBackend);
    this.pathList.push(hostPath);
    // reverse order so a sub-path never shadows a longer sibling
    this.pathList.sort((a, b) => (a.path > b.path ? -1 : a.path < b.path ? 1 : 0));
    return hostPath;
  }

  get sslPassthrough(): boolean {
    return this.passthrough;
  }

  setSSLPassthrough(value: boolean): void {
    if (this.passthrough === value) return;
    this.counter.adjust(this, value ? 1 : -1);
    this.passthrough = value;
  }

  hasTLSAuth(): boolean {
    return this.tls.caHash !== "";
  }

  hasTLS(): boolean {
    return hasTLS(this.tls);
  }

  /**
   * Value equality over the whole host, paths and backend snapshots included.
   * The registry handle is not part of a host's content.
   */
  equals(other: Host): boolean {
    if (
      this.hostname !== other.hostname ||
      this.alias.aliasName !== other.alias.aliasName ||
      this.alias.aliasRegex !== other.alias.aliasRegex ||
      this.rootRedirect !== other.rootRedirect ||
      this.httpPassthroughBackend !== other.httpPassthroughBackend ||
      this.varNamespace !== other.varNamespace ||
      this.passthrough !== other.passthrough ||
      !tlsConfigEquals(this.tls, other.tls) ||
      this.paths.length !== other.paths.length
    ) {
      return false;
    }
    return this.paths.every((p, i) => p.equals(other.paths[i]));
  }

  toString(): string {
    const paths = this.paths.map((p) => `${p.path}(${p.match})->${p.backend.id}`).join(",");
    return `Host{hostname:${this.hostname} paths:[${paths}] sslPassthrough:${this.passthrough} varNamespace:${this.varNamespace} tls:${this.hasTLS()}}`;
  }

  toJSON() {
    return {
      hostname: this.hostname,
      paths: this.paths.map((p) => p.toJSON()),
      alias: { ...this.alias },
      rootRedirect: this.rootRedirect,
      httpPassthroughBackend: this.httpPassthroughBackend,
      tls: { ...this.tls, tlsNotAfter: this.tls.tlsNotAfter?.toISOString() ?? null },
      varNamespace: this.varNamespace,
      sslPassthrough: this.passthrough,
    };
  }
}
