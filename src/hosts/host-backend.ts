import type { BackendRef } from "./types.js";

const NOT_FOUND_BACKEND_ID = "_error404";

/**
 * Value Object: HostBackend
 *
 * Snapshot of a backend's identity taken when a path is bound to it. Later
 * changes to the backend do not reach the host that holds the snapshot.
 */
export class HostBackend {
  private constructor(
    readonly id: string,
    readonly namespace: string,
    readonly name: string,
    readonly port: string,
  ) {}

  static fromBackend(backend: BackendRef): HostBackend {
    return new HostBackend(backend.id, backend.namespace, backend.name, backend.port);
  }

  /**
   * Sentinel bound to paths that have no backend; the proxy answers them with a 404.
   */
  static notFound(): HostBackend {
    return new HostBackend(NOT_FOUND_BACKEND_ID, "", "", "");
  }

  isNotFound(): boolean {
    return this.id === NOT_FOUND_BACKEND_ID;
  }

  equals(other: HostBackend): boolean {
    return (
      this.id === other.id && this.namespace === other.namespace && this.name === other.name && this.port === other.port
    );
  }

  toJSON(): { id: string; namespace: string; name: string; port: string } {
    return { id: this.id, namespace: this.namespace, name: this.name, port: this.port };
  }
}
