import { config } from "../config/index.js";
import { logger } from "../config/logger.js";
import { Host } from "./host.js";
import type { PassthroughCounter } from "./types.js";

export interface HostRegistryOptions {
  /** Hostname of the catch-all host (default: `config.hosts.defaultHostname`) */
  defaultHostname?: string;
}

/** Hostnames added and removed since the last commit. */
export interface HostDelta {
  added: string[];
  removed: string[];
}

/**
 * Owns every virtual host of the proxy, keyed by hostname, and tracks what
 * changed since the last commit.
 *
 * A rebuild cycle acquires and removes hosts, calls {@link reconcileDelta} to
 * drop add/remove pairs whose content did not change, reads the delta to
 * decide how to reload the proxy, then calls {@link commit}.
 *
 * Not safe for concurrent cycles: callers run one cycle at a time.
 */
export class HostRegistry {
  private readonly hosts = new Map<string, Host>();
  private added = new Map<string, Host>();
  private removed = new Map<string, Host>();
  private passthroughCount = 0;
  private committed = false;
  private readonly defaultHostname: string;
  private readonly counter: PassthroughCounter;

  constructor(options: HostRegistryOptions = {}) {
    this.defaultHostname = options.defaultHostname ?? config.hosts.defaultHostname;
    this.counter = {
      adjust: (host, delta) => {
        if (this.hosts.get(host.hostname) !== host) return;
        this.passthroughCount += delta;
      },
    };
  }

  /** Return the host for `hostname`, creating and recording it as added if missing. */
  acquire(hostname: string): Host {
    const existing = this.hosts.get(hostname);
    if (existing) return existing;

    const host = new Host(hostname, this.counter);
    this.hosts.set(hostname, host);
    this.added.set(hostname, host);
    logger.debug(`Acquired host ${hostname}`);
    return host;
  }

  find(hostname: string): Host | null {
    return this.hosts.get(hostname) ?? null;
  }

  /**
   * Remove the named hosts. Unknown hostnames are ignored.
   *
   * A host created in this cycle is only dropped from the added set: the
   * removed set keeps the host as it was at the last commit, if there was one.
   */
  removeAll(hostnames: Iterable<string>): void {
    for (const hostname of hostnames) {
      const host = this.hosts.get(hostname);
      if (!host) continue;
      this.release(host);
      if (this.added.get(hostname) === host) {
        this.added.delete(hostname);
      } else {
        this.removed.set(hostname, host);
      }
      this.hosts.delete(hostname);
      logger.debug(`Removed host ${hostname}`);
    }
  }

  /**
   * Cancel out add/remove pairs of the same hostname whose content is equal,
   * so that reparsing an unchanged host is not reported as a change.
   * Returns the number of pairs cancelled.
   */
  reconcileDelta(): number {
    let cancelled = 0;
    for (const [hostname, removedHost] of this.removed) {
      const addedHost = this.added.get(hostname);
      if (!addedHost || !addedHost.equals(removedHost)) continue;

      const current = this.hosts.get(hostname);
      if (current) this.release(current);
      this.hosts.set(hostname, removedHost);
      if (removedHost.sslPassthrough) this.passthroughCount++;
      this.added.delete(hostname);
      this.removed.delete(hostname);
      cancelled++;
    }
    logger.debug("Host delta reconciled", { cancelled, added: this.added.size, removed: this.removed.size });
    return cancelled;
  }

  /** Close the cycle: forget the delta and remember that a commit happened. */
  commit(): void {
    this.added = new Map();
    this.removed = new Map();
    this.committed = true;
    logger.debug(`Host registry committed with ${this.hosts.size} host(s)`);
  }

  /** False until the first commit, i.e. while there is no previous state to diff against. */
  hasCommitted(): boolean {
    return this.committed;
  }

  /** Whether anything was added or removed. Only meaningful after {@link reconcileDelta}. */
  hasChanged(): boolean {
    return this.added.size > 0 || this.removed.size > 0;
  }

  /** Every host but the default one, by hostname ascending; null when there are none. */
  sortedHosts(): Host[] | null {
    const hosts: Host[] = [];
    for (const [hostname, host] of this.hosts) {
      if (hostname !== this.defaultHostname) hosts.push(host);
    }
    if (hosts.length === 0) return null;
    return hosts.sort((a, b) => (a.hostname < b.hostname ? -1 : a.hostname > b.hostname ? 1 : 0));
  }

  defaultHost(): Host | null {
    return this.hosts.get(this.defaultHostname) ?? null;
  }

  hasSSLPassthrough(): boolean {
    return this.passthroughCount > 0;
  }

  sslPassthroughCount(): number {
    return this.passthroughCount;
  }

  hasVarNamespace(): boolean {
    for (const host of this.hosts.values()) {
      if (host.varNamespace) return true;
    }
    return false;
  }

  items(): ReadonlyMap<string, Host> {
    return this.hosts;
  }

  itemsAdded(): ReadonlyMap<string, Host> {
    return this.added;
  }

  itemsRemoved(): ReadonlyMap<string, Host> {
    return this.removed;
  }

  delta(): HostDelta {
    return {
      added: [...this.added.keys()].sort(),
      removed: [...this.removed.keys()].sort(),
    };
  }

  /** Take a removed host's contribution out of the registry-wide aggregates. */
  private release(host: Host): void {
    if (host.sslPassthrough) this.passthroughCount--;
  }
}
