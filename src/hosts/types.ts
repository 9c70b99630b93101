import type { Host } from "./host.js";
import type { PathLink } from "./path-link.js";

/** How a routing rule's path is matched against a request path. */
export type MatchType = "begin" | "exact" | "prefix" | "regex";

export const MATCH_TYPES: readonly MatchType[] = ["begin", "exact", "prefix", "regex"];

/** TLS settings of a virtual host. Certificate material is referenced by filename and hash only. */
export interface HostTLSConfig {
  alpn: string;
  caErrorPage: string;
  caFilename: string;
  caHash: string;
  caVerifyOptional: boolean;
  ciphers: string;
  crlFilename: string;
  crlHash: string;
  options: string;
  tlsCommonName: string;
  tlsFilename: string;
  tlsHash: string;
  tlsNotAfter: Date | null;
  useDefaultCrt: boolean;
}

export interface HostAliasConfig {
  aliasName: string;
  aliasRegex: string;
}

/**
 * The part of a backend the registry depends on. The backend keeps its own
 * reverse index of the paths routed to it; `addBackendPath` is the only call
 * the registry makes into it.
 */
export interface BackendRef {
  readonly id: string;
  readonly namespace: string;
  readonly name: string;
  readonly port: string;
  addBackendPath(link: PathLink): void;
}

/**
 * Non-owning handle a host uses to keep the registry's passthrough counter in
 * step. A change reported by a host the registry does not currently hold is
 * not counted.
 */
export interface PassthroughCounter {
  adjust(host: Host, delta: 1 | -1): void;
}

export function createTLSConfig(overrides: Partial<HostTLSConfig> = {}): HostTLSConfig {
  return {
    alpn: "",
    caErrorPage: "",
    caFilename: "",
    caHash: "",
    caVerifyOptional: false,
    ciphers: "",
    crlFilename: "",
    crlHash: "",
    options: "",
    tlsCommonName: "",
    tlsFilename: "",
    tlsHash: "",
    tlsNotAfter: null,
    useDefaultCrt: false,
    ...overrides,
  };
}

export function hasTLS(tls: HostTLSConfig): boolean {
  return tls.tlsFilename !== "";
}

export function tlsConfigEquals(a: HostTLSConfig, b: HostTLSConfig): boolean {
  return (
    a.alpn === b.alpn &&
    a.caErrorPage === b.caErrorPage &&
    a.caFilename === b.caFilename &&
    a.caHash === b.caHash &&
    a.caVerifyOptional === b.caVerifyOptional &&
    a.ciphers === b.ciphers &&
    a.crlFilename === b.crlFilename &&
    a.crlHash === b.crlHash &&
    a.options === b.options &&
    a.tlsCommonName === b.tlsCommonName &&
    a.tlsFilename === b.tlsFilename &&
    a.tlsHash === b.tlsHash &&
    (a.tlsNotAfter?.getTime() ?? null) === (b.tlsNotAfter?.getTime() ?? null) &&
    a.useDefaultCrt === b.useDefaultCrt
  );
}
