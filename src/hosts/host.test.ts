import { describe, expect, expectTypeOf, it, vi } from "vitest";
import { Backend } from "./backend.js";
import { Host, type HostPath } from "./host.js";
import { PathLink } from "./path-link.js";
import { createTLSConfig, type PassthroughCounter } from "./types.js";

function makeCounter() {
  return { adjust: vi.fn<PassthroughCounter["adjust"]>() };
}

function makeBackend(name = "web", port = "8080"): Backend {
  return Backend.create({ namespace: "default", name, port });
}

describe("Host", () => {
  describe("addPath", () => {
    it("keeps paths sorted by path string, descending", () => {
      const host = new Host("a.example.com", makeCounter());
      host.addPath(makeBackend("b1"), "/api", "prefix");
      host.addPath(makeBackend("b2"), "/", "prefix");

      expect(host.paths.map((p) => p.path)).toEqual(["/api", "/"]);
    });

    it("re-sorts after every insertion", () => {
      const host = new Host("a.example.com", makeCounter());
      for (const path of ["/", "/app", "/api/v1", "/api", "/static"]) {
        host.addPath(makeBackend(), path, "begin");
      }

      expect(host.paths.map((p) => p.path)).toEqual(["/static", "/app", "/api/v1", "/api", "/"]);
    });

    it("binds a snapshot of the backend and a link to this host", () => {
      const host = new Host("a.example.com", makeCounter());
      const hostPath = host.addPath(makeBackend("web", "8080"), "/api", "exact");

      expect(hostPath.toJSON()).toEqual({
        path: "/api",
        link: { hostname: "a.example.com", path: "/api" },
        match: "exact",
        backend: { id: "default_web_8080", namespace: "default", name: "web", port: "8080" },
      });
    });

    it("registers the new link in the backend's path index", () => {
      const backend = makeBackend();
      const host = new Host("a.example.com", makeCounter());
      host.addPath(backend, "/api", "prefix");

      expect(backend.findBackendPath(PathLink.create("a.example.com", "/api"))).not.toBeNull();
    });

    it("binds the 404 backend when there is no backend", () => {
      const host = new Host("a.example.com", makeCounter());
      const fromNull = host.addPath(null, "/missing", "prefix");
      const fromUndefined = host.addPath(undefined, "/gone", "prefix");

      expect(fromNull.backend.isNotFound()).toBe(true);
      expect(fromUndefined.backend.id).toBe("_error404");
    });

    it("exposes paths as a read-only list", () => {
      const host = new Host("a.example.com", makeCounter());
      host.addPath(null, "/", "prefix");

      expectTypeOf(host.paths).toEqualTypeOf<readonly HostPath[]>();
      expect(host.paths.map((p) => p.path)).toEqual(["/"]);
    });

    it("does not deduplicate paths", () => {
      const host = new Host("a.example.com", makeCounter());
      host.addPath(makeBackend("b1"), "/", "prefix");
      host.addPath(makeBackend("b2"), "/", "prefix");

      expect(host.paths).toHaveLength(2);
      expect(host.paths.map((p) => p.backend.name)).toEqual(["b1", "b2"]);
    });
  });

  describe("findPath", () => {
    it("returns the first exact match", () => {
      const host = new Host("a.example.com", makeCounter());
      host.addPath(makeBackend("b1"), "/api", "prefix");
      host.addPath(makeBackend("b2"), "/api", "exact");

      expect(host.findPath("/api")?.backend.name).toBe("b1");
    });

    it("returns null when no path matches exactly", () => {
      const host = new Host("a.example.com", makeCounter());
      host.addPath(makeBackend(), "/api", "prefix");

      expect(host.findPath("/ap")).toBeNull();
      expect(host.findPath("/api/")).toBeNull();
    });
  });

  describe("setSSLPassthrough", () => {
    it("adjusts the counter once per change", () => {
      const counter = makeCounter();
      const host = new Host("a.example.com", counter);

      host.setSSLPassthrough(true);
      host.setSSLPassthrough(true);
      host.setSSLPassthrough(false);
      host.setSSLPassthrough(false);

      expect(counter.adjust.mock.calls).toEqual([
        [host, 1],
        [host, -1],
      ]);
      expect(host.sslPassthrough).toBe(false);
    });

    it("leaves the counter alone when unset", () => {
      const counter = makeCounter();
      new Host("a.example.com", counter).setSSLPassthrough(false);
      expect(counter.adjust).not.toHaveBeenCalled();
    });
  });

  it("reports TLS auth when a CA hash is present", () => {
    const host = new Host("a.example.com", makeCounter());
    expect(host.hasTLSAuth()).toBe(false);

    host.tls = createTLSConfig({ caFilename: "/etc/ca.pem", caHash: "abc123" });
    expect(host.hasTLSAuth()).toBe(true);
  });

  it("reports TLS when a certificate file is set", () => {
    const host = new Host("a.example.com", makeCounter());
    expect(host.hasTLS()).toBe(false);

    host.tls.tlsFilename = "/etc/tls/a.pem";
    expect(host.hasTLS()).toBe(true);
  });

  describe("equals", () => {
    function buildHost(): Host {
      const host = new Host("a.example.com", makeCounter());
      host.addPath(makeBackend("api"), "/api", "prefix");
      host.addPath(null, "/", "begin");
      host.tls = createTLSConfig({ tlsFilename: "/etc/tls/a.pem", tlsNotAfter: new Date("2027-01-01T00:00:00Z") });
      host.varNamespace = true;
      return host;
    }

    it("is true for separately built hosts with the same content", () => {
      expect(buildHost().equals(buildHost())).toBe(true);
    });

    it("ignores which registry counter the host reports to", () => {
      const a = new Host("a.example.com", makeCounter());
      const b = new Host("a.example.com", makeCounter());
      expect(a.equals(b)).toBe(true);
    });

    it("detects an extra path", () => {
      const other = buildHost();
      other.addPath(makeBackend("api"), "/api/v2", "prefix");
      expect(buildHost().equals(other)).toBe(false);
    });

    it("detects a different backend snapshot", () => {
      const a = new Host("a.example.com", makeCounter());
      const b = new Host("a.example.com", makeCounter());
      a.addPath(makeBackend("web", "8080"), "/", "prefix");
      b.addPath(makeBackend("web", "8081"), "/", "prefix");
      expect(a.equals(b)).toBe(false);
    });

    it("detects a different match type", () => {
      const a = new Host("a.example.com", makeCounter());
      const b = new Host("a.example.com", makeCounter());
      a.addPath(null, "/", "prefix");
      b.addPath(null, "/", "exact");
      expect(a.equals(b)).toBe(false);
    });

    it("detects a different certificate expiry", () => {
      const other = buildHost();
      other.tls.tlsNotAfter = new Date("2028-01-01T00:00:00Z");
      expect(buildHost().equals(other)).toBe(false);
    });

    it("detects flag changes", () => {
      const passthrough = buildHost();
      passthrough.setSSLPassthrough(true);
      expect(buildHost().equals(passthrough)).toBe(false);

      const redirect = buildHost();
      redirect.rootRedirect = "/app";
      expect(buildHost().equals(redirect)).toBe(false);

      const alias = buildHost();
      alias.alias = { aliasName: "www.a.example.com", aliasRegex: "" };
      expect(buildHost().equals(alias)).toBe(false);
    });
  });

  it("renders a one-line summary", () => {
    const host = new Host("a.example.com", makeCounter());
    host.addPath(makeBackend("web", "80"), "/", "prefix");

    expect(host.toString()).toBe(
      "Host{hostname:a.example.com paths:[/(prefix)->default_web_80] sslPassthrough:false varNamespace:false tls:false}",
    );
  });

  it("serializes without the registry handle", () => {
    const host = new Host("a.example.com", makeCounter());
    host.tls.tlsNotAfter = new Date("2027-01-01T00:00:00Z");
    const json = host.toJSON();

    expect(json.tls.tlsNotAfter).toBe("2027-01-01T00:00:00.000Z");
    expect(Object.keys(json)).toEqual([
      "hostname",
      "paths",
      "alias",
      "rootRedirect",
      "httpPassthroughBackend",
      "tls",
      "varNamespace",
      "sslPassthrough",
    ]);
  });
});
