import { describe, expect, it } from "vitest";

import { ConfigError, loadConfig, normalizeRmUrl } from "./config.js";

describe("normalizeRmUrl", () => {
  it("adds a scheme to bare hosts and drops trailing slashes", () => {
    expect(normalizeRmUrl("rm1:8088/")).toBe("http://rm1:8088");
    expect(normalizeRmUrl(" https://rm1.example.test:8090 ")).toBe("https://rm1.example.test:8090");
  });

  it("lower-cases the host and drops a default port", () => {
    expect(normalizeRmUrl("HTTP://RM1.Example.Test:80/")).toBe("http://rm1.example.test");
    expect(normalizeRmUrl("https://rm1:443")).toBe("https://rm1");
  });

  it("keeps a gateway path prefix", () => {
    expect(normalizeRmUrl("http://gw:8443/yarn/")).toBe("http://gw:8443/yarn");
  });
});

describe("loadConfig", () => {
  it("builds a single cluster from the endpoint shorthand", () => {
    const config = loadConfig({ YARN_ENDPOINT: "rm1:8088,rm2:8088/", YARN_POLL_SLEEP: "2" });

    expect(config).toEqual({
      clusters: [
        {
          key: "default",
          rmUrls: ["http://rm1:8088", "http://rm2:8088"],
          pollIntervalMs: 2000,
          redirectHopLimit: 3,
          requestTimeoutMs: 10_000,
          applicationStates: ["RUNNING"],
          enrichApplications: true,
        },
      ],
      defaultClusterKey: "default",
      sqlitePath: "./yarn-fleet-monitor.sqlite",
      port: 3000,
    });
  });

  it("reads several clusters with per-cluster overrides and env defaults", () => {
    const config = loadConfig({
      YARN_CLUSTERS: JSON.stringify([
        { key: "prod", rmUrls: ["http://rm-a:8088"], redirectHopLimit: 0 },
        { key: "dev", rmUrls: ["rm-d:8088"], enrichApplications: false, applicationStates: ["RUNNING", "ACCEPTED"] },
      ]),
      YARN_POLL_INTERVAL_MS: "750",
      YARN_DEFAULT_CLUSTER: "dev",
      PORT: "8080",
      SQLITE_PATH: "/tmp/fleet.sqlite",
    });

    expect(config.clusters.map((c) => [c.key, c.pollIntervalMs, c.redirectHopLimit])).toEqual([
      ["prod", 750, 0],
      ["dev", 750, 3],
    ]);
    expect(config.clusters[1]?.rmUrls).toEqual(["http://rm-d:8088"]);
    expect(config.clusters[1]?.applicationStates).toEqual(["RUNNING", "ACCEPTED"]);
    expect(config.clusters[1]?.enrichApplications).toBe(false);
    expect(config.defaultClusterKey).toBe("dev");
    expect(config.port).toBe(8080);
    expect(config.sqlitePath).toBe("/tmp/fleet.sqlite");
  });

  it("treats empty variables as unset", () => {
    const config = loadConfig({ YARN_CLUSTERS: "", YARN_ENDPOINT: "rm1:8088", YARN_CLUSTER_KEY: "edge", PORT: " " });

    expect(config.clusters.map((c) => c.key)).toEqual(["edge"]);
    expect(config.port).toBe(3000);
  });

  it("requires a cluster source", () => {
    expect(() => loadConfig({})).toThrow(new ConfigError("set YARN_CLUSTERS or YARN_ENDPOINT"));
  });

  it("rejects invalid JSON in YARN_CLUSTERS", () => {
    expect(() => loadConfig({ YARN_CLUSTERS: "[{" })).toThrow(/^YARN_CLUSTERS is not valid JSON/);
  });

  it("rejects cluster keys that cannot be used as a namespace", () => {
    const clusters = JSON.stringify([{ key: "bad key", rmUrls: ["rm1:8088"] }]);
    expect(() => loadConfig({ YARN_CLUSTERS: clusters })).toThrow(/YARN_CLUSTERS\.0\.key/);
  });

  it("rejects cluster keys that collide with API paths", () => {
    for (const key of ["applications", "status", "cluster", "clusters", "health", "events"]) {
      const clusters = JSON.stringify([{ key, rmUrls: ["rm1:8088"] }]);
      expect(() => loadConfig({ YARN_CLUSTERS: clusters })).toThrow("YARN_CLUSTERS.0.key: is reserved by the HTTP API");
    }
    expect(() => loadConfig({ YARN_ENDPOINT: "rm1:8088", YARN_CLUSTER_KEY: "status" })).toThrow(ConfigError);
  });

  it("rejects an RM URL that does not parse", () => {
    const clusters = JSON.stringify([{ key: "prod", rmUrls: ["http://rm 1:8088"] }]);
    expect(() => loadConfig({ YARN_CLUSTERS: clusters })).toThrow("YARN_CLUSTERS.0.rmUrls.0: not a valid URL");
  });

  it("rejects a cluster without RM URLs", () => {
    const clusters = JSON.stringify([{ key: "prod", rmUrls: [] }]);
    expect(() => loadConfig({ YARN_CLUSTERS: clusters })).toThrow(/YARN_CLUSTERS\.0\.rmUrls/);
  });

  it("rejects duplicate cluster keys", () => {
    const clusters = JSON.stringify([
      { key: "prod", rmUrls: ["rm1:8088"] },
      { key: "prod", rmUrls: ["rm2:8088"] },
    ]);
    expect(() => loadConfig({ YARN_CLUSTERS: clusters })).toThrow("duplicate cluster key: prod");
  });

  it("rejects a default cluster that is not configured", () => {
    expect(() => loadConfig({ YARN_ENDPOINT: "rm1:8088", YARN_DEFAULT_CLUSTER: "other" })).toThrow(
      "YARN_DEFAULT_CLUSTER names an unknown cluster: other"
    );
  });

  it("rejects a non-numeric port", () => {
    expect(() => loadConfig({ YARN_ENDPOINT: "rm1:8088", PORT: "http" })).toThrow(ConfigError);
  });
});
