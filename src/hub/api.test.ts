import { Hono } from "hono";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type Database from "better-sqlite3";

import type { ApplicationRecord, CollectorHealth, PublishedSnapshot } from "../types.js";
import { mountApiRoutes } from "./api.js";
import { openDb } from "./db.js";
import { StatusRelay } from "./relay.js";
import { SqliteSnapshotStore } from "./snapshot-store.js";

function app(id: string, vcores: number, mb: number): ApplicationRecord {
  return {
    id,
    name: id,
    user: "analyst",
    state: "RUNNING",
    applicationType: "SPARK",
    queue: "default",
    startedTime: "2026-10-19T11:00:00.000Z",
    allocatedVCores: vcores,
    allocatedMB: mb,
    vcoreSeconds: 10,
    memorySeconds: 20,
    trackingUrl: "",
    job: null,
    progress: [],
  };
}

function snapshot(rm: string, apps: ApplicationRecord[]): PublishedSnapshot {
  const status = { refresh_datetime: "2026-10-19T12:00:00.000Z", current_rm: rm };
  return {
    cluster: {
      totalNodes: 2,
      activeNodes: 2,
      unhealthyNodes: 0,
      lostNodes: 0,
      decommissionedNodes: 0,
      totalVirtualCores: 16,
      availableVirtualCores: 8,
      totalMB: 32768,
      availableMB: 16384,
      appsRunning: apps.length,
      appsPending: 0,
      containersAllocated: 3,
      ...status,
    },
    applications: apps,
    status,
  };
}

const HEALTH: CollectorHealth = {
  key: "cluster-a",
  running: true,
  consecutiveFailures: 0,
  failingSince: null,
  lastError: null,
  lastAttemptAt: "2026-10-19T12:00:00.000Z",
  lastSuccessAt: "2026-10-19T12:00:00.000Z",
  lastKnownActive: "http://rm-a:8088",
};

describe("mountApiRoutes", () => {
  let db: Database.Database;
  let store: SqliteSnapshotStore;
  let relay: StatusRelay;
  let api: Hono;

  beforeEach(() => {
    db = openDb(":memory:");
    store = new SqliteSnapshotStore(db);
    relay = new StatusRelay();
    api = new Hono();
    mountApiRoutes(api, {
      store,
      relay,
      clusterKeys: ["cluster-a", "cluster-b"],
      defaultKey: "cluster-a",
      health: () => [HEALTH],
    });
  });

  afterEach(() => {
    db.close();
  });

  it("answers 503 for a configured cluster that has not published yet", async () => {
    const res = await api.request("/api/cluster-b/status");

    expect(res.status).toBe(503);
    expect(await res.json()).toEqual({ error: "no data yet", status: "pending" });
  });

  it("answers 404 for an unknown cluster key", async () => {
    const res = await api.request("/api/nowhere/applications");

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "unknown cluster" });
  });

  it("serves the default cluster at the root paths", async () => {
    store.publish("cluster-a", snapshot("http://rm-a:8088", [app("app-1", 2, 4096)]));

    const status = await api.request("/api/status");
    const cluster = await api.request("/api/cluster");
    const apps = await api.request("/api/applications");

    expect(await status.json()).toEqual({
      data: { refresh_datetime: "2026-10-19T12:00:00.000Z", current_rm: "http://rm-a:8088" },
    });
    expect(await cluster.json()).toMatchObject({
      data: [{ totalVirtualCores: 16, current_rm: "http://rm-a:8088" }],
    });
    expect(await apps.json()).toEqual({ data: [app("app-1", 2, 4096)] });
  });

  it("keeps per-cluster paths separate", async () => {
    store.publish("cluster-a", snapshot("http://rm-a:8088", [app("a-1", 1, 1024)]));
    store.publish("cluster-b", snapshot("http://rm-b:8088", [app("b-1", 1, 1024), app("b-2", 1, 1024)]));

    const res = await api.request("/api/cluster-b/applications");

    expect(await res.json()).toMatchObject({ data: [{ id: "b-1" }, { id: "b-2" }] });
  });

  it("adds memory per vcore to a single application and null for zero vcores", async () => {
    store.publish("cluster-a", snapshot("http://rm-a:8088", [app("app-1", 4, 8192), app("app-0", 0, 512)]));

    const one = await api.request("/api/applications/app-1");
    const zero = await api.request("/api/cluster-a/applications/app-0");
    const missing = await api.request("/api/applications/app-9");

    expect(await one.json()).toEqual({ data: [{ ...app("app-1", 4, 8192), memoryPerVCore: 2048 }] });
    expect(await zero.json()).toMatchObject({ data: [{ id: "app-0", memoryPerVCore: null }] });
    expect(missing.status).toBe(404);
    expect(await missing.json()).toEqual({ error: "unknown application" });
  });

  it("lists configured clusters with their last status", async () => {
    store.publish("cluster-a", snapshot("http://rm-a:8088", []));

    const res = await api.request("/api/clusters");

    expect(await res.json()).toEqual({
      default: "cluster-a",
      clusters: [
        {
          key: "cluster-a",
          status: { refresh_datetime: "2026-10-19T12:00:00.000Z", current_rm: "http://rm-a:8088" },
        },
        { key: "cluster-b", status: null },
      ],
    });
  });

  it("reports collector health", async () => {
    const res = await api.request("/api/health");
    expect(await res.json()).toEqual({ ok: true, clusters: [HEALTH] });
  });

  it("streams the current status to a new SSE client and registers it with the relay", async () => {
    store.publish("cluster-a", snapshot("http://rm-a:8088", []));
    const controller = new AbortController();

    const res = await api.request("/api/events", { signal: controller.signal });
    expect(res.headers.get("content-type")).toBe("text/event-stream");
    expect(relay.size).toBe(1);

    const reader = res.body?.getReader();
    if (!reader) throw new Error("no body");
    const first = await reader.read();
    expect(new TextDecoder().decode(first.value)).toBe(
      'data: {"key":"cluster-a","refresh_datetime":"2026-10-19T12:00:00.000Z","current_rm":"http://rm-a:8088"}\n\n'
    );

    controller.abort();
    await reader.cancel();
    expect(relay.size).toBe(0);
  });
});
