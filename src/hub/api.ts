import type { Context, Hono } from "hono";
import { memoryPerVCore } from "../collector/normalize.js";
import type { CollectorHealth, PublishedSnapshot } from "../types.js";
import { SSE_HEADERS } from "./relay.js";
import type { StatusEvent, StatusRelay } from "./relay.js";
import type { SnapshotStore } from "./snapshot-store.js";

export interface ApiDeps {
  store: SnapshotStore;
  relay: StatusRelay;
  clusterKeys: string[];
  defaultKey: string;
  health: () => CollectorHealth[];
}

type Lookup =
  | { kind: "unknown" }
  | { kind: "pending" }
  | { kind: "ok"; snapshot: PublishedSnapshot };

// ---------------------------------------------------------------------------
// Mount read-path routes
// ---------------------------------------------------------------------------

export function mountApiRoutes(app: Hono, deps: ApiDeps): void {
  const known = new Set(deps.clusterKeys);

  function lookup(key: string): Lookup {
    if (!known.has(key)) return { kind: "unknown" };
    const snapshot = deps.store.read(key);
    return snapshot ? { kind: "ok", snapshot } : { kind: "pending" };
  }

  // Never-published clusters answer 503 so clients can tell "no data" from "stale data"
  function withSnapshot(c: Context, key: string, render: (s: PublishedSnapshot) => Response): Response {
    const found = lookup(key);
    if (found.kind === "unknown") return c.json({ error: "unknown cluster" }, 404);
    if (found.kind === "pending") return c.json({ error: "no data yet", status: "pending" }, 503);
    return render(found.snapshot);
  }

  const status = (c: Context, key: string) => withSnapshot(c, key, (s) => c.json({ data: s.status }));
  const cluster = (c: Context, key: string) => withSnapshot(c, key, (s) => c.json({ data: [s.cluster] }));
  const applications = (c: Context, key: string) =>
    withSnapshot(c, key, (s) => c.json({ data: s.applications }));
  const application = (c: Context, key: string, appId: string) =>
    withSnapshot(c, key, (s) => {
      const app = s.applications.find((a) => a.id === appId);
      if (!app) return c.json({ error: "unknown application" }, 404);
      return c.json({ data: [{ ...app, memoryPerVCore: memoryPerVCore(app) }] });
    });

  // --------------------------------------------------------------------------
  // GET /api/health: collector streaks per cluster
  // --------------------------------------------------------------------------
  app.get("/api/health", (c) => c.json({ ok: true, clusters: deps.health() }));

  // --------------------------------------------------------------------------
  // GET /api/clusters: configured keys with their last status
  // --------------------------------------------------------------------------
  app.get("/api/clusters", (c) =>
    c.json({
      default: deps.defaultKey,
      clusters: deps.clusterKeys.map((key) => ({ key, status: deps.store.readStatus(key) })),
    })
  );

  // --------------------------------------------------------------------------
  // GET /api/events: SSE stream of published statuses
  // --------------------------------------------------------------------------
  app.get("/api/events", (c) => {
    const { readable, client } = deps.relay.open();

    // Send current state immediately so dashboards populate on connect
    for (const key of deps.clusterKeys) {
      const current = deps.store.readStatus(key);
      if (current) {
        const event: StatusEvent = { key, ...current };
        client.send(JSON.stringify(event));
      }
    }

    c.req.raw.signal.addEventListener("abort", () => {
      deps.relay.remove(client);
      client.close();
    });

    return new Response(readable, { headers: SSE_HEADERS });
  });

  // --------------------------------------------------------------------------
  // Default cluster at the root paths
  // --------------------------------------------------------------------------
  app.get("/api/status", (c) => status(c, deps.defaultKey));
  app.get("/api/cluster", (c) => cluster(c, deps.defaultKey));
  app.get("/api/applications", (c) => applications(c, deps.defaultKey));
  app.get("/api/applications/:appId", (c) => application(c, deps.defaultKey, c.req.param("appId")));

  // --------------------------------------------------------------------------
  // Per-cluster paths under /api/:key
  // --------------------------------------------------------------------------
  app.get("/api/:key/status", (c) => status(c, c.req.param("key")));
  app.get("/api/:key/cluster", (c) => cluster(c, c.req.param("key")));
  app.get("/api/:key/applications", (c) => applications(c, c.req.param("key")));
  app.get("/api/:key/applications/:appId", (c) =>
    application(c, c.req.param("key"), c.req.param("appId"))
  );
}
