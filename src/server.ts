#!/usr/bin/env node
import { serve } from "@hono/node-server";
import { Hono } from "hono";
import { cors } from "hono/cors";
import { CollectorFleet } from "./collector/loop.js";
import { ConfigError, loadConfig } from "./config.js";
import type { AppConfig } from "./config.js";
import { mountApiRoutes } from "./hub/api.js";
import { closeDb, getDb } from "./hub/db.js";
import { StatusRelay } from "./hub/relay.js";
import { SqliteSnapshotStore } from "./hub/snapshot-store.js";

// ---------------------------------------------------------------------------
// Config
// ---------------------------------------------------------------------------

let config: AppConfig;
try {
  config = loadConfig();
} catch (err) {
  const reason = err instanceof ConfigError ? err.message : String(err);
  console.error(`[server] config error: ${reason}`);
  process.exit(1);
}

// ---------------------------------------------------------------------------
// Store + collectors
// ---------------------------------------------------------------------------

const store = new SqliteSnapshotStore(getDb(config.sqlitePath));
const relay = new StatusRelay();
const fleet = new CollectorFleet(config.clusters, {
  store,
  onPublish: (key, status) => relay.broadcast(key, status),
});

// ---------------------------------------------------------------------------
// Hono app
// ---------------------------------------------------------------------------

const app = new Hono();

app.use("*", cors());

mountApiRoutes(app, {
  store,
  relay,
  clusterKeys: fleet.keys(),
  defaultKey: config.defaultClusterKey,
  health: () => fleet.health(),
});

app.onError((err, c) => {
  console.error(`[api] ${c.req.method} ${c.req.path} failed:`, err);
  return c.json({ error: "internal error" }, 500);
});

app.notFound((c) => c.json({ error: "not found" }, 404));

// ---------------------------------------------------------------------------
// Start
// ---------------------------------------------------------------------------

fleet.start();

const server = serve({ fetch: app.fetch, port: config.port, hostname: "0.0.0.0" }, (info) => {
  console.log(
    `[server] listening on http://localhost:${info.port} clusters=${fleet.keys().join(",")} default=${config.defaultClusterKey}`
  );
});

// ---------------------------------------------------------------------------
// Graceful shutdown
// ---------------------------------------------------------------------------

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  console.log(`[server] received ${signal}, shutting down...`);

  await fleet.stop();
  server.close();
  closeDb();
  process.exit(0);
}

process.on("SIGINT", () => void shutdown("SIGINT"));
process.on("SIGTERM", () => void shutdown("SIGTERM"));
