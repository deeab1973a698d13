import pLimit from "p-limit";
import { z } from "zod/v4";
import type { ApplicationRecord, ProgressStage } from "../types.js";
import { describeError } from "./errors.js";
import { clampProgress, emptyStage, toCount } from "./normalize.js";
import { getJson } from "./yarn-api.js";
import type { FetchLike } from "./yarn-api.js";

// ---------------------------------------------------------------------------
// Application handlers: per-framework progress from the tracking UI
// ---------------------------------------------------------------------------

export interface HandlerContext {
  clusterKey: string;
  timeoutMs: number;
  hopLimit: number;
  fetch?: FetchLike;
  concurrency?: number;
}

export type ApplicationHandler = (
  app: ApplicationRecord,
  ctx: HandlerContext
) => Promise<ApplicationRecord>;

export const NON_RESPONSIVE = "NON_RESPONSIVE";

/** Tracking-UI requests in flight at once per cycle. */
export const ENRICH_CONCURRENCY = 16;

/**
 * Base of the application's tracking UI, or null while YARN has not assigned
 * one yet. A tracking URL that is set but unusable is a handler failure.
 */
function trackingBase(app: ApplicationRecord): string | null {
  if (app.trackingUrl.trim() === "") return null;
  if (!URL.canParse(app.trackingUrl)) {
    throw new Error(`unparseable tracking URL: ${app.trackingUrl}`);
  }
  const u = new URL(app.trackingUrl);
  if (u.protocol !== "http:" && u.protocol !== "https:") {
    throw new Error(`unsupported tracking URL scheme: ${u.protocol}`);
  }
  return u.toString().replace(/\/+$/, "");
}

async function getTracked(app: ApplicationRecord, url: string, ctx: HandlerContext): Promise<unknown> {
  const { body } = await getJson(url, {
    timeoutMs: ctx.timeoutMs,
    hopLimit: ctx.hopLimit,
    fetch: ctx.fetch,
    // Secured YARN web proxies ask for a click-through first; preset its cookie
    headers: { Cookie: `checked_${app.id}=true` },
  });
  return body;
}

const counter = z.number().catch(0).transform(toCount);

function sumStage(name: string, items: ProgressStage[]): ProgressStage {
  return items.reduce(
    (acc, s) => ({
      name,
      completed: acc.completed + s.completed,
      running: acc.running + s.running,
      failed: acc.failed + s.failed,
      total: acc.total + s.total,
    }),
    emptyStage(name)
  );
}

// ---------------------------------------------------------------------------
// Spark: /api/v1/applications/<id>/jobs
// ---------------------------------------------------------------------------

const sparkJobsSchema = z.array(
  z.object({
    jobId: z.number().int(),
    status: z.string().catch(""),
    numTasks: counter,
    numActiveTasks: counter,
    numCompletedTasks: counter,
    numFailedTasks: counter,
  })
);

export const enrichSpark: ApplicationHandler = async (app, ctx) => {
  const base = trackingBase(app);
  if (!base) return app;

  const jobs = sparkJobsSchema.parse(
    await getTracked(app, `${base}/api/v1/applications/${encodeURIComponent(app.id)}/jobs`, ctx)
  );
  const toStage = (j: (typeof jobs)[number]): ProgressStage => ({
    name: "",
    completed: j.numCompletedTasks,
    running: j.numActiveTasks,
    failed: j.numFailedTasks,
    total: j.numTasks,
  });

  const running = jobs.filter((j) => j.status.toUpperCase() === "RUNNING");
  const latest = (list: typeof jobs) =>
    list.length > 0 ? String(Math.max(...list.map((j) => j.jobId))) : null;

  return {
    ...app,
    state: running.length > 0 ? "RUNNING" : "IDLE",
    job: latest(running) ?? latest(jobs),
    progress: [
      clampProgress(sumStage("Running Tasks", running.map(toStage))),
      clampProgress(sumStage("Total", jobs.map(toStage))),
    ],
  };
};

// ---------------------------------------------------------------------------
// MapReduce: /ws/v1/mapreduce/jobs on the application master
// ---------------------------------------------------------------------------

const mapReduceJobsSchema = z.object({
  jobs: z
    .object({
      job: z
        .array(
          z.object({
            id: z.string().catch(""),
            mapsTotal: counter,
            mapsCompleted: counter,
            mapsRunning: counter,
            failedMapAttempts: counter,
            reducesTotal: counter,
            reducesCompleted: counter,
            reducesRunning: counter,
            failedReduceAttempts: counter,
          })
        )
        .catch([]),
    })
    .nullable()
    .catch(null),
});

export const enrichMapReduce: ApplicationHandler = async (app, ctx) => {
  const base = trackingBase(app);
  if (!base) return app;

  const payload = mapReduceJobsSchema.parse(await getTracked(app, `${base}/ws/v1/mapreduce/jobs`, ctx));
  const jobs = payload.jobs?.job ?? [];
  if (jobs.length === 0) return app;

  const maps = jobs.map((j) => ({
    name: "Map",
    completed: j.mapsCompleted,
    running: j.mapsRunning,
    failed: j.failedMapAttempts,
    total: j.mapsTotal,
  }));
  const reduces = jobs.map((j) => ({
    name: "Reduces",
    completed: j.reducesCompleted,
    running: j.reducesRunning,
    failed: j.failedReduceAttempts,
    total: j.reducesTotal,
  }));

  return {
    ...app,
    job: jobs[jobs.length - 1]?.id || app.job,
    progress: [clampProgress(sumStage("Map", maps)), clampProgress(sumStage("Reduces", reduces))],
  };
};

export const defaultHandlers: Readonly<Record<string, ApplicationHandler>> = {
  SPARK: enrichSpark,
  MAPREDUCE: enrichMapReduce,
  MAPRED: enrichMapReduce,
};

/**
 * Run the matching handler for every application, at most
 * `ctx.concurrency` at a time. A handler failure degrades only its own
 * record to the plain YARN view.
 */
export async function enrichApplications(
  apps: ApplicationRecord[],
  ctx: HandlerContext,
  handlers: Readonly<Record<string, ApplicationHandler>> = defaultHandlers
): Promise<ApplicationRecord[]> {
  const limit = pLimit(ctx.concurrency ?? ENRICH_CONCURRENCY);
  return Promise.all(
    apps.map((app) => {
      const handler = handlers[app.applicationType.toUpperCase()];
      if (!handler) return app;
      return limit(async () => {
        try {
          return await handler(app, ctx);
        } catch (err) {
          console.warn(
            `[collector:${ctx.clusterKey}] ${app.applicationType} handler failed for ${app.id} (${app.name}): ${describeError(err)}`
          );
          return { ...app, state: NON_RESPONSIVE };
        }
      });
    })
  );
}
