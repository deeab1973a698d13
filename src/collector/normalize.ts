import { z } from "zod/v4";
import type { ApplicationRecord, ClusterMetrics, ProgressStage } from "../types.js";
import { NormalizationError } from "./errors.js";

// ---------------------------------------------------------------------------
// Field helpers
// ---------------------------------------------------------------------------

/** Non-negative integer; anything else becomes 0. */
export function toCount(value: number): number {
  if (!Number.isFinite(value) || value <= 0) return 0;
  return Math.trunc(value);
}

function toInstant(epochMs: number): string | null {
  if (!Number.isFinite(epochMs) || epochMs <= 0) return null;
  const d = new Date(epochMs);
  return Number.isNaN(d.getTime()) ? null : d.toISOString();
}

interface IssueSource {
  issues: ReadonlyArray<{ path: ReadonlyArray<PropertyKey>; message: string }>;
}

function formatIssues(error: IssueSource): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.map(String).join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

const count = z.number().transform(toCount);
const optionalCount = z.number().catch(0).transform(toCount);
const text = z.string().catch("");

// ---------------------------------------------------------------------------
// Cluster metrics
// ---------------------------------------------------------------------------

const clusterMetricsSchema = z.object({
  clusterMetrics: z.object({
    totalNodes: count,
    activeNodes: count,
    totalVirtualCores: count,
    availableVirtualCores: count,
    totalMB: count,
    availableMB: count,
    unhealthyNodes: optionalCount,
    lostNodes: optionalCount,
    decommissionedNodes: optionalCount,
    appsRunning: optionalCount,
    appsPending: optionalCount,
    containersAllocated: optionalCount,
  }),
});

export function normalizeClusterMetrics(raw: unknown): ClusterMetrics {
  const parsed = clusterMetricsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new NormalizationError("unexpected cluster metrics payload", formatIssues(parsed.error));
  }
  return parsed.data.clusterMetrics;
}

// ---------------------------------------------------------------------------
// Progress
// ---------------------------------------------------------------------------

/** Counters that outran the reported total stretch the total to their sum. */
export function clampProgress(stage: ProgressStage): ProgressStage {
  const completed = toCount(stage.completed);
  const running = toCount(stage.running);
  const failed = toCount(stage.failed);
  const sum = completed + running + failed;
  return { name: stage.name, completed, running, failed, total: Math.max(toCount(stage.total), sum) };
}

export function emptyStage(name: string): ProgressStage {
  return { name, completed: 0, running: 0, failed: 0, total: 0 };
}

function yarnProgress(percent: number): ProgressStage {
  const completed = Math.floor(Math.min(100, Math.max(0, percent)));
  return { name: "yarn-progress", completed, running: 0, failed: 0, total: 100 };
}

// ---------------------------------------------------------------------------
// Applications
// ---------------------------------------------------------------------------

const appsEnvelopeSchema = z.object({
  apps: z.union([z.null(), z.object({ app: z.array(z.unknown()).optional() })]),
});

const applicationSchema = z.object({
  id: z.string().min(1),
  state: z.string().min(1),
  name: text,
  user: text,
  applicationType: text,
  queue: text,
  trackingUrl: text,
  startedTime: z.number().catch(0),
  allocatedVCores: optionalCount,
  allocatedMB: optionalCount,
  vcoreSeconds: optionalCount,
  memorySeconds: optionalCount,
  progress: z.number().catch(0),
});

export interface DroppedApplication {
  index: number;
  id: string | null;
  issues: string[];
}

export interface NormalizedApplications {
  applications: ApplicationRecord[];
  dropped: DroppedApplication[];
}

function rawId(item: unknown): string | null {
  if (!item || typeof item !== "object" || !("id" in item)) return null;
  return typeof item.id === "string" ? item.id : null;
}

export type ApplicationParseResult =
  | { ok: true; record: ApplicationRecord }
  | { ok: false; issues: string[] };

export function normalizeApplication(raw: unknown): ApplicationParseResult {
  const parsed = applicationSchema.safeParse(raw);
  if (!parsed.success) return { ok: false, issues: formatIssues(parsed.error) };
  const app = parsed.data;
  const record: ApplicationRecord = {
    id: app.id,
    name: app.name,
    user: app.user,
    state: app.state,
    applicationType: app.applicationType,
    queue: app.queue,
    startedTime: toInstant(app.startedTime),
    allocatedVCores: app.allocatedVCores,
    allocatedMB: app.allocatedMB,
    vcoreSeconds: app.vcoreSeconds,
    memorySeconds: app.memorySeconds,
    trackingUrl: app.trackingUrl,
    job: null,
    progress: [clampProgress(yarnProgress(app.progress))],
  };
  return { ok: true, record };
}

/**
 * Map a `/ws/v1/cluster/apps` payload to canonical records. A bad envelope
 * fails the whole payload; a bad item is dropped on its own.
 */
export function normalizeApplications(raw: unknown): NormalizedApplications {
  const envelope = appsEnvelopeSchema.safeParse(raw);
  if (!envelope.success) {
    throw new NormalizationError("unexpected application list payload", formatIssues(envelope.error));
  }

  const items = envelope.data.apps?.app ?? [];
  const applications: ApplicationRecord[] = [];
  const dropped: DroppedApplication[] = [];
  const seen = new Set<string>();

  items.forEach((item, index) => {
    const result = normalizeApplication(item);
    if (!result.ok) {
      dropped.push({ index, id: rawId(item), issues: result.issues });
      return;
    }
    const { record } = result;
    if (seen.has(record.id)) {
      dropped.push({ index, id: record.id, issues: ["duplicate id"] });
      return;
    }
    seen.add(record.id);
    applications.push(record);
  });

  return { applications, dropped };
}

// ---------------------------------------------------------------------------
// Derived ratios for consumers
// ---------------------------------------------------------------------------

/** MB per allocated vcore, or null when no vcores are allocated. */
export function memoryPerVCore(app: Pick<ApplicationRecord, "allocatedMB" | "allocatedVCores">): number | null {
  if (app.allocatedVCores <= 0) return null;
  return app.allocatedMB / app.allocatedVCores;
}
