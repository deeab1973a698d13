import type { SnapshotStore } from "../hub/snapshot-store.js";
import type {
  ApplicationRecord,
  ClusterConfig,
  ClusterStatus,
  CollectorHealth,
  PublishedSnapshot,
} from "../types.js";
import { CacheError, UpstreamError, describeError, isCollectorError } from "./errors.js";
import type { CollectorError } from "./errors.js";
import { defaultHandlers, enrichApplications } from "./handlers.js";
import type { ApplicationHandler } from "./handlers.js";
import { normalizeApplications, normalizeClusterMetrics } from "./normalize.js";
import { RmResolver } from "./resolver.js";
import { YarnApi } from "./yarn-api.js";
import type { FetchLike } from "./yarn-api.js";

/** Streak length at which failures are logged as an outage rather than a blip. */
export const FAILURE_STREAK_ESCALATION = 3;

export type CycleOutcome =
  | { ok: true; snapshot: PublishedSnapshot }
  | { ok: false; error: CollectorError };

export interface CollectorOptions {
  store: SnapshotStore;
  fetch?: FetchLike;
  handlers?: Readonly<Record<string, ApplicationHandler>>;
  now?: () => Date;
  onPublish?: (key: string, status: ClusterStatus) => void;
}

/**
 * Fixed-interval schedule anchored at `anchor`: tick n is due at
 * `anchor + n * interval`. Returns the first tick after `current` that is
 * strictly in the future; ticks missed by a slow cycle are skipped.
 */
export function nextTick(
  anchor: number,
  current: number,
  interval: number,
  now: number
): { tick: number; delay: number } {
  const elapsed = now - anchor;
  const tick = Math.max(current + 1, Math.floor(elapsed / interval) + 1);
  return { tick, delay: Math.max(0, anchor + tick * interval - now) };
}

// ---------------------------------------------------------------------------
// ClusterCollector: one cluster's poll cycle and schedule
// ---------------------------------------------------------------------------

export class ClusterCollector {
  readonly resolver: RmResolver;
  private readonly now: () => Date;
  private readonly tag: string;

  private running = false;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private inFlight: Promise<CycleOutcome> | null = null;
  private anchor = 0;
  private tick = 0;

  private consecutiveFailures = 0;
  private failingSince: Date | null = null;
  private lastError: string | null = null;
  private lastAttemptAt: Date | null = null;
  private lastSuccessAt: Date | null = null;

  constructor(
    readonly config: ClusterConfig,
    private readonly opts: CollectorOptions
  ) {
    this.resolver = new RmResolver(config, opts.fetch);
    this.now = opts.now ?? (() => new Date());
    this.tag = `[collector:${config.key}]`;
  }

  // -------------------------------------------------------------------------
  // One cycle
  // -------------------------------------------------------------------------

  private async collect(): Promise<PublishedSnapshot> {
    const { config } = this;
    const { url } = await this.resolver.resolve();

    const requestOpts = {
      timeoutMs: config.requestTimeoutMs,
      hopLimit: config.redirectHopLimit,
      fetch: this.opts.fetch,
    };
    const api = new YarnApi(url, requestOpts);
    const [metricsRes, appsRes] = await Promise.all([
      api.clusterMetrics(),
      api.clusterApplications(config.applicationStates),
    ]);
    if (metricsRes.servedBy !== appsRes.servedBy) {
      throw new UpstreamError(
        `RM changed mid-cycle: metrics from ${metricsRes.servedBy}, applications from ${appsRes.servedBy}`,
        { url: appsRes.servedBy, clusterKey: config.key }
      );
    }

    const metrics = normalizeClusterMetrics(metricsRes.body);
    const { applications, dropped } = normalizeApplications(appsRes.body);
    for (const d of dropped) {
      console.warn(`${this.tag} dropped application #${d.index} (${d.id ?? "no id"}): ${d.issues.join(", ")}`);
    }

    let records: ApplicationRecord[] = applications;
    if (config.enrichApplications) {
      records = await enrichApplications(
        applications,
        { clusterKey: config.key, ...requestOpts },
        this.opts.handlers ?? defaultHandlers
      );
    }

    const status: ClusterStatus = {
      refresh_datetime: this.now().toISOString(),
      current_rm: metricsRes.servedBy,
    };
    return { cluster: { ...metrics, ...status }, applications: records, status };
  }

  private publish(snapshot: PublishedSnapshot): void {
    try {
      this.opts.store.publish(this.config.key, snapshot);
    } catch (err) {
      if (err instanceof CacheError) throw err;
      throw new CacheError(describeError(err), { clusterKey: this.config.key, cause: err });
    }
  }

  /** Run a single cycle. Never rejects: failures are logged and returned. */
  async runCycle(): Promise<CycleOutcome> {
    this.lastAttemptAt = this.now();
    try {
      const snapshot = await this.collect();
      this.publish(snapshot);
      this.recordSuccess(snapshot);
      this.opts.onPublish?.(this.config.key, snapshot.status);
      return { ok: true, snapshot };
    } catch (err) {
      const error = isCollectorError(err)
        ? err
        : new UpstreamError(describeError(err), { url: this.resolver.lastKnownActive ?? "", cause: err });
      this.recordFailure(error);
      return { ok: false, error };
    }
  }

  private recordSuccess(snapshot: PublishedSnapshot): void {
    if (this.consecutiveFailures > 0) {
      console.log(
        `${this.tag} recovered after ${this.consecutiveFailures} failed cycle(s) via ${snapshot.status.current_rm}`
      );
    }
    this.consecutiveFailures = 0;
    this.failingSince = null;
    this.lastError = null;
    this.lastSuccessAt = this.now();
  }

  private recordFailure(error: CollectorError): void {
    this.consecutiveFailures += 1;
    this.failingSince ??= this.lastAttemptAt;
    this.lastError = describeError(error);

    if (this.consecutiveFailures >= FAILURE_STREAK_ESCALATION) {
      console.error(
        `${this.tag} ${this.consecutiveFailures} consecutive failed cycles since ${this.failingSince?.toISOString()}: ${this.lastError}`
      );
    } else {
      console.warn(`${this.tag} cycle failed (${error.kind}): ${this.lastError}`);
    }
  }

  // -------------------------------------------------------------------------
  // Fixed-interval scheduling
  // -------------------------------------------------------------------------

  start(): void {
    if (this.running) return;
    this.running = true;
    this.anchor = Date.now();
    this.tick = 0;
    console.log(
      `${this.tag} polling ${this.config.rmUrls.join(", ")} every ${this.config.pollIntervalMs}ms`
    );
    this.schedule(0);
  }

  private schedule(delay: number): void {
    if (!this.running) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.inFlight = this.runCycle();
      this.inFlight
        .then(() => {
          this.inFlight = null;
          this.schedule(this.delayUntilNextTick());
        })
        .catch((err) => {
          console.error(`${this.tag} scheduler error:`, err);
        });
    }, delay);
  }

  private delayUntilNextTick(): number {
    const next = nextTick(this.anchor, this.tick, this.config.pollIntervalMs, Date.now());
    this.tick = next.tick;
    return next.delay;
  }

  /** Stop scheduling; resolves once an in-flight cycle has settled. */
  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.inFlight) await this.inFlight;
  }

  health(): CollectorHealth {
    const iso = (d: Date | null) => (d ? d.toISOString() : null);
    return {
      key: this.config.key,
      running: this.running,
      consecutiveFailures: this.consecutiveFailures,
      failingSince: iso(this.failingSince),
      lastError: this.lastError,
      lastAttemptAt: iso(this.lastAttemptAt),
      lastSuccessAt: iso(this.lastSuccessAt),
      lastKnownActive: this.resolver.lastKnownActive,
    };
  }
}

// ---------------------------------------------------------------------------
// CollectorFleet: one independent collector per configured cluster
// ---------------------------------------------------------------------------

export class CollectorFleet {
  private readonly collectors = new Map<string, ClusterCollector>();

  constructor(clusters: ClusterConfig[], opts: CollectorOptions) {
    for (const config of clusters) {
      this.collectors.set(config.key, new ClusterCollector(config, opts));
    }
  }

  get(key: string): ClusterCollector | undefined {
    return this.collectors.get(key);
  }

  keys(): string[] {
    return Array.from(this.collectors.keys());
  }

  start(): void {
    for (const collector of this.collectors.values()) collector.start();
  }

  async stop(): Promise<void> {
    await Promise.all(Array.from(this.collectors.values(), (c) => c.stop()));
  }

  health(): CollectorHealth[] {
    return Array.from(this.collectors.values(), (c) => c.health());
  }
}
