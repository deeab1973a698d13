// ---------------------------------------------------------------------------
// Collector error taxonomy: every kind is recovered inside a single cycle
// ---------------------------------------------------------------------------

export type CollectorErrorKind = "resolution" | "upstream" | "normalization" | "cache";

export abstract class CollectorError extends Error {
  abstract readonly kind: CollectorErrorKind;
  readonly clusterKey: string | null;

  constructor(message: string, opts: { clusterKey?: string; cause?: unknown } = {}) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.clusterKey = opts.clusterKey ?? null;
  }
}

export interface ResolutionAttempt {
  candidate: string;
  hops: number;
  reason: string;
}

/** No candidate RM answered with a 2xx, including after following redirects. */
export class ResolutionError extends CollectorError {
  readonly kind = "resolution";
  readonly attempts: ResolutionAttempt[];

  constructor(attempts: ResolutionAttempt[], opts: { clusterKey?: string } = {}) {
    const summary = attempts.map((a) => `${a.candidate} (${a.reason})`).join("; ");
    super(`no active RM found: ${summary || "no candidates"}`, opts);
    this.name = "ResolutionError";
    this.attempts = attempts;
  }
}

export class UpstreamError extends CollectorError {
  readonly kind = "upstream";
  readonly url: string;
  readonly status: number | null;

  constructor(
    message: string,
    input: { url: string; status?: number | null; clusterKey?: string; cause?: unknown }
  ) {
    super(message, input);
    this.name = "UpstreamError";
    this.url = input.url;
    this.status = input.status ?? null;
  }
}

export class NormalizationError extends CollectorError {
  readonly kind = "normalization";
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join(", ")}` : message);
    this.name = "NormalizationError";
    this.issues = issues;
  }
}

export class CacheError extends CollectorError {
  readonly kind = "cache";

  constructor(message: string, opts: { clusterKey?: string; cause?: unknown } = {}) {
    super(message, opts);
    this.name = "CacheError";
  }
}

export function isCollectorError(err: unknown): err is CollectorError {
  return err instanceof CollectorError;
}

export function describeError(err: unknown): string {
  if (err instanceof CollectorError) return `${err.name}: ${err.message}`;
  if (err instanceof Error) return err.message;
  return String(err);
}
