import type { ClusterConfig, RmResolutionState } from "../types.js";
import { ResolutionError, UpstreamError } from "./errors.js";
import type { ResolutionAttempt } from "./errors.js";
import {
  METRICS_PATH,
  baseUrlOf,
  canonicalBaseUrl,
  describeTransportError,
  discard,
  followRedirects,
} from "./yarn-api.js";
import type { FetchLike } from "./yarn-api.js";

export interface Resolution {
  url: string;
  hops: number;
}

export function createResolutionState(): RmResolutionState {
  return { lastKnownActive: null };
}

/** Last known active RM first, then the configured candidates in order, each RM once. */
export function candidateOrder(config: ClusterConfig, state: RmResolutionState): string[] {
  const ordered: string[] = [];
  for (const url of [state.lastKnownActive, ...config.rmUrls]) {
    if (url === null) continue;
    const base = canonicalBaseUrl(url);
    if (!ordered.includes(base)) ordered.push(base);
  }
  return ordered;
}

/**
 * Find the RM that currently answers the cluster metrics probe with a 2xx.
 * Standby RMs redirect to their peer; each candidate gets at most
 * `redirectHopLimit` hops before the next candidate is tried. The state is
 * only written on success.
 */
export async function resolve(
  config: ClusterConfig,
  state: RmResolutionState,
  fetchImpl?: FetchLike
): Promise<Resolution> {
  const attempts: ResolutionAttempt[] = [];

  for (const candidate of candidateOrder(config, state)) {
    try {
      const { response, url, hops } = await followRedirects(`${candidate}${METRICS_PATH}`, {
        timeoutMs: config.requestTimeoutMs,
        hopLimit: config.redirectHopLimit,
        fetch: fetchImpl,
      });
      await discard(response);

      if (response.ok) {
        const active = baseUrlOf(url);
        if (active !== state.lastKnownActive) {
          console.log(
            `[resolver:${config.key}] active RM ${state.lastKnownActive ?? "(none)"} -> ${active}`
          );
        }
        state.lastKnownActive = active;
        return { url: active, hops };
      }
      attempts.push({ candidate, hops, reason: `HTTP ${response.status} from ${url}` });
    } catch (err) {
      if (err instanceof UpstreamError) {
        attempts.push({ candidate, hops: config.redirectHopLimit, reason: err.message });
      } else {
        attempts.push({
          candidate,
          hops: 0,
          reason: describeTransportError(err, config.requestTimeoutMs),
        });
      }
    }
  }

  throw new ResolutionError(attempts, { clusterKey: config.key });
}

// ---------------------------------------------------------------------------
// Per-cluster resolver: owns the cluster's resolution state
// ---------------------------------------------------------------------------

export class RmResolver {
  private readonly state: RmResolutionState = createResolutionState();

  constructor(
    private readonly config: ClusterConfig,
    private readonly fetchImpl?: FetchLike
  ) {}

  get lastKnownActive(): string | null {
    return this.state.lastKnownActive;
  }

  resolve(): Promise<Resolution> {
    return resolve(this.config, this.state, this.fetchImpl);
  }
}
