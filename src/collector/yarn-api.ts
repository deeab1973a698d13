import { UpstreamError } from "./errors.js";

// ---------------------------------------------------------------------------
// HTTP plumbing shared by the resolver, the RM client and app handlers
// ---------------------------------------------------------------------------

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export const METRICS_PATH = "/ws/v1/cluster/metrics";
export const APPS_PATH = "/ws/v1/cluster/apps";

export interface RequestOptions {
  timeoutMs: number;
  hopLimit: number;
  fetch?: FetchLike;
  headers?: Record<string, string>;
}

export interface FollowResult {
  response: Response;
  url: string;   // URL that produced the final (non-redirect) response
  hops: number;  // redirects followed to get there
}

function isRedirect(status: number): boolean {
  return status >= 300 && status < 400;
}

/** Base URL of the RM behind `url`: origin plus any prefix in front of `/ws/v1/`. */
export function baseUrlOf(url: string): string {
  const u = new URL(url);
  const idx = u.pathname.indexOf("/ws/v1/");
  const prefix = idx > 0 ? u.pathname.slice(0, idx) : "";
  return `${u.origin}${prefix}`.replace(/\/+$/, "");
}

/**
 * Canonical form of a configured RM base URL: origin (lower-case host, no
 * default port) plus its path, without trailing slashes. Matches what
 * `baseUrlOf` reports for the same RM.
 */
export function canonicalBaseUrl(url: string): string {
  const u = new URL(url);
  return `${u.origin}${u.pathname}`.replace(/\/+$/, "");
}

export function describeTransportError(err: unknown, timeoutMs: number): string {
  if (err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError")) {
    return `timeout after ${timeoutMs}ms`;
  }
  return err instanceof Error ? err.message : String(err);
}

export async function discard(res: Response): Promise<void> {
  await res.body?.cancel().catch((err: unknown) => {
    console.warn("[http] failed to release response body:", err instanceof Error ? err.message : err);
  });
}

/**
 * GET `url`, following 3xx responses by hand so every hop is counted. Throws
 * `UpstreamError` once `hopLimit` redirects have been followed and the next
 * response is still a redirect. Transport errors propagate untouched.
 */
export async function followRedirects(url: string, opts: RequestOptions): Promise<FollowResult> {
  const doFetch = opts.fetch ?? fetch;
  let current = url;
  let hops = 0;

  for (;;) {
    const response = await doFetch(current, {
      method: "GET",
      redirect: "manual",
      headers: { Accept: "application/json", ...opts.headers },
      signal: AbortSignal.timeout(opts.timeoutMs),
    });

    const location = response.headers.get("location");
    if (!isRedirect(response.status) || !location) {
      return { response, url: current, hops };
    }

    await discard(response);
    if (hops >= opts.hopLimit) {
      throw new UpstreamError(`redirect limit (${opts.hopLimit}) exhausted at ${current}`, {
        url: current,
        status: response.status,
      });
    }
    current = new URL(location, current).toString();
    hops += 1;
  }
}

export interface JsonResponse {
  body: unknown;
  servedBy: string;
  status: number;
}

export async function getJson(url: string, opts: RequestOptions): Promise<JsonResponse> {
  let result: FollowResult;
  try {
    result = await followRedirects(url, opts);
  } catch (err) {
    if (err instanceof UpstreamError) throw err;
    throw new UpstreamError(`GET ${url} failed: ${describeTransportError(err, opts.timeoutMs)}`, {
      url,
      cause: err,
    });
  }

  const { response } = result;
  if (!response.ok) {
    await discard(response);
    throw new UpstreamError(`GET ${result.url} returned HTTP ${response.status}`, {
      url: result.url,
      status: response.status,
    });
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch (err) {
    throw new UpstreamError(`GET ${result.url} returned a non-JSON body`, {
      url: result.url,
      status: response.status,
      cause: err,
    });
  }

  return { body, servedBy: baseUrlOf(result.url), status: response.status };
}

// ---------------------------------------------------------------------------
// ResourceManager REST client
// ---------------------------------------------------------------------------

export class YarnApi {
  constructor(
    readonly baseUrl: string,
    private readonly opts: RequestOptions
  ) {}

  clusterMetrics(): Promise<JsonResponse> {
    return getJson(`${this.baseUrl}${METRICS_PATH}`, this.opts);
  }

  clusterApplications(states: string[]): Promise<JsonResponse> {
    const query = states.length > 0 ? `?states=${encodeURIComponent(states.join(","))}` : "";
    return getJson(`${this.baseUrl}${APPS_PATH}${query}`, this.opts);
  }
}
