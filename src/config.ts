import { z } from "zod/v4";
import { canonicalBaseUrl } from "./collector/yarn-api.js";
import type { ClusterConfig } from "./types.js";

// ---------------------------------------------------------------------------
// Config: environment variables
//
//   YARN_CLUSTERS            JSON array of cluster entries (see clusterSchema)
//   YARN_ENDPOINT            single-cluster shorthand: comma-separated RM hosts
//   YARN_CLUSTER_KEY         key for the shorthand cluster (default "default")
//   YARN_POLL_SLEEP          shorthand poll interval in seconds
//   YARN_POLL_INTERVAL_MS    default poll interval (5000)
//   YARN_REDIRECT_HOP_LIMIT  default redirect hop limit (3)
//   YARN_REQUEST_TIMEOUT_MS  default per-request timeout (10000)
//   YARN_DEFAULT_CLUSTER     key served at the root API paths
//   SQLITE_PATH              snapshot database file
//   PORT                     HTTP port (3000)
// ---------------------------------------------------------------------------

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export interface AppConfig {
  clusters: ClusterConfig[];
  defaultClusterKey: string;
  sqlitePath: string;
  port: number;
}

const CLUSTER_KEY = /^[A-Za-z0-9._-]+$/;

// Path segments the API serves for the default cluster under /api/
export const RESERVED_CLUSTER_KEYS: readonly string[] = [
  "applications",
  "cluster",
  "clusters",
  "events",
  "health",
  "status",
  ".",
  "..",
];

/** `rm1:8088` → `http://rm1:8088`; `HTTP://RM1:80/` → `http://rm1`. */
export function normalizeRmUrl(value: string): string {
  const trimmed = value.trim().replace(/\/+$/, "");
  const withScheme = /^https?:\/\//i.test(trimmed) ? trimmed : `http://${trimmed}`;
  return URL.canParse(withScheme) ? canonicalBaseUrl(withScheme) : withScheme;
}

const rmUrl = z
  .string()
  .trim()
  .min(1)
  .transform(normalizeRmUrl)
  .refine((v) => URL.canParse(v), { message: "not a valid URL" });

const positiveInt = z.coerce.number().int().positive();

const envSchema = z.object({
  YARN_CLUSTERS: z.string().trim().min(1).optional(),
  YARN_ENDPOINT: z.string().trim().min(1).optional(),
  YARN_CLUSTER_KEY: z.string().trim().min(1).default("default"),
  YARN_POLL_SLEEP: positiveInt.optional(),
  YARN_POLL_INTERVAL_MS: positiveInt.default(5000),
  YARN_REDIRECT_HOP_LIMIT: z.coerce.number().int().min(0).default(3),
  YARN_REQUEST_TIMEOUT_MS: positiveInt.default(10_000),
  YARN_DEFAULT_CLUSTER: z.string().trim().min(1).optional(),
  SQLITE_PATH: z.string().trim().min(1).default("./yarn-fleet-monitor.sqlite"),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
});

type Env = z.infer<typeof envSchema>;

function clusterSchema(env: Env) {
  return z.object({
    key: z
      .string()
      .trim()
      .regex(CLUSTER_KEY, { message: "must match [A-Za-z0-9._-]+" })
      .refine((k) => !RESERVED_CLUSTER_KEYS.includes(k), { message: "is reserved by the HTTP API" }),
    rmUrls: z.array(rmUrl).min(1),
    pollIntervalMs: positiveInt.default(env.YARN_POLL_INTERVAL_MS),
    redirectHopLimit: z.coerce.number().int().min(0).default(env.YARN_REDIRECT_HOP_LIMIT),
    requestTimeoutMs: positiveInt.default(env.YARN_REQUEST_TIMEOUT_MS),
    applicationStates: z.array(z.string().trim().min(1)).default(["RUNNING"]),
    enrichApplications: z.boolean().default(true),
  });
}

function describeIssues(error: z.ZodError, prefix: string): string {
  return error.issues
    .map((i) => `${[prefix, ...i.path.map(String)].filter(Boolean).join(".")}: ${i.message}`)
    .join("; ");
}

function parseJson(text: string, name: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`${name} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
}

export function loadConfig(source: Record<string, string | undefined> = process.env): AppConfig {
  // Empty strings count as unset
  const cleaned = Object.fromEntries(Object.entries(source).filter(([, v]) => v !== undefined && v.trim() !== ""));
  const envResult = envSchema.safeParse(cleaned);
  if (!envResult.success) throw new ConfigError(describeIssues(envResult.error, ""));
  const env = envResult.data;

  let rawClusters: unknown;
  if (env.YARN_CLUSTERS) {
    rawClusters = parseJson(env.YARN_CLUSTERS, "YARN_CLUSTERS");
  } else if (env.YARN_ENDPOINT) {
    rawClusters = [
      {
        key: env.YARN_CLUSTER_KEY,
        rmUrls: env.YARN_ENDPOINT.split(",").filter((s) => s.trim() !== ""),
        ...(env.YARN_POLL_SLEEP ? { pollIntervalMs: env.YARN_POLL_SLEEP * 1000 } : {}),
      },
    ];
  } else {
    throw new ConfigError("set YARN_CLUSTERS or YARN_ENDPOINT");
  }

  const clustersResult = z.array(clusterSchema(env)).min(1).safeParse(rawClusters);
  if (!clustersResult.success) {
    throw new ConfigError(describeIssues(clustersResult.error, "YARN_CLUSTERS"));
  }
  const clusters: ClusterConfig[] = clustersResult.data;

  const seen = new Set<string>();
  for (const c of clusters) {
    if (seen.has(c.key)) throw new ConfigError(`duplicate cluster key: ${c.key}`);
    seen.add(c.key);
  }

  const defaultClusterKey = env.YARN_DEFAULT_CLUSTER ?? clusters[0]?.key;
  if (!defaultClusterKey || !seen.has(defaultClusterKey)) {
    throw new ConfigError(`YARN_DEFAULT_CLUSTER names an unknown cluster: ${defaultClusterKey}`);
  }

  return { clusters, defaultClusterKey, sqlitePath: env.SQLITE_PATH, port: env.PORT };
}
