import type Database from "better-sqlite3";
import { CacheError } from "../collector/errors.js";
import type { ClusterStatus, PublishedSnapshot } from "../types.js";

// ---------------------------------------------------------------------------
// Snapshot store: `<cluster_key>:cluster|applications|status`
// ---------------------------------------------------------------------------

export type SnapshotPart = "cluster" | "applications" | "status";

export const SNAPSHOT_PARTS: readonly SnapshotPart[] = ["cluster", "applications", "status"];

export function storeKey(clusterKey: string, part: SnapshotPart): string {
  return `${clusterKey}:${part}`;
}

export interface SnapshotStore {
  /** Replace all three parts for one cluster, or none of them. */
  publish(clusterKey: string, snapshot: PublishedSnapshot): void;
  read(clusterKey: string): PublishedSnapshot | null;
  readStatus(clusterKey: string): ClusterStatus | null;
  readValue(key: string): string | null;
  keys(): string[];
}

interface SnapshotRow {
  key: string;
  value: string;
}

export class SqliteSnapshotStore implements SnapshotStore {
  constructor(private readonly db: Database.Database) {}

  publish(clusterKey: string, snapshot: PublishedSnapshot): void {
    // Serialize everything before touching the table
    let rows: SnapshotRow[];
    try {
      rows = SNAPSHOT_PARTS.map((part) => ({
        key: storeKey(clusterKey, part),
        value: JSON.stringify(snapshot[part]),
      }));
    } catch (err) {
      throw new CacheError(`cannot serialize snapshot for ${clusterKey}`, { clusterKey, cause: err });
    }

    try {
      const upsert = this.db.prepare(
        `INSERT INTO snapshots (key, value, updated_at) VALUES (?, ?, ?)
         ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at`
      );
      const swap = this.db.transaction((entries: SnapshotRow[], now: number) => {
        for (const row of entries) upsert.run(row.key, row.value, now);
      });
      swap(rows, Date.now());
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new CacheError(`snapshot write for ${clusterKey} rejected: ${reason}`, { clusterKey, cause: err });
    }
  }

  read(clusterKey: string): PublishedSnapshot | null {
    const select = this.db.prepare<[string, string, string], SnapshotRow>(
      "SELECT key, value FROM snapshots WHERE key IN (?, ?, ?)"
    );
    const rows = this.db.transaction(() =>
      select.all(storeKey(clusterKey, "cluster"), storeKey(clusterKey, "applications"), storeKey(clusterKey, "status"))
    )();
    if (rows.length < SNAPSHOT_PARTS.length) return null;

    const byKey = new Map(rows.map((r) => [r.key, r.value]));
    return {
      cluster: JSON.parse(byKey.get(storeKey(clusterKey, "cluster")) ?? "null"),
      applications: JSON.parse(byKey.get(storeKey(clusterKey, "applications")) ?? "[]"),
      status: JSON.parse(byKey.get(storeKey(clusterKey, "status")) ?? "null"),
    };
  }

  readStatus(clusterKey: string): ClusterStatus | null {
    const value = this.readValue(storeKey(clusterKey, "status"));
    return value === null ? null : JSON.parse(value);
  }

  readValue(key: string): string | null {
    const row = this.db
      .prepare<[string], Pick<SnapshotRow, "value">>("SELECT value FROM snapshots WHERE key = ?")
      .get(key);
    return row?.value ?? null;
  }

  keys(): string[] {
    const rows = this.db
      .prepare<[], Pick<SnapshotRow, "key">>("SELECT key FROM snapshots WHERE key LIKE '%:status' ORDER BY key")
      .all();
    return rows.map((r) => r.key.slice(0, -":status".length));
  }
}
