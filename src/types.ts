// ---------------------------------------------------------------------------
// Cluster configuration
// ---------------------------------------------------------------------------

export interface ClusterConfig {
  key: string;                  // store namespace + API path segment
  rmUrls: string[];             // candidate RM base URLs, tried in order
  pollIntervalMs: number;
  redirectHopLimit: number;
  requestTimeoutMs: number;
  applicationStates: string[];  // YARN states listed per poll
  enrichApplications: boolean;  // query Spark / MapReduce tracking UIs
}

export interface RmResolutionState {
  lastKnownActive: string | null;
}

// ---------------------------------------------------------------------------
// Canonical snapshot types
// ---------------------------------------------------------------------------

export interface ClusterMetrics {
  totalNodes: number;
  activeNodes: number;
  unhealthyNodes: number;
  lostNodes: number;
  decommissionedNodes: number;
  totalVirtualCores: number;
  availableVirtualCores: number;
  totalMB: number;
  availableMB: number;
  appsRunning: number;
  appsPending: number;
  containersAllocated: number;
}

export interface ClusterStatus {
  refresh_datetime: string;     // ISO-8601, time of publish
  current_rm: string;           // RM base URL that served this cycle
}

export type ClusterSnapshot = ClusterMetrics & ClusterStatus;

export interface ProgressStage {
  name: string;
  completed: number;
  running: number;
  failed: number;
  total: number;
}

export interface ApplicationRecord {
  id: string;
  name: string;
  user: string;
  state: string;
  applicationType: string;
  queue: string;
  startedTime: string | null;   // ISO-8601
  allocatedVCores: number;
  allocatedMB: number;
  vcoreSeconds: number;
  memorySeconds: number;
  trackingUrl: string;
  job: string | null;
  progress: ProgressStage[];
}

export interface PublishedSnapshot {
  cluster: ClusterSnapshot;
  applications: ApplicationRecord[];
  status: ClusterStatus;
}

// ---------------------------------------------------------------------------
// Collector health
// ---------------------------------------------------------------------------

export interface CollectorHealth {
  key: string;
  running: boolean;
  consecutiveFailures: number;
  failingSince: string | null;
  lastError: string | null;
  lastAttemptAt: string | null;
  lastSuccessAt: string | null;
  lastKnownActive: string | null;
}
