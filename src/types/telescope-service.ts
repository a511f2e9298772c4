import type { EntryOrder, EntryScope } from "../db/query";
import type {
    CacheTally,
    HourBucket,
    OperationCount,
    PeakHour,
    Priority,
    Trend
} from "../services/aggregate";
import type { SessionDuration } from "../utils/time";
import type {
    ActivityRecord,
    CacheRecord,
    DecodedEntry,
    ExceptionGroupBy,
    ExceptionLevel,
    ExceptionRecord,
    JobRecord,
    JobStatus,
    RequestRecord,
    StoredEntry
} from "./telescope";

export type TableStatus =
    | {
          success: true;
          count: number;
          latestEntry: string | null;
          connection: string;
      }
    | { success: false; message: string; connection: string };

export type RequestStats = {
    total: number;
    successCount: number;
    errorCount: number;
    avgDuration: number;
    slowCount: number;
};

export type QueryStats = {
    total: number;
    avgTime: number;
    slowCount: number;
    mostExpensive: { sql: string; duration: number } | null;
};

export type JobStats = {
    total: number;
    processedCount: number;
    failedCount: number;
    avgTimeMs: number;
    failedJobs: string[];
};

export type ExceptionStats = {
    total: number;
    critical: number;
    warning: number;
    info: number;
    criticalClasses: string[];
};

export type KeyCount = { key: string; count: number };

export type ActivityStats = {
    totalRequests: number;
    uniqueIps: number;
    uniqueUsers: number;
    avgDuration: number;
    errorCount: number;
    firstActivity: string | null;
    lastActivity: string | null;
    topUris: KeyCount[];
};

/** One group of exceptions as counted by storage. */
export type StoredExceptionGroup = {
    key: string;
    count: number;
    firstOccurrence: string;
    latestOccurrence: string;
    worstLevel: ExceptionLevel;
    /** Occurrences in the most recent `recentHours`; null when not asked for. */
    recentCount: number | null;
    /** Member with the lowest sequence. */
    representative: StoredEntry | null;
};

export type ExceptionGroupOptions = {
    minCount?: number;
    limit?: number;
    recentHours?: number;
};

/** Read-only access to the entries table. */
export type EntriesRepo = {
    tableStatus: () => Promise<TableStatus>;
    list: (
        scope: EntryScope,
        options: { limit: number; order?: EntryOrder }
    ) => Promise<StoredEntry[]>;
    requestStats: (hours: number, slowMs: number) => Promise<RequestStats>;
    requestHours: (hours: number) => Promise<HourBucket[]>;
    queryStats: (hours: number, slowMs: number) => Promise<QueryStats>;
    jobStats: (hours: number) => Promise<JobStats>;
    cacheOperationCounts: (hours: number) => Promise<OperationCount[]>;
    topCacheKeys: (hours: number, limit: number) => Promise<KeyCount[]>;
    exceptionStats: (hours: number) => Promise<ExceptionStats>;
    activityStats: (scope: EntryScope) => Promise<ActivityStats>;
    count: (scope: EntryScope) => Promise<number>;
    /** Busiest groups first, then most recent, then by key. */
    exceptionGroups: (
        scope: EntryScope,
        groupBy: ExceptionGroupBy,
        options?: ExceptionGroupOptions
    ) => Promise<StoredExceptionGroup[]>;
    /** Exact uuid, or uuid prefix when `prefix` is set; at most two rows. */
    findByUuid: (id: string, prefix: boolean) => Promise<StoredEntry[]>;
    batch: (batchId: string, limit: number) => Promise<StoredEntry[]>;
};

export type WindowNote = { hours: number; token: string | null; recognized: boolean };

export type RecentEntry = StoredEntry & { method: string | null; uri: string | null };

export type PerformanceFlag =
    | "high_error_rate"
    | "slow_responses"
    | "slow_queries"
    | "low_cache_hit_rate"
    | "queue_failures"
    | "critical_exceptions";

export type PerformanceSummary = {
    hours: number;
    includeDetails: boolean;
    thresholds: { slowRequestMs: number; errorRatePct: number };
    requests: RequestStats & { successRate: number; errorRate: number; peak: PeakHour };
    database: QueryStats & { slowThresholdMs: number };
    queue: JobStats & { successRate: number; avgProcessingSeconds: number };
    cache: CacheTally & { mostAccessed: KeyCount | null };
    errors: ExceptionStats;
    flags: PerformanceFlag[];
};

export type ExceptionReport =
    | {
          mode: "list";
          window: WindowNote | null;
          level: string | null;
          exceptions: ExceptionRecord[];
      }
    | {
          mode: "grouped";
          window: WindowNote | null;
          level: string | null;
          groupBy: ExceptionGroupBy;
          groups: ExceptionGroup[];
          total: number;
      };

export type JobReport = {
    hours: number;
    status: string | null;
    queue: string | null;
    jobs: JobRecord[];
    counts: Record<JobStatus, number>;
};

export type CacheSummary = CacheTally & {
    topKeys: KeyCount[];
    operations: OperationCount[];
};

export type CacheReport = {
    hours: number;
    operation: string | null;
    entries: CacheRecord[];
    summary: CacheSummary | null;
};

export type UserActivityReport = {
    hours: number;
    userId: string | null;
    includeAnonymous: boolean;
    suspiciousOnly: boolean;
    activities: ActivityRecord[];
    stats: ActivityStats & { errorRate: number };
    session: SessionDuration | null;
};

export type ExceptionDetail = {
    exception: ExceptionRecord;
    request: RequestRecord | null;
    related: DecodedEntry[] | null;
    includeContext: boolean;
};

export type ExceptionGroup = Omit<StoredExceptionGroup, "recentCount" | "representative"> & {
    /** Null when the stored payload is not a JSON object. */
    representative: ExceptionRecord | null;
};

export type ExceptionPattern = ExceptionGroup & { trend: Trend; priority: Priority };

export type PatternReport = {
    window: WindowNote;
    groupBy: ExceptionGroupBy;
    minOccurrences: number;
    patterns: ExceptionPattern[];
    totalExceptions: number;
};
