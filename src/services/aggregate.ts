import type {
    ActivityRecord,
    CacheOperation,
    ExceptionLevel,
    RequestRecord,
    SuspicionReason
} from "../types/telescope";
import { hourLabel } from "../utils/time";
import { rate } from "../utils/stats";
import { parseCacheOperation } from "./tags";

export type HourBucket = { hour: number; count: number };

export type PeakHour = { label: string; count: number };

/** Busiest hour of day; ties go to the earliest hour. */
export function peakHour(buckets: HourBucket[]): PeakHour {
    let best: HourBucket | null = null;
    for (const b of buckets) {
        if (
            !best ||
            b.count > best.count ||
            (b.count === best.count && b.hour < best.hour)
        ) {
            best = b;
        }
    }
    return best && best.count > 0
        ? { label: hourLabel(best.hour), count: best.count }
        : { label: "N/A", count: 0 };
}

export const SENSITIVE_PATHS = [
    "/admin",
    "/api/admin",
    "/dashboard/admin",
    "/user/delete",
    "/config"
] as const;

export const SLOW_RESPONSE_MS = 5000;

/** 4xx other than 404, which is ordinary link rot rather than probing. */
const isClientError = (status: number | null): boolean =>
    status !== null && status >= 400 && status < 500 && status !== 404;

export function suspicionReasons(request: RequestRecord): SuspicionReason[] {
    const reasons: SuspicionReason[] = [];
    if (isClientError(request.status)) {
        reasons.push("client_error");
    }
    if (SENSITIVE_PATHS.some((p) => request.uri.includes(p))) {
        reasons.push("sensitive_endpoint");
    }
    if (request.duration !== null && request.duration > SLOW_RESPONSE_MS) {
        reasons.push("slow_response");
    }
    return reasons;
}

export function classifyActivity(request: RequestRecord): ActivityRecord {
    const reasons = suspicionReasons(request);
    return { ...request, suspicious: reasons.length > 0, reasons };
}

/** Levels from least to most severe; the index is the severity rank. */
export const LEVELS_BY_SEVERITY: readonly ExceptionLevel[] = [
    "unknown",
    "debug",
    "info",
    "warning",
    "error",
    "critical"
];

export const levelForSeverity = (rank: number): ExceptionLevel =>
    LEVELS_BY_SEVERITY[rank] ?? "unknown";

export type Trend = "increasing" | "decreasing" | "stable";

/**
 * Compares occurrences in the later half of a window with the earlier half.
 * A half must exceed the other by 50% to count as a trend.
 */
export function occurrenceTrend(earlier: number, later: number): Trend {
    if (later > earlier * 1.5) return "increasing";
    if (earlier > later * 1.5) return "decreasing";
    return "stable";
}

export type Priority = "high" | "medium" | "low";

export function patternPriority(count: number, level: ExceptionLevel): Priority {
    if (level === "critical" || count >= 10) return "high";
    if (level === "error" || count >= 5) return "medium";
    return "low";
}

export type OperationCount = { operation: string; count: number };

export type CacheTally = {
    total: number;
    hits: number;
    misses: number;
    writes: number;
    deletes: number;
    hitRate: number;
    missRate: number;
};

const TALLY_BUCKET: Record<CacheOperation, "hits" | "misses" | "writes" | "deletes" | null> = {
    hit: "hits",
    miss: "misses",
    write: "writes",
    forget: "deletes",
    unknown: null
};

/** Unmapped operations count toward the total only. */
export function tallyCacheOperations(counts: OperationCount[]): CacheTally {
    const tally = { total: 0, hits: 0, misses: 0, writes: 0, deletes: 0 };
    for (const { operation, count } of counts) {
        tally.total += count;
        const bucket = TALLY_BUCKET[parseCacheOperation(operation)];
        if (bucket) tally[bucket] += count;
    }
    return {
        ...tally,
        hitRate: rate(tally.hits, tally.total),
        missRate: rate(tally.misses, tally.total)
    };
}
