import { clampLimit, parseGroupBy, requireHours } from "../db/query";
import type { EntryScope } from "../db/query";
import { SLOW_QUERY_MS } from "../repositories/entries-repo";
import type { JobStatus } from "../types/telescope";
import type {
    CacheReport,
    EntriesRepo,
    ExceptionDetail,
    ExceptionGroup,
    ExceptionReport,
    JobReport,
    PatternReport,
    PerformanceFlag,
    PerformanceSummary,
    RecentEntry,
    StoredExceptionGroup,
    TableStatus,
    UserActivityReport,
    WindowNote
} from "../types/telescope-service";
import type { QueryRecord, RequestRecord } from "../types/telescope";
import { InvalidArgument, NotFound } from "../utils/errors";
import { rate, round } from "../utils/stats";
import { parseTimeWindow, sessionDuration } from "../utils/time";
import {
    classifyActivity,
    occurrenceTrend,
    patternPriority,
    peakHour,
    tallyCacheOperations
} from "./aggregate";
import {
    decodeAll,
    decodeCache,
    decodeEntry,
    decodeException,
    decodeJob,
    decodeQuery,
    decodeRequest,
    parsePayload,
    payloadPreview
} from "./decode";
import { cacheOperationAliases, jobStatusAliases, levelAliases } from "./tags";

export const RECENT_ENTRIES_MAX = 50;
const TOP_CACHE_KEYS = 10;
const BATCH_LIMIT = 50;
const UUID_LENGTH = 36;
const MIN_UUID_PREFIX = 8;
const SLOW_QUERY_SHARE_PCT = 10;
const CACHE_HIT_TARGET_PCT = 80;

const optional = (v: string | undefined): string | null => {
    const t = v?.trim();
    return t ? t : null;
};

function requireNonNegative(name: string, value: number): number {
    if (!Number.isFinite(value) || value < 0) {
        throw new InvalidArgument(`${name} must be a non-negative number (got ${value})`);
    }
    return value;
}

const windowNote = (token: string): WindowNote => {
    const { hours, recognized } = parseTimeWindow(token);
    return { hours, token, recognized };
};

function toExceptionGroup(group: StoredExceptionGroup): ExceptionGroup {
    const stored = group.representative;
    const payload = stored ? parsePayload(stored.content) : null;
    return {
        key: group.key,
        count: group.count,
        firstOccurrence: group.firstOccurrence,
        latestOccurrence: group.latestOccurrence,
        worstLevel: group.worstLevel,
        representative: stored && payload ? decodeException(stored, payload) : null
    };
}

export type TelescopeServiceOptions = {
    /** Rows pulled into memory for post-decode filtering. */
    scanLimit: number;
};

export type TelescopeService = ReturnType<typeof createTelescopeService>;

export function createTelescopeService(
    repo: EntriesRepo,
    { scanLimit }: TelescopeServiceOptions
) {
    async function status(): Promise<TableStatus> {
        return repo.tableStatus();
    }

    async function recentEntries(limit: number): Promise<RecentEntry[]> {
        const n = clampLimit(limit, RECENT_ENTRIES_MAX);
        const entries = await repo.list({}, { limit: n });
        return entries.map((e) => ({ ...e, ...payloadPreview(e.content) }));
    }

    async function recentRequests(limit: number): Promise<RequestRecord[]> {
        const n = clampLimit(limit);
        const entries = await repo.list({ kind: "request", validJson: true }, { limit: n });
        return decodeAll(entries, decodeRequest);
    }

    async function slowQueries(thresholdMs: number, limit: number): Promise<QueryRecord[]> {
        const slowerThanMs = requireNonNegative("threshold_ms", thresholdMs);
        const n = clampLimit(limit);
        const entries = await repo.list(
            { kind: "query", slowerThanMs },
            { limit: n, order: "slowest" }
        );
        return decodeAll(entries, decodeQuery);
    }

    async function performanceSummary(params: {
        hours: number;
        includeDetails: boolean;
        slowThresholdMs: number;
        errorRateThresholdPct: number;
    }): Promise<PerformanceSummary> {
        const hours = requireHours(params.hours);
        const slowRequestMs = requireNonNegative("slow_threshold_ms", params.slowThresholdMs);
        const errorRatePct = requireNonNegative(
            "error_rate_threshold_pct",
            params.errorRateThresholdPct
        );

        // One connection, so the component queries run one after another.
        const requests = await repo.requestStats(hours, slowRequestMs);
        const buckets = await repo.requestHours(hours);
        const database = await repo.queryStats(hours, SLOW_QUERY_MS);
        const jobs = await repo.jobStats(hours);
        const cacheCounts = await repo.cacheOperationCounts(hours);
        const [mostAccessed] = await repo.topCacheKeys(hours, 1);
        const errors = await repo.exceptionStats(hours);

        const cache = tallyCacheOperations(cacheCounts);
        const summary: PerformanceSummary = {
            hours,
            includeDetails: params.includeDetails,
            thresholds: { slowRequestMs, errorRatePct },
            requests: {
                ...requests,
                avgDuration: round(requests.avgDuration, 2),
                successRate: rate(requests.successCount, requests.total),
                errorRate: rate(requests.errorCount, requests.total),
                peak: peakHour(buckets)
            },
            database: {
                ...database,
                avgTime: round(database.avgTime, 2),
                slowThresholdMs: SLOW_QUERY_MS
            },
            queue: {
                ...jobs,
                successRate: rate(jobs.processedCount, jobs.total),
                avgProcessingSeconds: round(jobs.avgTimeMs / 1000, 2)
            },
            cache: { ...cache, mostAccessed: mostAccessed ?? null },
            errors,
            flags: []
        };
        summary.flags = performanceFlags(summary);
        return summary;
    }

    async function exceptions(params: {
        limit: number;
        level?: string;
        since?: string;
        groupBy?: string;
    }): Promise<ExceptionReport> {
        const n = clampLimit(params.limit);
        const since = optional(params.since);
        const window = since ? windowNote(since) : null;
        const level = optional(params.level)?.toLowerCase() ?? null;
        const groupByRaw = optional(params.groupBy);
        const groupBy = groupByRaw ? parseGroupBy(groupByRaw) : null;

        const scope: EntryScope = {
            kind: "exception",
            hours: window?.hours,
            filters: level ? { level: levelAliases(level) } : undefined,
            validJson: true
        };

        if (!groupBy) {
            const entries = await repo.list(scope, { limit: n });
            return {
                mode: "list",
                window,
                level,
                exceptions: decodeAll(entries, decodeException)
            };
        }

        const groups = await repo.exceptionGroups(scope, groupBy, { limit: n });
        const total = await repo.count(scope);
        return {
            mode: "grouped",
            window,
            level,
            groupBy,
            groups: groups.map(toExceptionGroup),
            total
        };
    }

    async function jobs(params: {
        limit: number;
        status?: string;
        queue?: string;
        hours: number;
    }): Promise<JobReport> {
        const n = clampLimit(params.limit);
        const hours = requireHours(params.hours);
        const status = optional(params.status);
        const queue = optional(params.queue);

        const entries = await repo.list(
            {
                kind: "job",
                hours,
                filters: {
                    status: status ? jobStatusAliases(status) : undefined,
                    queue: queue ?? undefined
                },
                validJson: true
            },
            { limit: n }
        );
        const records = decodeAll(entries, decodeJob);
        const counts: Record<JobStatus, number> = {
            pending: 0,
            processed: 0,
            failed: 0,
            unknown: 0
        };
        for (const job of records) counts[job.status] += 1;
        return { hours, status, queue, jobs: records, counts };
    }

    async function cacheStats(params: {
        limit: number;
        operation?: string;
        hours: number;
        showSummary: boolean;
    }): Promise<CacheReport> {
        const n = clampLimit(params.limit);
        const hours = requireHours(params.hours);
        const operation = optional(params.operation);

        const entries = await repo.list(
            {
                kind: "cache",
                hours,
                filters: operation ? { operation: cacheOperationAliases(operation) } : undefined,
                validJson: true
            },
            { limit: n }
        );

        let summary: CacheReport["summary"] = null;
        if (params.showSummary) {
            const operations = await repo.cacheOperationCounts(hours);
            const topKeys = await repo.topCacheKeys(hours, TOP_CACHE_KEYS);
            summary = { ...tallyCacheOperations(operations), topKeys, operations };
        }

        return {
            hours,
            operation,
            entries: decodeAll(entries, decodeCache),
            summary
        };
    }

    async function userActivity(params: {
        userId?: string;
        limit: number;
        hours: number;
        includeAnonymous: boolean;
        suspiciousOnly: boolean;
    }): Promise<UserActivityReport> {
        const n = clampLimit(params.limit);
        const hours = requireHours(params.hours);
        const userId = optional(params.userId);

        const scope: EntryScope = {
            kind: "request",
            hours,
            filters: userId ? { userId } : undefined,
            authenticatedOnly: !userId && !params.includeAnonymous,
            validJson: true
        };

        // Suspicion is decided after decoding, so filter over a wider scan.
        const entries = await repo.list(scope, {
            limit: params.suspiciousOnly ? scanLimit : n
        });
        let activities = decodeAll(entries, decodeRequest).map(classifyActivity);
        if (params.suspiciousOnly) {
            activities = activities.filter((a) => a.suspicious).slice(0, n);
        }

        const stats = await repo.activityStats(scope);
        return {
            hours,
            userId,
            includeAnonymous: params.includeAnonymous,
            suspiciousOnly: params.suspiciousOnly,
            activities,
            stats: {
                ...stats,
                avgDuration: round(stats.avgDuration, 2),
                errorRate: rate(stats.errorCount, stats.totalRequests)
            },
            session: userId ? sessionDuration(stats.firstActivity, stats.lastActivity) : null
        };
    }

    async function exceptionDetail(params: {
        exceptionId: string;
        includeContext: boolean;
        includeRelated: boolean;
    }): Promise<ExceptionDetail> {
        const id = params.exceptionId.trim().toLowerCase();
        if (!/^[0-9a-f-]+$/.test(id)) {
            throw new InvalidArgument(
                `exception_id must be a uuid or a uuid prefix (got "${params.exceptionId}")`
            );
        }
        const prefix = id.length < UUID_LENGTH;
        if (prefix && id.length < MIN_UUID_PREFIX) {
            throw new InvalidArgument(
                `exception_id prefix must be at least ${MIN_UUID_PREFIX} characters (got "${id}")`
            );
        }

        const matches = await repo.findByUuid(id, prefix);
        const [entry] = matches;
        if (!entry) {
            throw new NotFound(`No exception found with id ${id}`);
        }
        if (matches.length > 1) {
            throw new InvalidArgument(
                `exception_id ${id} matches more than one entry; use a longer prefix`
            );
        }
        if (entry.kind !== "exception") {
            throw new NotFound(`Entry ${id} is a ${entry.kind} entry, not an exception`);
        }
        const payload = parsePayload(entry.content);
        if (!payload) {
            throw new NotFound(`Exception ${id} has an unreadable payload`);
        }
        const exception = decodeException(entry, payload);

        const wantBatch = params.includeContext || params.includeRelated;
        const batch =
            wantBatch && entry.batchId ? await repo.batch(entry.batchId, BATCH_LIMIT) : [];

        let request: RequestRecord | null = null;
        if (params.includeContext) {
            const requests = decodeAll(
                batch.filter((e) => e.kind === "request"),
                decodeRequest
            );
            request = requests[0] ?? null;
        }

        let related: ExceptionDetail["related"] = null;
        if (params.includeRelated) {
            related = [];
            for (const e of batch) {
                if (e.uuid === entry.uuid || e.kind === "request") continue;
                const decoded = decodeEntry(e);
                if (decoded) related.push(decoded);
            }
        }

        return { exception, request, related, includeContext: params.includeContext };
    }

    async function exceptionPatterns(params: {
        timeWindow: string;
        minOccurrences: number;
        groupBy: string;
    }): Promise<PatternReport> {
        const window = windowNote(params.timeWindow);
        if (!Number.isInteger(params.minOccurrences) || params.minOccurrences < 1) {
            throw new InvalidArgument(
                `min_occurrences must be a positive integer (got ${params.minOccurrences})`
            );
        }
        const groupBy = parseGroupBy(params.groupBy);

        const scope: EntryScope = { kind: "exception", hours: window.hours, validJson: true };
        const groups = await repo.exceptionGroups(scope, groupBy, {
            minCount: params.minOccurrences,
            recentHours: window.hours / 2
        });
        const totalExceptions = await repo.count(scope);

        const patterns = groups.map((g) => {
            const later = g.recentCount ?? 0;
            return {
                ...toExceptionGroup(g),
                trend: occurrenceTrend(g.count - later, later),
                priority: patternPriority(g.count, g.worstLevel)
            };
        });

        return {
            window,
            groupBy,
            minOccurrences: params.minOccurrences,
            patterns,
            totalExceptions
        };
    }

    return {
        status,
        recentEntries,
        recentRequests,
        slowQueries,
        performanceSummary,
        exceptions,
        jobs,
        cacheStats,
        userActivity,
        exceptionDetail,
        exceptionPatterns
    };
}

/** Qualitative warnings for the dashboard; an empty list reads as healthy. */
export function performanceFlags(s: PerformanceSummary): PerformanceFlag[] {
    const flags: PerformanceFlag[] = [];
    if (s.requests.total > 0 && s.requests.errorRate > s.thresholds.errorRatePct) {
        flags.push("high_error_rate");
    }
    if (s.requests.total > 0 && s.requests.avgDuration > s.thresholds.slowRequestMs) {
        flags.push("slow_responses");
    }
    if (rate(s.database.slowCount, s.database.total) > SLOW_QUERY_SHARE_PCT) {
        flags.push("slow_queries");
    }
    const reads = s.cache.hits + s.cache.misses;
    if (reads > 0 && rate(s.cache.hits, reads) < CACHE_HIT_TARGET_PCT) {
        flags.push("low_cache_hit_rate");
    }
    if (s.queue.failedCount > 0) {
        flags.push("queue_failures");
    }
    if (s.errors.critical > 0) {
        flags.push("critical_exceptions");
    }
    return flags;
}
