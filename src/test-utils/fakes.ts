import type { Db, Row, SqlParam } from "../db/client";
import type { EntryKind, StoredEntry } from "../types/telescope";
import type { EntriesRepo } from "../types/telescope-service";

const pad = (n: number, width = 2): string => String(n).padStart(width, "0");

export const uuidFor = (sequence: number): string =>
    `a0000000-0000-4000-8000-${pad(sequence, 12)}`;

/** Stored row; objects are serialised, strings are kept verbatim so tests can plant bad JSON. */
export function entry(
    kind: EntryKind,
    content: unknown,
    opts: { sequence: number; createdAt?: string; batchId?: string | null; uuid?: string }
): StoredEntry {
    const { sequence } = opts;
    return {
        sequence,
        uuid: opts.uuid ?? uuidFor(sequence),
        batchId: opts.batchId ?? null,
        kind,
        content: typeof content === "string" ? content : JSON.stringify(content),
        createdAt:
            opts.createdAt ??
            `2026-03-01 10:${pad(Math.floor(sequence / 60) % 60)}:${pad(sequence % 60)}`
    };
}

export type FakeRepo = {
    [K in keyof EntriesRepo]: jest.Mock<ReturnType<EntriesRepo[K]>, Parameters<EntriesRepo[K]>>;
};

const newestFirst = (a: StoredEntry, b: StoredEntry): number =>
    b.createdAt.localeCompare(a.createdAt) || (b.sequence ?? 0) - (a.sequence ?? 0);

/**
 * In-memory repository. `list` honours kind and limit, `count` honours kind;
 * statistics and groups default to an empty table unless overridden.
 */
export function createFakeRepo(
    entries: StoredEntry[] = [],
    overrides: Partial<EntriesRepo> = {}
): FakeRepo {
    const base: EntriesRepo = {
        tableStatus: async () => ({
            success: true,
            count: entries.length,
            latestEntry: entries.length
                ? [...entries].sort(newestFirst)[0].createdAt
                : null,
            connection: "fake:3306/telescope"
        }),
        list: async (scope, { limit }) =>
            entries
                .filter((e) => !scope.kind || e.kind === scope.kind)
                .sort(newestFirst)
                .slice(0, limit),
        requestStats: async () => ({
            total: 0,
            successCount: 0,
            errorCount: 0,
            avgDuration: 0,
            slowCount: 0
        }),
        requestHours: async () => [],
        queryStats: async () => ({ total: 0, avgTime: 0, slowCount: 0, mostExpensive: null }),
        jobStats: async () => ({
            total: 0,
            processedCount: 0,
            failedCount: 0,
            avgTimeMs: 0,
            failedJobs: []
        }),
        cacheOperationCounts: async () => [],
        topCacheKeys: async () => [],
        exceptionStats: async () => ({
            total: 0,
            critical: 0,
            warning: 0,
            info: 0,
            criticalClasses: []
        }),
        activityStats: async () => ({
            totalRequests: 0,
            uniqueIps: 0,
            uniqueUsers: 0,
            avgDuration: 0,
            errorCount: 0,
            firstActivity: null,
            lastActivity: null,
            topUris: []
        }),
        count: async (scope) => entries.filter((e) => !scope.kind || e.kind === scope.kind).length,
        exceptionGroups: async () => [],
        findByUuid: async (id, prefix) =>
            entries
                .filter((e) => (prefix ? e.uuid.startsWith(id) : e.uuid === id))
                .slice(0, 2),
        batch: async (batchId, limit) =>
            entries
                .filter((e) => e.batchId === batchId)
                .sort((a, b) => (a.sequence ?? 0) - (b.sequence ?? 0))
                .slice(0, limit)
    };
    const repo: EntriesRepo = { ...base, ...overrides };
    return {
        tableStatus: jest.fn(repo.tableStatus),
        list: jest.fn(repo.list),
        requestStats: jest.fn(repo.requestStats),
        requestHours: jest.fn(repo.requestHours),
        queryStats: jest.fn(repo.queryStats),
        jobStats: jest.fn(repo.jobStats),
        cacheOperationCounts: jest.fn(repo.cacheOperationCounts),
        topCacheKeys: jest.fn(repo.topCacheKeys),
        exceptionStats: jest.fn(repo.exceptionStats),
        activityStats: jest.fn(repo.activityStats),
        count: jest.fn(repo.count),
        exceptionGroups: jest.fn(repo.exceptionGroups),
        findByUuid: jest.fn(repo.findByUuid),
        batch: jest.fn(repo.batch)
    };
}

export type RecordedQuery = { sql: string; params: SqlParam[] };

/** `Db` that records every statement and answers from a queue of row sets. */
export function createRecordingDb(results: Row[][] = []): Db & { queries: RecordedQuery[] } {
    const queries: RecordedQuery[] = [];
    const pending = [...results];
    return {
        queries,
        select: async (sql, params = []) => {
            queries.push({ sql: sql.replace(/\s+/g, " ").trim(), params });
            return pending.shift() ?? [];
        },
        describe: () => "fake:3306/telescope",
        close: async () => undefined
    };
}
