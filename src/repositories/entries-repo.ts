import type { Db, Row, SqlParam } from "../db/client";
import {
    FIELD_CHAINS,
    ENTRY_COLUMNS,
    buildEntryQuery,
    buildWhere,
    jsonNumber,
    jsonTag,
    jsonText
} from "../db/query";
import type { EntryScope } from "../db/query";
import { LEVELS_BY_SEVERITY, levelForSeverity } from "../services/aggregate";
import { asNumber, asString, toStoredEntry } from "../services/decode";
import { jobStatusAliases, levelAliases } from "../services/tags";
import type { ExceptionGroupBy, StoredEntry } from "../types/telescope";
import type {
    EntriesRepo,
    ExceptionGroupOptions,
    KeyCount
} from "../types/telescope-service";
import { toNum } from "../utils/stats";

const STATUS = jsonNumber(FIELD_CHAINS.requestStatus);
const DURATION = jsonNumber(["duration"]);
const QUERY_TIME = jsonNumber(FIELD_CHAINS.queryTime);
const JOB_TIME = jsonNumber(["time"]);
const JOB_STATUS = jsonTag(["status"]);
const JOB_NAME = jsonText(FIELD_CHAINS.jobName);
const CACHE_TYPE = jsonText(["type"]);
const CACHE_KEY = jsonText(["key"]);
const LEVEL = jsonTag(["level"]);
const EXCEPTION_CLASS = jsonText(["class"]);
const SQL_TEXT = jsonText(["sql"]);
const URI = jsonText(["uri"]);
const IP = jsonText(["ip_address"]);
const USER_ID = jsonText(FIELD_CHAINS.userId);

// Literals come from the tag tables, never from callers.
const oneOf = (column: string, values: readonly string[]): string =>
    `${column} IN (${values.map((v) => `'${v}'`).join(", ")})`;

const isLevel = (level: string): string => oneOf(LEVEL, levelAliases(level));
const isJobStatus = (status: string): string => oneOf(JOB_STATUS, jobStatusAliases(status));

/** Unlabelled exceptions rank as errors, as the decoder reads them. */
const SEVERITY_RANK = [
    "CASE",
    `WHEN COALESCE(${LEVEL}, '') = '' THEN ${LEVELS_BY_SEVERITY.indexOf("error")}`,
    ...LEVELS_BY_SEVERITY.filter((l) => l !== "unknown").map(
        (l) => `WHEN ${isLevel(l)} THEN ${LEVELS_BY_SEVERITY.indexOf(l)}`
    ),
    "ELSE 0 END"
].join(" ");

const GROUP_KEYS: Record<ExceptionGroupBy, string> = {
    class: `COALESCE(${jsonText(["class"])}, 'UNKNOWN')`,
    file: `COALESCE(${jsonText(["file"])}, 'UNKNOWN')`,
    message: `COALESCE(${jsonText(["message"])}, 'UNKNOWN')`
};

/** Database queries counted as slow in the dashboard. */
export const SLOW_QUERY_MS = 100;

const windowed = (kind: EntryScope["kind"], hours: number): EntryScope => ({
    kind,
    hours,
    validJson: true
});

const keyCounts = (rows: Row[], keyColumn: string, countColumn: string): KeyCount[] =>
    rows.map((r) => ({
        key: asString(r[keyColumn]) ?? "UNKNOWN",
        count: toNum(r[countColumn])
    }));

const column = (rows: Row[], name: string): string[] =>
    rows.map((r) => asString(r[name]) ?? "UNKNOWN");

export function createEntriesRepo(db: Db, table: string): EntriesRepo {
    async function one(sql: string, params: SqlParam[]): Promise<Row> {
        const rows = await db.select(sql, params);
        return rows[0] ?? {};
    }

    async function tableStatus() {
        const tables = await db.select("SHOW TABLES LIKE ?", [table]);
        if (tables.length === 0) {
            return {
                success: false as const,
                message: `${table} table not found`,
                connection: db.describe()
            };
        }
        const row = await one(
            `SELECT COUNT(*) AS count, MAX(created_at) AS latest FROM ${table}`,
            []
        );
        return {
            success: true as const,
            count: toNum(row.count),
            latestEntry: asString(row.latest),
            connection: db.describe()
        };
    }

    async function list(
        scope: EntryScope,
        options: Parameters<EntriesRepo["list"]>[1]
    ) {
        const q = buildEntryQuery(table, scope, options);
        const rows = await db.select(q.sql, q.params);
        return rows.map(toStoredEntry);
    }

    async function requestStats(hours: number, slowMs: number) {
        const where = buildWhere(windowed("request", hours));
        const row = await one(
            `SELECT COUNT(*) AS total, AVG(${DURATION}) AS avg_duration,
                COUNT(CASE WHEN ${STATUS} BETWEEN 200 AND 299 THEN 1 END) AS success_count,
                COUNT(CASE WHEN ${STATUS} >= 400 THEN 1 END) AS error_count,
                COUNT(CASE WHEN ${DURATION} > ? THEN 1 END) AS slow_count
             FROM ${table} ${where.sql}`,
            [slowMs, ...where.params]
        );
        return {
            total: toNum(row.total),
            successCount: toNum(row.success_count),
            errorCount: toNum(row.error_count),
            avgDuration: toNum(row.avg_duration),
            slowCount: toNum(row.slow_count)
        };
    }

    async function requestHours(hours: number) {
        const where = buildWhere(windowed("request", hours));
        const rows = await db.select(
            `SELECT HOUR(created_at) AS hour, COUNT(*) AS count FROM ${table} ${where.sql}
             GROUP BY HOUR(created_at)`,
            where.params
        );
        return rows.map((r) => ({ hour: toNum(r.hour), count: toNum(r.count) }));
    }

    async function queryStats(hours: number, slowMs: number) {
        const where = buildWhere(windowed("query", hours));
        const row = await one(
            `SELECT COUNT(*) AS total, AVG(${QUERY_TIME}) AS avg_time,
                COUNT(CASE WHEN ${QUERY_TIME} > ? THEN 1 END) AS slow_count
             FROM ${table} ${where.sql}`,
            [slowMs, ...where.params]
        );
        const expensive = await db.select(
            `SELECT ${SQL_TEXT} AS query_sql, ${QUERY_TIME} AS duration FROM ${table} ${where.sql}
             ORDER BY ${QUERY_TIME} DESC LIMIT 1`,
            where.params
        );
        const top = expensive[0];
        return {
            total: toNum(row.total),
            avgTime: toNum(row.avg_time),
            slowCount: toNum(row.slow_count),
            mostExpensive: top
                ? {
                      sql: asString(top.query_sql) ?? "UNKNOWN",
                      duration: toNum(top.duration)
                  }
                : null
        };
    }

    async function jobStats(hours: number) {
        const where = buildWhere(windowed("job", hours));
        const row = await one(
            `SELECT COUNT(*) AS total, AVG(${JOB_TIME}) AS avg_time,
                COUNT(CASE WHEN ${isJobStatus("processed")} THEN 1 END) AS processed_count,
                COUNT(CASE WHEN ${isJobStatus("failed")} THEN 1 END) AS failed_count
             FROM ${table} ${where.sql}`,
            where.params
        );
        const failed = await db.select(
            `SELECT ${JOB_NAME} AS job_name FROM ${table} ${where.sql}
             AND ${isJobStatus("failed")} ORDER BY created_at DESC LIMIT 5`,
            where.params
        );
        return {
            total: toNum(row.total),
            processedCount: toNum(row.processed_count),
            failedCount: toNum(row.failed_count),
            avgTimeMs: toNum(row.avg_time),
            failedJobs: column(failed, "job_name")
        };
    }

    async function cacheOperationCounts(hours: number) {
        const where = buildWhere(windowed("cache", hours));
        const rows = await db.select(
            `SELECT ${CACHE_TYPE} AS operation, COUNT(*) AS count FROM ${table} ${where.sql}
             GROUP BY operation ORDER BY count DESC`,
            where.params
        );
        return keyCounts(rows, "operation", "count").map(({ key, count }) => ({
            operation: key,
            count
        }));
    }

    async function topCacheKeys(hours: number, limit: number) {
        const where = buildWhere(windowed("cache", hours));
        const rows = await db.select(
            `SELECT ${CACHE_KEY} AS cache_key, COUNT(*) AS frequency FROM ${table} ${where.sql}
             GROUP BY cache_key ORDER BY frequency DESC, cache_key ASC LIMIT ?`,
            [...where.params, limit]
        );
        return keyCounts(rows, "cache_key", "frequency");
    }

    async function exceptionStats(hours: number) {
        const where = buildWhere(windowed("exception", hours));
        const row = await one(
            `SELECT COUNT(*) AS total,
                COUNT(CASE WHEN ${isLevel("critical")} THEN 1 END) AS critical_count,
                COUNT(CASE WHEN ${isLevel("warning")} THEN 1 END) AS warning_count,
                COUNT(CASE WHEN ${isLevel("info")} THEN 1 END) AS info_count
             FROM ${table} ${where.sql}`,
            where.params
        );
        const critical = await db.select(
            `SELECT ${EXCEPTION_CLASS} AS exception_class FROM ${table} ${where.sql}
             AND ${isLevel("critical")} ORDER BY created_at DESC LIMIT 3`,
            where.params
        );
        return {
            total: toNum(row.total),
            critical: toNum(row.critical_count),
            warning: toNum(row.warning_count),
            info: toNum(row.info_count),
            criticalClasses: column(critical, "exception_class")
        };
    }

    async function activityStats(scope: EntryScope) {
        const where = buildWhere({ ...scope, validJson: true });
        const row = await one(
            `SELECT COUNT(*) AS total_requests,
                COUNT(DISTINCT ${IP}) AS unique_ips,
                COUNT(DISTINCT ${USER_ID}) AS unique_users,
                AVG(${DURATION}) AS avg_duration,
                COUNT(CASE WHEN ${STATUS} >= 400 THEN 1 END) AS error_count,
                MIN(created_at) AS first_activity,
                MAX(created_at) AS last_activity
             FROM ${table} ${where.sql}`,
            where.params
        );
        const uris = await db.select(
            `SELECT ${URI} AS uri, COUNT(*) AS visits FROM ${table} ${where.sql}
             GROUP BY uri ORDER BY visits DESC, uri ASC LIMIT 5`,
            where.params
        );
        return {
            totalRequests: toNum(row.total_requests),
            uniqueIps: toNum(row.unique_ips),
            uniqueUsers: toNum(row.unique_users),
            avgDuration: toNum(row.avg_duration),
            errorCount: toNum(row.error_count),
            firstActivity: asString(row.first_activity),
            lastActivity: asString(row.last_activity),
            topUris: keyCounts(uris, "uri", "visits")
        };
    }

    async function count(scope: EntryScope) {
        const where = buildWhere(scope);
        const row = await one(`SELECT COUNT(*) AS total FROM ${table} ${where.sql}`, where.params);
        return toNum(row.total);
    }

    async function exceptionGroups(
        scope: EntryScope,
        groupBy: ExceptionGroupBy,
        options: ExceptionGroupOptions = {}
    ) {
        const where = buildWhere({ ...scope, kind: "exception", validJson: true });
        const params: SqlParam[] = [];
        let recent = "NULL";
        if (options.recentHours !== undefined) {
            // Seconds, so half of an odd hour count stays exact.
            recent = "COUNT(CASE WHEN created_at >= DATE_SUB(NOW(), INTERVAL ? SECOND) THEN 1 END)";
            params.push(Math.round(options.recentHours * 3600));
        }
        params.push(...where.params);
        let having = "";
        if (options.minCount !== undefined) {
            having = "HAVING occurrences >= ?";
            params.push(options.minCount);
        }
        let limit = "";
        if (options.limit !== undefined) {
            limit = "LIMIT ?";
            params.push(options.limit);
        }

        const rows = await db.select(
            `SELECT ${GROUP_KEYS[groupBy]} AS group_key, COUNT(*) AS occurrences,
                MIN(created_at) AS first_occurrence, MAX(created_at) AS latest_occurrence,
                MIN(sequence) AS representative, MAX(${SEVERITY_RANK}) AS severity,
                ${recent} AS recent_count
             FROM ${table} ${where.sql}
             GROUP BY group_key ${having}
             ORDER BY occurrences DESC, latest_occurrence DESC, group_key ASC ${limit}`,
            params
        );

        const sequences = rows
            .map((r) => asNumber(r.representative))
            .filter((n): n is number => n !== null);
        const members = sequences.length
            ? await db.select(
                  `SELECT ${ENTRY_COLUMNS} FROM ${table}
                   WHERE sequence IN (${sequences.map(() => "?").join(", ")})`,
                  sequences
              )
            : [];
        const bySequence = new Map(
            members.map(toStoredEntry).map((e): [number | null, StoredEntry] => [e.sequence, e])
        );

        return rows.map((r) => ({
            key: asString(r.group_key) ?? "UNKNOWN",
            count: toNum(r.occurrences),
            firstOccurrence: asString(r.first_occurrence) ?? "",
            latestOccurrence: asString(r.latest_occurrence) ?? "",
            worstLevel: levelForSeverity(toNum(r.severity)),
            recentCount: r.recent_count === null ? null : toNum(r.recent_count),
            representative: bySequence.get(asNumber(r.representative)) ?? null
        }));
    }

    async function findByUuid(id: string, prefix: boolean) {
        const rows = await db.select(
            `SELECT ${ENTRY_COLUMNS} FROM ${table} WHERE uuid ${prefix ? "LIKE" : "="} ? LIMIT 2`,
            [prefix ? `${id}%` : id]
        );
        return rows.map(toStoredEntry);
    }

    async function batch(batchId: string, limit: number) {
        const rows = await db.select(
            `SELECT ${ENTRY_COLUMNS} FROM ${table} WHERE batch_id = ?
             ORDER BY sequence ASC LIMIT ?`,
            [batchId, limit]
        );
        return rows.map(toStoredEntry);
    }

    return {
        tableStatus,
        list,
        requestStats,
        requestHours,
        queryStats,
        jobStats,
        cacheOperationCounts,
        topCacheKeys,
        exceptionStats,
        activityStats,
        count,
        exceptionGroups,
        findByUuid,
        batch
    };
}
