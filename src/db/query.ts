import type { EntryKind, ExceptionGroupBy } from "../types/telescope";
import { InvalidArgument } from "../utils/errors";
import type { SqlParam } from "./client";

/**
 * Ordered fallback chains for payload fields whose name changed across
 * Telescope versions. The first present, non-null path wins. Shared by the
 * SQL fragments below and by the row decoder.
 */
export const FIELD_CHAINS = {
    /** HTTP status: `response_status`, older payloads `status`. */
    requestStatus: ["response_status", "status"],
    /** Query time in ms: `time`, some drivers log `duration`. */
    queryTime: ["time", "duration"],
    /** Job class: `name`, queued closures/mailables use `displayName`. */
    jobName: ["name", "displayName"],
    /** Acting user: `user_id`, Telescope's own payloads nest it under `user`. */
    userId: ["user_id", "user.id"]
} as const satisfies Record<string, readonly string[]>;

export type FilterField = "status" | "level" | "queue" | "operation" | "userId";

const FILTER_PATHS: Record<FilterField, readonly string[]> = {
    status: ["status"],
    level: ["level"],
    queue: ["queue"],
    operation: ["type"],
    userId: FIELD_CHAINS.userId
};

/** Tag-like fields, compared case-insensitively against lower-cased values. */
const FOLDED_FIELDS: ReadonlySet<FilterField> = new Set(["status", "level", "operation"]);

const GROUP_BY_ALIASES = new Map<string, ExceptionGroupBy>([
    ["class", "class"],
    ["type", "class"],
    ["file", "file"],
    ["message", "message"]
]);

export const ENTRY_COLUMNS =
    "sequence, uuid, batch_id, type, content, created_at";

export const MAX_LIST_LIMIT = 100;

const jsonPath = (field: string): string => `'$.${field}'`;

/** Unquoted text of the first non-null path; JSON null reads as SQL NULL. */
export function jsonText(chain: readonly string[]): string {
    const parts = chain.map(
        (field) =>
            `NULLIF(JSON_UNQUOTE(JSON_EXTRACT(content, ${jsonPath(field)})), 'null')`
    );
    return parts.length === 1 ? parts[0] : `COALESCE(${parts.join(", ")})`;
}

/** `jsonText` trimmed and lower-cased, for values parsed as tags. */
export function jsonTag(chain: readonly string[]): string {
    return `LOWER(TRIM(${jsonText(chain)}))`;
}

export function jsonNumber(chain: readonly string[]): string {
    return `CAST(${jsonText(chain)} AS DECIMAL(12,2))`;
}

/** Rejects non-positive limits, caps the rest at `max`. */
export function clampLimit(limit: number, max = MAX_LIST_LIMIT): number {
    if (!Number.isInteger(limit) || limit <= 0) {
        throw new InvalidArgument(
            `limit must be a positive integer (got ${limit})`
        );
    }
    return Math.min(limit, max);
}

export function requireHours(hours: number): number {
    if (!Number.isInteger(hours) || hours < 0) {
        throw new InvalidArgument(
            `hours must be a non-negative integer (got ${hours})`
        );
    }
    return hours;
}

export function parseGroupBy(raw: string): ExceptionGroupBy {
    const key = GROUP_BY_ALIASES.get(raw.trim().toLowerCase());
    if (!key) {
        throw new InvalidArgument(
            `group_by must be one of class, type, file, message (got "${raw}")`
        );
    }
    return key;
}

export type EntryScope = {
    kind?: Exclude<EntryKind, "other">;
    /** Lower bound `created_at >= NOW() - hours`. */
    hours?: number;
    filters?: Partial<Record<FilterField, string | readonly string[]>>;
    /** Only rows carrying a user id. */
    authenticatedOnly?: boolean;
    /** Only query entries whose time exceeds this many ms. */
    slowerThanMs?: number;
    /** Drop rows whose content is not valid JSON before any extraction. */
    validJson?: boolean;
};

export type Where = {
    sql: string;
    params: SqlParam[];
};

const FILTER_FIELDS: readonly FilterField[] = [
    "status",
    "level",
    "queue",
    "operation",
    "userId"
];

export function buildWhere(scope: EntryScope): Where {
    const clauses: string[] = [];
    const params: SqlParam[] = [];

    if (scope.kind) {
        clauses.push("type = ?");
        params.push(scope.kind);
    }
    if (scope.hours !== undefined) {
        clauses.push("created_at >= DATE_SUB(NOW(), INTERVAL ? HOUR)");
        params.push(requireHours(scope.hours));
    }

    const json: string[] = [];
    for (const field of FILTER_FIELDS) {
        const value = scope.filters?.[field];
        if (value === undefined || value.length === 0) {
            continue;
        }
        const folded = FOLDED_FIELDS.has(field);
        const column = folded ? jsonTag(FILTER_PATHS[field]) : jsonText(FILTER_PATHS[field]);
        const values = (typeof value === "string" ? [value] : value).map((v) =>
            folded ? v.toLowerCase() : v
        );
        json.push(
            values.length === 1
                ? `${column} = ?`
                : `${column} IN (${values.map(() => "?").join(", ")})`
        );
        params.push(...values);
    }
    if (scope.authenticatedOnly) {
        json.push(`${jsonText(FIELD_CHAINS.userId)} IS NOT NULL`);
    }
    if (scope.slowerThanMs !== undefined) {
        json.push(`${jsonNumber(FIELD_CHAINS.queryTime)} > ?`);
        params.push(scope.slowerThanMs);
    }
    if (scope.validJson || json.length > 0) {
        clauses.push("JSON_VALID(content)", ...json);
    }

    return {
        sql: clauses.length ? `WHERE ${clauses.join(" AND ")}` : "",
        params
    };
}

export type EntryOrder = "recent" | "slowest";

const ORDER_BY: Record<EntryOrder, string> = {
    recent: "created_at DESC, sequence DESC",
    slowest: `${jsonNumber(FIELD_CHAINS.queryTime)} DESC, created_at DESC`
};

export type SelectQuery = {
    sql: string;
    params: SqlParam[];
};

/**
 * Listing query over one table. Every caller-supplied value is bound; the
 * only interpolated text is the configured table name and the fixed
 * fragments above.
 */
export function buildEntryQuery(
    table: string,
    scope: EntryScope,
    options: { limit: number; order?: EntryOrder }
): SelectQuery {
    const where = buildWhere(scope);
    return {
        sql: [
            `SELECT ${ENTRY_COLUMNS} FROM ${table}`,
            where.sql,
            `ORDER BY ${ORDER_BY[options.order ?? "recent"]}`,
            "LIMIT ?"
        ]
            .filter(Boolean)
            .join(" "),
        params: [...where.params, options.limit]
    };
}
