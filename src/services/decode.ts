import { FIELD_CHAINS } from "../db/query";
import type { Row } from "../db/client";
import type {
    CacheRecord,
    DecodedEntry,
    ExceptionRecord,
    JobRecord,
    JsonObject,
    QueryRecord,
    RequestRecord,
    StoredEntry,
    TraceFrame
} from "../types/telescope";
import { parseCacheOperation, parseEntryKind, parseJobStatus, parseLevel } from "./tags";

const isObject = (v: unknown): v is JsonObject =>
    typeof v === "object" && v !== null && !Array.isArray(v);

export const asString = (v: unknown): string | null => {
    if (typeof v === "string") return v;
    if (typeof v === "number" || typeof v === "bigint") return String(v);
    return null;
};

export const asNumber = (v: unknown): number | null => {
    if (typeof v === "number") return Number.isFinite(v) ? v : null;
    if (typeof v === "string" && v.trim() !== "") {
        const n = Number(v);
        return Number.isFinite(n) ? n : null;
    }
    return null;
};

/** Reads a dotted path such as `user.id`. */
function readPath(obj: JsonObject, path: string): unknown {
    let node: unknown = obj;
    for (const key of path.split(".")) {
        if (!isObject(node)) return undefined;
        node = node[key];
    }
    return node;
}

/** First non-null value along a fallback chain. */
export function pick(obj: JsonObject, chain: readonly string[]): unknown {
    for (const path of chain) {
        const v = readPath(obj, path);
        if (v !== undefined && v !== null) return v;
    }
    return null;
}

/** Last segment of a namespaced class name: `App\Jobs\SendMail` -> `SendMail`. */
export function shortClassName(name: string): string {
    const parts = name.split("\\").filter(Boolean);
    return parts[parts.length - 1] ?? name;
}

/** Payload text as an object, or null when it is not a JSON object. */
export function parsePayload(content: string): JsonObject | null {
    try {
        const parsed: unknown = JSON.parse(content);
        return isObject(parsed) ? parsed : null;
    } catch {
        return null;
    }
}

export function toStoredEntry(row: Row): StoredEntry {
    return {
        sequence: asNumber(row.sequence),
        uuid: asString(row.uuid) ?? "",
        batchId: asString(row.batch_id),
        kind: parseEntryKind(asString(row.type) ?? ""),
        content: asString(row.content) ?? "",
        createdAt: asString(row.created_at) ?? ""
    };
}

/**
 * Decodes every entry whose payload is a JSON object and silently drops the
 * rest, so one bad row never sinks a report.
 */
export function decodeAll<T>(
    entries: StoredEntry[],
    decode: (entry: StoredEntry, payload: JsonObject) => T
): T[] {
    const out: T[] = [];
    for (const entry of entries) {
        const payload = parsePayload(entry.content);
        if (payload) out.push(decode(entry, payload));
    }
    return out;
}

const stringList = (v: unknown): string[] =>
    Array.isArray(v)
        ? v.map((x) => asString(x) ?? JSON.stringify(x) ?? "null")
        : [];

export function decodeRequest(entry: StoredEntry, c: JsonObject): RequestRecord {
    return {
        uuid: entry.uuid,
        createdAt: entry.createdAt,
        method: asString(c.method) ?? "UNKNOWN",
        uri: asString(c.uri) ?? "UNKNOWN",
        status: asNumber(pick(c, FIELD_CHAINS.requestStatus)),
        duration: asNumber(c.duration),
        ipAddress: asString(c.ip_address),
        userId: asString(pick(c, FIELD_CHAINS.userId)),
        userAgent: asString(c.user_agent) ?? asString(readPath(c, "headers.user-agent"))
    };
}

export function decodeQuery(entry: StoredEntry, c: JsonObject): QueryRecord {
    return {
        uuid: entry.uuid,
        createdAt: entry.createdAt,
        sql: asString(c.sql) ?? "UNKNOWN",
        duration: asNumber(pick(c, FIELD_CHAINS.queryTime)),
        connectionName: asString(c.connection_name) ?? asString(c.connection),
        bindings: stringList(c.bindings)
    };
}

export function decodeJob(entry: StoredEntry, c: JsonObject): JobRecord {
    const jobClass = asString(pick(c, FIELD_CHAINS.jobName)) ?? "UNKNOWN";
    const rawStatus = asString(c.status) ?? "unknown";
    const exception = c.exception;
    return {
        uuid: entry.uuid,
        createdAt: entry.createdAt,
        jobClass,
        jobName: shortClassName(jobClass),
        queue: asString(c.queue) ?? "default",
        status: parseJobStatus(rawStatus),
        rawStatus,
        connection: asString(c.connection),
        tries: asNumber(c.tries),
        maxTries: asNumber(c.maxTries),
        timeout: asNumber(c.timeout),
        failedAt: asString(c.failed_at),
        exception: isObject(exception)
            ? asString(exception.message) ?? asString(exception.class)
            : asString(exception)
    };
}

export function decodeCache(entry: StoredEntry, c: JsonObject): CacheRecord {
    const rawOperation = asString(c.type) ?? "unknown";
    return {
        uuid: entry.uuid,
        createdAt: entry.createdAt,
        operation: parseCacheOperation(rawOperation),
        rawOperation,
        key: asString(c.key) ?? "UNKNOWN",
        value: c.value ?? null,
        result: c.result ?? null,
        expiration: asNumber(c.expiration),
        tags: stringList(c.tags)
    };
}

function decodeTrace(v: unknown): TraceFrame[] {
    if (!Array.isArray(v)) return [];
    return v.filter(isObject).map((frame) => {
        const fn = asString(frame.function);
        const cls = asString(frame.class);
        return {
            file: asString(frame.file) ?? "[internal]",
            line: asNumber(frame.line),
            call: fn ? (cls ? `${cls}${asString(frame.type) ?? "::"}${fn}` : fn) : null
        };
    });
}

export function decodeException(entry: StoredEntry, c: JsonObject): ExceptionRecord {
    return {
        uuid: entry.uuid,
        sequence: entry.sequence,
        batchId: entry.batchId,
        createdAt: entry.createdAt,
        exceptionClass: asString(c.class) ?? "UNKNOWN",
        message: asString(c.message) ?? "UNKNOWN",
        file: asString(c.file) ?? "UNKNOWN",
        line: asNumber(c.line),
        level: parseLevel(asString(c.level)),
        trace: decodeTrace(c.trace),
        context: isObject(c.context) ? c.context : {}
    };
}

/** Method/URI snippet for raw listings; null fields when absent. */
export function payloadPreview(content: string): { method: string | null; uri: string | null } {
    const c = parsePayload(content);
    return {
        method: c ? asString(c.method) : null,
        uri: c ? asString(c.uri) : null
    };
}

/** Kind-specific record for any entry; null when the payload is unreadable. */
export function decodeEntry(entry: StoredEntry): DecodedEntry | null {
    const c = parsePayload(entry.content);
    if (!c) return null;
    switch (entry.kind) {
        case "request":
            return { kind: "request", record: decodeRequest(entry, c) };
        case "query":
            return { kind: "query", record: decodeQuery(entry, c) };
        case "job":
            return { kind: "job", record: decodeJob(entry, c) };
        case "cache":
            return { kind: "cache", record: decodeCache(entry, c) };
        case "exception":
            return { kind: "exception", record: decodeException(entry, c) };
        case "other":
            return { kind: "other", entry };
    }
}
