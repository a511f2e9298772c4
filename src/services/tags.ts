import type {
    CacheOperation,
    EntryKind,
    ExceptionLevel,
    JobStatus
} from "../types/telescope";
import { ENTRY_KINDS } from "../types/telescope";

// Lenient parsers: anything unrecognised becomes an explicit unknown tag.

export function parseEntryKind(raw: string): EntryKind {
    const v = raw.trim().toLowerCase();
    return ENTRY_KINDS.find((k) => k === v) ?? "other";
}

const JOB_STATUSES = new Map<string, JobStatus>([
    ["pending", "pending"],
    ["queued", "pending"],
    ["processed", "processed"],
    ["completed", "processed"],
    ["failed", "failed"]
]);

export function parseJobStatus(raw: string | null): JobStatus {
    if (!raw) return "unknown";
    return JOB_STATUSES.get(raw.trim().toLowerCase()) ?? "unknown";
}

const LEVELS = new Map<string, ExceptionLevel>([
    ["emergency", "critical"],
    ["alert", "critical"],
    ["critical", "critical"],
    ["error", "error"],
    ["warning", "warning"],
    ["notice", "info"],
    ["info", "info"],
    ["debug", "debug"]
]);

/** Exceptions without a level are errors, as Telescope records them. */
export function parseLevel(raw: string | null): ExceptionLevel {
    const v = raw?.trim().toLowerCase();
    if (!v) return "error";
    return LEVELS.get(v) ?? "unknown";
}

const CACHE_OPERATIONS = new Map<string, CacheOperation>([
    ["hit", "hit"],
    ["miss", "miss"],
    ["write", "write"],
    ["put", "write"],
    ["set", "write"],
    ["forget", "forget"],
    ["delete", "forget"],
    ["flush", "forget"]
]);

export function parseCacheOperation(raw: string | null): CacheOperation {
    if (!raw) return "unknown";
    return CACHE_OPERATIONS.get(raw.trim().toLowerCase()) ?? "unknown";
}

function aliasesOf<T>(names: Map<string, T>, raw: string): string[] {
    const v = raw.trim().toLowerCase();
    const tag = names.get(v);
    if (tag === undefined) {
        return [v];
    }
    return [...names.entries()]
        .filter(([, t]) => t === tag)
        .map(([name]) => name);
}

/** Stored values, lower-cased, that parse to the given tag or alias. */
export const levelAliases = (raw: string): string[] => aliasesOf(LEVELS, raw);

/** Stored `type` values meaning the same operation, used to widen a filter. */
export const cacheOperationAliases = (raw: string): string[] =>
    aliasesOf(CACHE_OPERATIONS, raw);

export const jobStatusAliases = (raw: string): string[] =>
    aliasesOf(JOB_STATUSES, raw);
