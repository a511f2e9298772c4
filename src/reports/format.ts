import type { ExceptionLevel, JobStatus } from "../types/telescope";
import type { WindowNote } from "../types/telescope-service";

export const shortId = (uuid: string): string => `${uuid.slice(0, 8)}...`;

export function truncate(text: string, max: number): string {
    const t = text.trim();
    return t.length > max ? `${t.slice(0, max)}...` : t;
}

export function statusIcon(status: number | null): string {
    if (status === null) return "❓";
    if (status >= 200 && status < 300) return "✅";
    if (status >= 300 && status < 400) return "🔄";
    if (status >= 400 && status < 500) return "⚠️";
    if (status >= 500) return "❌";
    return "❓";
}

const LEVEL_ICONS: Record<ExceptionLevel, string> = {
    critical: "🔴",
    error: "🟠",
    warning: "🟡",
    info: "🔵",
    debug: "⚪",
    unknown: "❓"
};

export const levelIcon = (level: ExceptionLevel): string => LEVEL_ICONS[level];

const JOB_ICONS: Record<JobStatus, string> = {
    pending: "⏳",
    processed: "✅",
    failed: "❌",
    unknown: "❓"
};

export const jobIcon = (status: JobStatus): string => JOB_ICONS[status];

export const ms = (v: number | null): string => (v === null ? "Unknown" : `${v}ms`);

export const pct = (v: number): string => `${v}%`;

export const plural = (n: number, word: string): string =>
    `${n} ${word}${n === 1 ? "" : "s"}`;

export function windowLabel(w: WindowNote): string {
    if (!w.recognized && w.token !== null) {
        return `last ${w.hours}h ("${w.token}" not recognised, using the default)`;
    }
    return `last ${w.hours}h`;
}

/** "status=failed, queue=emails", or "no filters". */
export function filterLabel(filters: Record<string, string | number | boolean | null>): string {
    const parts = Object.entries(filters)
        .filter(([, v]) => v !== null && v !== false)
        .map(([k, v]) => (v === true ? k : `${k}=${v}`));
    return parts.length ? parts.join(", ") : "no filters";
}

/** Report body from lines; null lines are dropped. */
export const lines = (...rows: Array<string | null>): string =>
    rows.filter((r): r is string => r !== null).join("\n");
