import type { QueryRecord, RequestRecord } from "../types/telescope";
import type { RecentEntry, TableStatus } from "../types/telescope-service";
import { lines, ms, shortId, statusIcon, truncate } from "./format";

const SQL_PREVIEW = 200;
const BINDINGS_SHOWN = 5;

export const helloReport = (name: string): string =>
    `Hello, ${name}! Laravel Telescope MCP Server is running.`;

export function statusReport(status: TableStatus): string {
    if (!status.success) {
        return `❌ Database issue: ${status.message} (${status.connection})`;
    }
    return lines(
        "✅ Database connection successful!",
        `📊 Found ${status.count} telescope entries`,
        `🔗 Connected to: ${status.connection}`,
        status.latestEntry ? `📅 Latest entry: ${status.latestEntry}` : null
    );
}

export function recentEntriesReport(entries: RecentEntry[], limit: number): string {
    if (entries.length === 0) {
        return `📭 No telescope entries found in the database (limit ${limit}).`;
    }
    const blocks = entries.map((e) =>
        lines(
            `🔸 UUID: ${shortId(e.uuid)}`,
            `   Type: ${e.kind}`,
            `   Created: ${e.createdAt}`,
            e.method ? `   Method: ${e.method}` : null,
            e.uri ? `   URI: ${e.uri}` : null
        )
    );
    return `📊 Recent Telescope Entries (showing ${entries.length} of ${limit}):\n\n${blocks.join("\n\n")}`;
}

export function recentRequestsReport(requests: RequestRecord[], limit: number): string {
    if (requests.length === 0) {
        return `📭 No requests found in telescope entries (limit ${limit}).`;
    }
    const blocks = requests.map((r) =>
        lines(
            `${statusIcon(r.status)} ${r.method} ${r.uri}`,
            `   Status: ${r.status ?? "Unknown"}`,
            `   Time: ${r.createdAt}`,
            r.duration !== null ? `   Duration: ${ms(r.duration)}` : null,
            r.userId ? `   User ID: ${r.userId}` : null,
            r.ipAddress ? `   IP: ${r.ipAddress}` : null,
            `   UUID: ${shortId(r.uuid)}`
        )
    );
    return `🌐 Recent HTTP Requests (showing ${requests.length} of ${limit}):\n\n${blocks.join("\n\n")}`;
}

export function slowQueriesReport(
    queries: QueryRecord[],
    thresholdMs: number,
    limit: number
): string {
    if (queries.length === 0) {
        return `📊 No slow queries found above ${thresholdMs}ms threshold.`;
    }
    const blocks = queries.map((q) =>
        lines(
            `⏱️ Duration: ${ms(q.duration)}`,
            `📅 Time: ${q.createdAt}`,
            q.connectionName ? `🔗 Connection: ${q.connectionName}` : null,
            `💾 SQL: ${truncate(q.sql, SQL_PREVIEW)}`,
            q.bindings.length
                ? `🔗 Bindings: ${q.bindings.slice(0, BINDINGS_SHOWN).join(", ")}`
                : null,
            `🆔 UUID: ${shortId(q.uuid)}`
        )
    );
    return `🐌 Slow Database Queries (>${thresholdMs}ms, showing ${queries.length} of ${limit}):\n\n${blocks.join("\n\n")}`;
}
