import type { SuspicionReason } from "../types/telescope";
import type {
    CacheReport,
    JobReport,
    UserActivityReport
} from "../types/telescope-service";
import {
    filterLabel,
    jobIcon,
    lines,
    ms,
    pct,
    shortId,
    statusIcon,
    truncate
} from "./format";

const VALUE_PREVIEW = 80;
const USER_AGENT_PREVIEW = 100;

const REASON_TEXT: Record<SuspicionReason, string> = {
    client_error: "client error",
    sensitive_endpoint: "sensitive endpoint",
    slow_response: "slow response"
};

export function jobsReport(report: JobReport, limit: number): string {
    const filters = filterLabel({
        status: report.status,
        queue: report.queue,
        hours: report.hours
    });
    if (report.jobs.length === 0) {
        return `📭 No jobs found (${filters}).`;
    }
    const blocks = report.jobs.map((j) =>
        lines(
            `${jobIcon(j.status)} ${j.jobName}`,
            `   Class: ${j.jobClass}`,
            `   Queue: ${j.queue}${j.connection ? ` (${j.connection})` : ""}`,
            `   Status: ${j.rawStatus}`,
            j.tries !== null
                ? `   Tries: ${j.tries}${j.maxTries !== null ? `/${j.maxTries}` : ""}`
                : null,
            j.timeout !== null ? `   Timeout: ${j.timeout}s` : null,
            j.failedAt ? `   Failed at: ${j.failedAt}` : null,
            j.exception ? `   Error: ${truncate(j.exception, 200)}` : null,
            `   Time: ${j.createdAt}`,
            `   UUID: ${shortId(j.uuid)}`
        )
    );
    const c = report.counts;
    return lines(
        `⚙️ Queue Jobs (${filters}, showing ${report.jobs.length} of ${limit}):`,
        `   ✅ processed ${c.processed} · ⏳ pending ${c.pending} · ❌ failed ${c.failed} · ❓ unknown ${c.unknown}`,
        "",
        blocks.join("\n\n")
    );
}

const preview = (v: unknown): string => {
    const text = typeof v === "string" ? v : JSON.stringify(v) ?? String(v);
    return truncate(text, VALUE_PREVIEW);
};

export function cacheReport(report: CacheReport, limit: number): string {
    const filters = filterLabel({ operation: report.operation, hours: report.hours });
    const sections: string[] = [];

    if (report.entries.length === 0) {
        sections.push(`📭 No cache operations found (${filters}).`);
    } else {
        sections.push(
            lines(
                `🗄️ Cache Operations (${filters}, showing ${report.entries.length} of ${limit}):`,
                "",
                report.entries
                    .map((e) =>
                        lines(
                            `🔸 ${e.rawOperation.toUpperCase()} ${e.key}`,
                            e.value !== null ? `   Value: ${preview(e.value)}` : null,
                            e.expiration !== null ? `   Expires in: ${e.expiration}s` : null,
                            e.tags.length ? `   Tags: ${e.tags.join(", ")}` : null,
                            `   Time: ${e.createdAt}`,
                            `   UUID: ${shortId(e.uuid)}`
                        )
                    )
                    .join("\n\n")
            )
        );
    }

    const s = report.summary;
    if (s) {
        sections.push(
            lines(
                `📊 Cache Summary (last ${report.hours}h)`,
                `   Total operations: ${s.total}`,
                `   Hits: ${s.hits} (${pct(s.hitRate)})`,
                `   Misses: ${s.misses} (${pct(s.missRate)})`,
                `   Writes: ${s.writes}`,
                `   Deletes: ${s.deletes}`,
                s.operations.length
                    ? `   By operation: ${s.operations.map((o) => `${o.operation}=${o.count}`).join(", ")}`
                    : null,
                s.topKeys.length ? "   Top keys:" : null,
                ...s.topKeys.map((k) => `     ${k.key} (${k.count})`)
            )
        );
    }

    return sections.join("\n\n");
}

export function userActivityReport(report: UserActivityReport, limit: number): string {
    const filters = filterLabel({
        user_id: report.userId,
        hours: report.hours,
        include_anonymous: report.includeAnonymous,
        suspicious_only: report.suspiciousOnly
    });
    const title = report.userId
        ? `👤 Activity for user ${report.userId}`
        : "👥 User Activity";

    const st = report.stats;
    const stats = lines(
        "📊 Statistics",
        `   Requests: ${st.totalRequests}`,
        `   Unique IPs: ${st.uniqueIps}`,
        `   Unique users: ${st.uniqueUsers}`,
        `   Avg duration: ${st.avgDuration}ms`,
        `   Errors: ${st.errorCount} (${pct(st.errorRate)})`,
        st.firstActivity ? `   First activity: ${st.firstActivity}` : null,
        st.lastActivity ? `   Last activity: ${st.lastActivity}` : null,
        report.session ? `   Session duration: ${report.session.formatted}` : null,
        st.topUris.length
            ? `   Top URIs: ${st.topUris.map((u) => `${u.key} (${u.count})`).join(", ")}`
            : null
    );

    if (report.activities.length === 0) {
        const what = report.suspiciousOnly ? "suspicious activity" : "user activity";
        return `📭 No ${what} found (${filters}).\n\n${stats}`;
    }

    const suspicious = report.activities.filter((a) => a.suspicious).length;
    const blocks = report.activities.map((a) =>
        lines(
            `${a.suspicious ? "🚩" : statusIcon(a.status)} ${a.method} ${a.uri}`,
            `   Status: ${a.status ?? "Unknown"}`,
            a.userId ? `   User ID: ${a.userId}` : "   User: anonymous",
            a.ipAddress ? `   IP: ${a.ipAddress}` : null,
            a.userAgent ? `   User agent: ${truncate(a.userAgent, USER_AGENT_PREVIEW)}` : null,
            a.duration !== null ? `   Duration: ${ms(a.duration)}` : null,
            a.suspicious
                ? `   Suspicious: ${a.reasons.map((r) => REASON_TEXT[r]).join(", ")}`
                : null,
            `   Time: ${a.createdAt}`
        )
    );
    return lines(
        `${title} (${filters}, showing ${report.activities.length} of ${limit}, ${suspicious} suspicious):`,
        "",
        blocks.join("\n\n"),
        "",
        stats
    );
}
