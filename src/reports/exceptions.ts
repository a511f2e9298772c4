import type { Priority, Trend } from "../services/aggregate";
import { shortClassName } from "../services/decode";
import type { DecodedEntry, ExceptionRecord } from "../types/telescope";
import type {
    ExceptionDetail,
    ExceptionReport,
    PatternReport
} from "../types/telescope-service";
import {
    filterLabel,
    levelIcon,
    lines,
    jobIcon,
    ms,
    plural,
    shortId,
    statusIcon,
    truncate,
    windowLabel
} from "./format";

const MESSAGE_PREVIEW = 200;
const TRACE_FRAMES = 10;
const CONTEXT_PREVIEW = 1000;

const TREND_ICONS: Record<Trend, string> = {
    increasing: "📈",
    decreasing: "📉",
    stable: "➡️"
};

const PRIORITY_ICONS: Record<Priority, string> = {
    high: "🔴",
    medium: "🟡",
    low: "🟢"
};

const location = (e: ExceptionRecord): string =>
    e.line === null ? e.file : `${e.file}:${e.line}`;

export function exceptionsReport(report: ExceptionReport, limit: number): string {
    const filters = filterLabel({
        level: report.level,
        since: report.window ? windowLabel(report.window) : null,
        group_by: report.mode === "grouped" ? report.groupBy : null
    });

    if (report.mode === "list") {
        if (report.exceptions.length === 0) {
            return `📭 No exceptions found (${filters}).`;
        }
        const blocks = report.exceptions.map((e) =>
            lines(
                `${levelIcon(e.level)} ${shortClassName(e.exceptionClass)}: ${truncate(e.message, MESSAGE_PREVIEW)}`,
                `   File: ${location(e)}`,
                `   Level: ${e.level}`,
                `   Time: ${e.createdAt}`,
                `   UUID: ${shortId(e.uuid)}`
            )
        );
        return `🚨 Recent Exceptions (${filters}, showing ${report.exceptions.length} of ${limit}):\n\n${blocks.join("\n\n")}`;
    }

    if (report.groups.length === 0) {
        return `📭 No exceptions found to group (${filters}).`;
    }
    const blocks = report.groups.map((g) => {
        const r = g.representative;
        return lines(
            `${levelIcon(g.worstLevel)} ${g.key}`,
            `   Count: ${g.count}`,
            `   First: ${g.firstOccurrence}`,
            `   Latest: ${g.latestOccurrence}`,
            r
                ? `   Example: ${shortClassName(r.exceptionClass)}: ${truncate(r.message, MESSAGE_PREVIEW)} (${location(r)})`
                : null,
            r ? `   UUID: ${shortId(r.uuid)}` : null
        );
    });
    return lines(
        `🧩 Exceptions grouped by ${report.groupBy} (${plural(report.groups.length, "group")} over ${plural(report.total, "exception")}, ${filters}):`,
        "",
        blocks.join("\n\n")
    );
}

/** One line per related entry, by kind. */
export function relatedLine(entry: DecodedEntry): string {
    switch (entry.kind) {
        case "request":
            return `🌐 ${entry.record.method} ${entry.record.uri} (${entry.record.status ?? "Unknown"})`;
        case "query":
            return `💾 ${truncate(entry.record.sql, 100)} (${ms(entry.record.duration)})`;
        case "job":
            return `${jobIcon(entry.record.status)} Job ${entry.record.jobName} on ${entry.record.queue}`;
        case "cache":
            return `🗄️ Cache ${entry.record.rawOperation} ${entry.record.key}`;
        case "exception":
            return `${levelIcon(entry.record.level)} ${shortClassName(entry.record.exceptionClass)}: ${truncate(entry.record.message, 100)}`;
        case "other":
            return `🔸 ${entry.entry.kind} entry ${shortId(entry.entry.uuid)}`;
    }
}

export function exceptionDetailReport(detail: ExceptionDetail): string {
    const e = detail.exception;
    const sections: string[] = [
        lines(
            `${levelIcon(e.level)} ${e.exceptionClass}`,
            `   Message: ${e.message}`,
            `   File: ${location(e)}`,
            `   Level: ${e.level}`,
            `   Time: ${e.createdAt}`,
            `   UUID: ${e.uuid}`,
            e.batchId ? `   Batch: ${e.batchId}` : null
        )
    ];

    if (e.trace.length) {
        const frames = e.trace.slice(0, TRACE_FRAMES).map((f, i) => {
            const at = f.line === null ? f.file : `${f.file}:${f.line}`;
            return `   #${i} ${at}${f.call ? ` ${f.call}` : ""}`;
        });
        const more = e.trace.length - frames.length;
        sections.push(
            lines(
                `🧵 Stack trace (${plural(e.trace.length, "frame")}):`,
                ...frames,
                more > 0 ? `   ... ${more} more` : null
            )
        );
    }

    if (detail.includeContext) {
        const context = Object.keys(e.context).length
            ? truncate(JSON.stringify(e.context, null, 2), CONTEXT_PREVIEW)
            : "none";
        const r = detail.request;
        sections.push(
            lines(
                `📎 Context: ${context}`,
                r
                    ? lines(
                          `${statusIcon(r.status)} Request: ${r.method} ${r.uri}`,
                          `   Status: ${r.status ?? "Unknown"}`,
                          r.duration !== null ? `   Duration: ${ms(r.duration)}` : null,
                          r.userId ? `   User ID: ${r.userId}` : null,
                          r.ipAddress ? `   IP: ${r.ipAddress}` : null
                      )
                    : "🌐 No originating request recorded"
            )
        );
    }

    if (detail.related !== null) {
        sections.push(
            detail.related.length
                ? lines(
                      `🔗 Related entries (${detail.related.length}):`,
                      ...detail.related.map((r) => `   ${relatedLine(r)}`)
                  )
                : "🔗 Related entries: none"
        );
    }

    return sections.join("\n\n");
}

export function patternsReport(report: PatternReport): string {
    const window = windowLabel(report.window);
    if (report.patterns.length === 0) {
        return `📭 No exception patterns with at least ${report.minOccurrences} occurrences in the ${window} (${plural(report.totalExceptions, "exception")} checked).`;
    }
    const blocks = report.patterns.map((p) =>
        lines(
            `${PRIORITY_ICONS[p.priority]} ${p.key}`,
            `   Occurrences: ${p.count}`,
            `   Trend: ${TREND_ICONS[p.trend]} ${p.trend}`,
            `   Priority: ${p.priority}`,
            `   Level: ${p.worstLevel}`,
            `   First: ${p.firstOccurrence}`,
            `   Latest: ${p.latestOccurrence}`
        )
    );
    return lines(
        `🔍 Exception Patterns by ${report.groupBy} (${window}, min ${report.minOccurrences}, ${plural(report.patterns.length, "pattern")} over ${plural(report.totalExceptions, "exception")}):`,
        "",
        blocks.join("\n\n")
    );
}
