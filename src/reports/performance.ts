import type { PerformanceFlag, PerformanceSummary } from "../types/telescope-service";
import { lines, pct, truncate } from "./format";

const EXPENSIVE_SQL_PREVIEW = 50;

const FLAG_TEXT: Record<PerformanceFlag, (s: PerformanceSummary) => string> = {
    high_error_rate: (s) =>
        `🔴 Error rate ${pct(s.requests.errorRate)} is above the ${pct(s.thresholds.errorRatePct)} threshold`,
    slow_responses: (s) =>
        `🟠 Average response ${s.requests.avgDuration}ms is above ${s.thresholds.slowRequestMs}ms`,
    slow_queries: (s) =>
        `🟠 ${s.database.slowCount} of ${s.database.total} queries took over ${s.database.slowThresholdMs}ms`,
    low_cache_hit_rate: (s) => `🟡 Cache hit rate is low (${pct(s.cache.hitRate)})`,
    queue_failures: (s) => `🔴 ${s.queue.failedCount} failed jobs in the queue`,
    critical_exceptions: (s) => `🔴 ${s.errors.critical} critical exceptions recorded`
};

export function performanceReport(s: PerformanceSummary): string {
    const d = s.includeDetails;
    const { requests, database, queue, cache, errors } = s;

    const sections = [
        lines(
            "🌐 Requests",
            `   Total: ${requests.total}`,
            `   Success: ${requests.successCount} (${pct(requests.successRate)})`,
            `   Error rate: ${pct(requests.errorRate)}`,
            `   Avg duration: ${requests.avgDuration}ms`,
            `   Slow (>${s.thresholds.slowRequestMs}ms): ${requests.slowCount}`,
            `   Peak hour: ${requests.peak.label} (${requests.peak.count} requests)`
        ),
        lines(
            "💾 Database",
            `   Queries: ${database.total}`,
            `   Avg time: ${database.avgTime}ms`,
            `   Slow (>${database.slowThresholdMs}ms): ${database.slowCount}`,
            d && database.mostExpensive
                ? `   Most expensive: ${truncate(database.mostExpensive.sql, EXPENSIVE_SQL_PREVIEW)} (${database.mostExpensive.duration}ms)`
                : null
        ),
        lines(
            "⚙️ Queue",
            `   Jobs: ${queue.total}`,
            `   Processed: ${queue.processedCount} (${pct(queue.successRate)})`,
            `   Failed: ${queue.failedCount}`,
            `   Avg processing: ${queue.avgProcessingSeconds}s`,
            d && queue.failedJobs.length
                ? `   Recent failures: ${queue.failedJobs.join(", ")}`
                : null
        ),
        lines(
            "🗄️ Cache",
            `   Operations: ${cache.total}`,
            `   Hits: ${cache.hits} (${pct(cache.hitRate)})`,
            `   Misses: ${cache.misses} (${pct(cache.missRate)})`,
            d && cache.mostAccessed
                ? `   Most accessed: ${cache.mostAccessed.key} (${cache.mostAccessed.count})`
                : null
        ),
        lines(
            "🚨 Errors",
            `   Exceptions: ${errors.total}`,
            `   Critical: ${errors.critical}, warning: ${errors.warning}, info: ${errors.info}`,
            d && errors.criticalClasses.length
                ? `   Critical classes: ${errors.criticalClasses.join(", ")}`
                : null
        )
    ];

    const health = s.flags.length
        ? lines("📈 Trends", ...s.flags.map((f) => `   ${FLAG_TEXT[f](s)}`))
        : lines("📈 Trends", "   ✅ No issues above the configured thresholds");

    return `📊 Performance Summary (last ${s.hours}h)\n\n${[...sections, health].join("\n\n")}`;
}
