import { createTelescopeService } from "../../services/telescope-service";
import { createFakeRepo } from "../../test-utils/fakes";
import type { ExceptionRecord, JobRecord, RequestRecord } from "../../types/telescope";
import type { PerformanceSummary, UserActivityReport } from "../../types/telescope-service";
import { cacheReport, jobsReport, userActivityReport } from "../activity";
import {
  recentEntriesReport,
  recentRequestsReport,
  slowQueriesReport,
  statusReport,
} from "../entries";
import { exceptionDetailReport, exceptionsReport, patternsReport, relatedLine } from "../exceptions";
import { filterLabel, statusIcon, windowLabel } from "../format";
import { performanceReport } from "../performance";

const request: RequestRecord = {
  uuid: "abcdef12-3456-4000-8000-000000000001",
  createdAt: "2026-03-01 10:00:00",
  method: "GET",
  uri: "/orders",
  status: 200,
  duration: 42,
  ipAddress: "10.0.0.1",
  userId: null,
  userAgent: null,
};

const exception: ExceptionRecord = {
  uuid: "9f1c2d3e-0000-4000-8000-000000000012",
  sequence: 12,
  batchId: "batch-9",
  createdAt: "2026-03-01 10:00:05",
  exceptionClass: "App\\Errors\\PaymentFailed",
  message: "declined",
  file: "/app/Payments.php",
  line: 88,
  level: "critical",
  trace: Array.from({ length: 12 }, (_, i) => ({
    file: `/app/f${i}.php`,
    line: i,
    call: i === 0 ? "Gateway->charge" : null,
  })),
  context: {},
};

describe("report formatting", () => {
  it("picks status icons by class", () => {
    expect([200, 301, 404, 503, null, 100].map(statusIcon)).toEqual([
      "✅",
      "🔄",
      "⚠️",
      "❌",
      "❓",
      "❓",
    ]);
  });

  it("describes filters and windows", () => {
    expect(filterLabel({ status: "failed", queue: null, suspicious_only: true, anonymous: false })).toBe(
      "status=failed, suspicious_only"
    );
    expect(filterLabel({ queue: null })).toBe("no filters");
    expect(windowLabel({ hours: 24, token: "bogus", recognized: false })).toBe(
      'last 24h ("bogus" not recognised, using the default)'
    );
  });

  describe("status", () => {
    it("reports a missing table", () => {
      expect(
        statusReport({
          success: false,
          message: "telescope_entries table not found",
          connection: "db:3306/app",
        })
      ).toBe("❌ Database issue: telescope_entries table not found (db:3306/app)");
    });

    it("omits the latest entry line on an empty table", () => {
      expect(
        statusReport({ success: true, count: 0, latestEntry: null, connection: "db:3306/app" })
      ).toBe("✅ Database connection successful!\n📊 Found 0 telescope entries\n🔗 Connected to: db:3306/app");
    });
  });

  describe("recent entries", () => {
    it("lists each entry with its request line when there is one", () => {
      const text = recentEntriesReport(
        [
          {
            sequence: 2,
            uuid: "e1e1e1e1-0000-4000-8000-000000000002",
            batchId: null,
            kind: "request",
            content: "{}",
            createdAt: "2026-03-01 10:00:00",
            method: "GET",
            uri: "/orders",
          },
          {
            sequence: 1,
            uuid: "e2e2e2e2-0000-4000-8000-000000000001",
            batchId: null,
            kind: "query",
            content: "{}",
            createdAt: "2026-03-01 09:59:00",
            method: null,
            uri: null,
          },
        ],
        5
      );
      expect(text.split("\n")).toEqual([
        "📊 Recent Telescope Entries (showing 2 of 5):",
        "",
        "🔸 UUID: e1e1e1e1...",
        "   Type: request",
        "   Created: 2026-03-01 10:00:00",
        "   Method: GET",
        "   URI: /orders",
        "",
        "🔸 UUID: e2e2e2e2...",
        "   Type: query",
        "   Created: 2026-03-01 09:59:00",
      ]);
    });

    it("names the limit on an empty table", () => {
      expect(recentEntriesReport([], 5)).toBe(
        "📭 No telescope entries found in the database (limit 5)."
      );
    });
  });

  it("renders requests", () => {
    expect(recentRequestsReport([request], 10)).toBe(
      [
        "🌐 Recent HTTP Requests (showing 1 of 10):",
        "",
        "✅ GET /orders",
        "   Status: 200",
        "   Time: 2026-03-01 10:00:00",
        "   Duration: 42ms",
        "   IP: 10.0.0.1",
        "   UUID: abcdef12...",
      ].join("\n")
    );
  });

  it("truncates SQL and bindings of slow queries", () => {
    const sql = `select ${"x".repeat(300)}`;
    const text = slowQueriesReport(
      [
        {
          uuid: "0badc0de-0000-4000-8000-000000000001",
          createdAt: "2026-03-01 10:00:00",
          sql,
          duration: 812.5,
          connectionName: "mysql",
          bindings: ["1", "2", "3", "4", "5", "6", "7"],
        },
      ],
      100,
      10
    );
    const rows = text.split("\n");
    expect(rows[0]).toBe("🐌 Slow Database Queries (>100ms, showing 1 of 10):");
    expect(rows).toContain(`💾 SQL: ${sql.slice(0, 200)}...`);
    expect(rows).toContain("🔗 Bindings: 1, 2, 3, 4, 5");
    expect(rows).toContain("⏱️ Duration: 812.5ms");
    expect(slowQueriesReport([], 250, 10)).toBe("📊 No slow queries found above 250ms threshold.");
  });

  describe("exceptions", () => {
    it("names the filters when nothing matches", () => {
      expect(
        exceptionsReport(
          {
            mode: "list",
            level: "critical",
            window: { hours: 168, token: "7d", recognized: true },
            exceptions: [],
          },
          10
        )
      ).toBe("📭 No exceptions found (level=critical, since=last 168h).");
    });

    it("renders one block per exception", () => {
      const text = exceptionsReport({ mode: "list", level: null, window: null, exceptions: [exception] }, 10);
      expect(text.split("\n")).toEqual([
        "🚨 Recent Exceptions (no filters, showing 1 of 10):",
        "",
        "🔴 PaymentFailed: declined",
        "   File: /app/Payments.php:88",
        "   Level: critical",
        "   Time: 2026-03-01 10:00:05",
        "   UUID: 9f1c2d3e...",
      ]);
    });

    it("shows up to ten trace frames with context and related entries", () => {
      const text = exceptionDetailReport({
        exception,
        includeContext: true,
        request: { ...request, method: "POST", uri: "/checkout", status: 500 },
        related: [
          {
            kind: "query",
            record: {
              uuid: "q-1",
              createdAt: "2026-03-01 10:00:04",
              sql: "select * from carts",
              duration: 3.2,
              connectionName: null,
              bindings: [],
            },
          },
        ],
      });
      const rows = text.split("\n");
      expect(rows[0]).toBe("🔴 App\\Errors\\PaymentFailed");
      expect(rows).toContain("🧵 Stack trace (12 frames):");
      expect(rows).toContain("   #0 /app/f0.php:0 Gateway->charge");
      expect(rows).toContain("   #9 /app/f9.php:9");
      expect(rows).not.toContain("   #10 /app/f10.php:10");
      expect(rows).toContain("   ... 2 more");
      expect(rows).toContain("📎 Context: none");
      expect(rows).toContain("❌ Request: POST /checkout");
      expect(rows).toContain("🔗 Related entries (1):");
      expect(rows).toContain("   💾 select * from carts (3.2ms)");
    });

    it("renders groups with their counts over the whole window", () => {
      const text = exceptionsReport(
        {
          mode: "grouped",
          level: null,
          window: null,
          groupBy: "class",
          total: 4,
          groups: [
            {
              key: "App\\Errors\\PaymentFailed",
              count: 3,
              firstOccurrence: "2026-03-01 09:00:00",
              latestOccurrence: "2026-03-01 10:00:05",
              worstLevel: "critical",
              representative: exception,
            },
            {
              key: "TypeError",
              count: 1,
              firstOccurrence: "2026-03-01 08:00:00",
              latestOccurrence: "2026-03-01 08:00:00",
              worstLevel: "error",
              representative: null,
            },
          ],
        },
        10
      );
      expect(text.split("\n")).toEqual([
        "🧩 Exceptions grouped by class (2 groups over 4 exceptions, group_by=class):",
        "",
        "🔴 App\\Errors\\PaymentFailed",
        "   Count: 3",
        "   First: 2026-03-01 09:00:00",
        "   Latest: 2026-03-01 10:00:05",
        "   Example: PaymentFailed: declined (/app/Payments.php:88)",
        "   UUID: 9f1c2d3e...",
        "",
        "🟠 TypeError",
        "   Count: 1",
        "   First: 2026-03-01 08:00:00",
        "   Latest: 2026-03-01 08:00:00",
      ]);
    });

    it("renders patterns with trend and priority", () => {
      const text = patternsReport({
        window: { hours: 24, token: "24h", recognized: true },
        groupBy: "class",
        minOccurrences: 2,
        totalExceptions: 16,
        patterns: [
          {
            key: "App\\Errors\\PaymentFailed",
            count: 12,
            firstOccurrence: "2026-03-01 09:00:00",
            latestOccurrence: "2026-03-01 10:00:05",
            worstLevel: "critical",
            representative: null,
            trend: "increasing",
            priority: "high",
          },
        ],
      });
      expect(text.split("\n")).toEqual([
        "🔍 Exception Patterns by class (last 24h, min 2, 1 pattern over 16 exceptions):",
        "",
        "🔴 App\\Errors\\PaymentFailed",
        "   Occurrences: 12",
        "   Trend: 📈 increasing",
        "   Priority: high",
        "   Level: critical",
        "   First: 2026-03-01 09:00:00",
        "   Latest: 2026-03-01 10:00:05",
      ]);
    });

    it("says when no pattern reaches the threshold", () => {
      expect(
        patternsReport({
          window: { hours: 24, token: "24h", recognized: true },
          groupBy: "class",
          minOccurrences: 2,
          patterns: [],
          totalExceptions: 0,
        })
      ).toBe("📭 No exception patterns with at least 2 occurrences in the last 24h (0 exceptions checked).");
    });

    it("summarises related jobs by short name", () => {
      const job: JobRecord = {
        uuid: "j-1",
        createdAt: "2026-03-01 10:00:00",
        jobClass: "App\\Jobs\\SendInvoice",
        jobName: "SendInvoice",
        queue: "emails",
        status: "pending",
        rawStatus: "pending",
        connection: null,
        tries: null,
        maxTries: null,
        timeout: null,
        failedAt: null,
        exception: null,
      };
      expect(relatedLine({ kind: "job", record: job })).toBe("⏳ Job SendInvoice on emails");
    });
  });

  it("renders jobs with status counts", () => {
    const text = jobsReport(
      {
        hours: 24,
        status: "failed",
        queue: null,
        counts: { pending: 0, processed: 0, failed: 1, unknown: 0 },
        jobs: [
          {
            uuid: "b7e10000-0000-4000-8000-000000000001",
            createdAt: "2026-03-01 10:00:00",
            jobClass: "App\\Jobs\\SendInvoice",
            jobName: "SendInvoice",
            queue: "emails",
            status: "failed",
            rawStatus: "failed",
            connection: "redis",
            tries: 3,
            maxTries: 5,
            timeout: null,
            failedAt: null,
            exception: "SMTP down",
          },
        ],
      },
      10
    );
    expect(text.split("\n")).toEqual([
      "⚙️ Queue Jobs (status=failed, hours=24, showing 1 of 10):",
      "   ✅ processed 0 · ⏳ pending 0 · ❌ failed 1 · ❓ unknown 0",
      "",
      "❌ SendInvoice",
      "   Class: App\\Jobs\\SendInvoice",
      "   Queue: emails (redis)",
      "   Status: failed",
      "   Tries: 3/5",
      "   Error: SMTP down",
      "   Time: 2026-03-01 10:00:00",
      "   UUID: b7e10000...",
    ]);
  });

  it("names the operation filter on an empty cache log", () => {
    expect(cacheReport({ hours: 24, operation: "put", entries: [], summary: null }, 50)).toBe(
      "📭 No cache operations found (operation=put, hours=24)."
    );
  });

  it("renders cache operations followed by the summary", () => {
    const text = cacheReport(
      {
        hours: 24,
        operation: null,
        entries: [
          {
            uuid: "c4c4c4c4-0000-4000-8000-000000000001",
            createdAt: "2026-03-01 10:00:00",
            operation: "write",
            rawOperation: "put",
            key: "settings",
            value: { theme: "dark" },
            result: null,
            expiration: 3600,
            tags: ["config"],
          },
        ],
        summary: {
          total: 5,
          hits: 3,
          misses: 1,
          writes: 1,
          deletes: 0,
          hitRate: 60,
          missRate: 20,
          topKeys: [{ key: "settings", count: 4 }],
          operations: [
            { operation: "hit", count: 3 },
            { operation: "miss", count: 1 },
            { operation: "put", count: 1 },
          ],
        },
      },
      50
    );
    expect(text.split("\n")).toEqual([
      "🗄️ Cache Operations (hours=24, showing 1 of 50):",
      "",
      "🔸 PUT settings",
      '   Value: {"theme":"dark"}',
      "   Expires in: 3600s",
      "   Tags: config",
      "   Time: 2026-03-01 10:00:00",
      "   UUID: c4c4c4c4...",
      "",
      "📊 Cache Summary (last 24h)",
      "   Total operations: 5",
      "   Hits: 3 (60%)",
      "   Misses: 1 (20%)",
      "   Writes: 1",
      "   Deletes: 0",
      "   By operation: hit=3, miss=1, put=1",
      "   Top keys:",
      "     settings (4)",
    ]);
  });

  it("flags suspicious activity and shows user agents", () => {
    const agent = `Mozilla/5.0 ${"x".repeat(100)}`;
    const report: UserActivityReport = {
      hours: 24,
      userId: null,
      includeAnonymous: true,
      suspiciousOnly: false,
      activities: [
        {
          uuid: "a1a1a1a1-0000-4000-8000-000000000001",
          createdAt: "2026-03-01 10:00:00",
          method: "POST",
          uri: "/admin/login",
          status: 403,
          duration: 2500,
          ipAddress: "10.0.0.9",
          userId: null,
          userAgent: "curl/8.0",
          suspicious: true,
          reasons: ["client_error", "sensitive_endpoint", "slow_response"],
        },
        {
          uuid: "a2a2a2a2-0000-4000-8000-000000000002",
          createdAt: "2026-03-01 10:05:00",
          method: "GET",
          uri: "/orders",
          status: 200,
          duration: 40,
          ipAddress: null,
          userId: "42",
          userAgent: agent,
          suspicious: false,
          reasons: [],
        },
      ],
      stats: {
        totalRequests: 2,
        uniqueIps: 1,
        uniqueUsers: 1,
        avgDuration: 1270,
        errorCount: 1,
        errorRate: 50,
        firstActivity: "2026-03-01 10:00:00",
        lastActivity: "2026-03-01 10:05:00",
        topUris: [
          { key: "/admin/login", count: 1 },
          { key: "/orders", count: 1 },
        ],
      },
      session: { hours: 0, minutes: 5, seconds: 0, formatted: "5m 0s" },
    };
    expect(userActivityReport(report, 20).split("\n")).toEqual([
      "👥 User Activity (hours=24, include_anonymous, showing 2 of 20, 1 suspicious):",
      "",
      "🚩 POST /admin/login",
      "   Status: 403",
      "   User: anonymous",
      "   IP: 10.0.0.9",
      "   User agent: curl/8.0",
      "   Duration: 2500ms",
      "   Suspicious: client error, sensitive endpoint, slow response",
      "   Time: 2026-03-01 10:00:00",
      "",
      "✅ GET /orders",
      "   Status: 200",
      "   User ID: 42",
      `   User agent: Mozilla/5.0 ${"x".repeat(88)}...`,
      "   Duration: 40ms",
      "   Time: 2026-03-01 10:05:00",
      "",
      "📊 Statistics",
      "   Requests: 2",
      "   Unique IPs: 1",
      "   Unique users: 1",
      "   Avg duration: 1270ms",
      "   Errors: 1 (50%)",
      "   First activity: 2026-03-01 10:00:00",
      "   Last activity: 2026-03-01 10:05:00",
      "   Session duration: 5m 0s",
      "   Top URIs: /admin/login (1), /orders (1)",
    ]);
  });

  it("keeps statistics under an empty activity listing", () => {
    const report: UserActivityReport = {
      hours: 24,
      userId: null,
      includeAnonymous: false,
      suspiciousOnly: true,
      activities: [],
      stats: {
        totalRequests: 0,
        uniqueIps: 0,
        uniqueUsers: 0,
        avgDuration: 0,
        errorCount: 0,
        errorRate: 0,
        firstActivity: null,
        lastActivity: null,
        topUris: [],
      },
      session: null,
    };
    expect(userActivityReport(report, 20)).toBe(
      [
        "📭 No suspicious activity found (hours=24, suspicious_only).",
        "",
        "📊 Statistics",
        "   Requests: 0",
        "   Unique IPs: 0",
        "   Unique users: 0",
        "   Avg duration: 0ms",
        "   Errors: 0 (0%)",
      ].join("\n")
    );
  });

  it("reports a healthy dashboard without details", async () => {
    const summary = await createTelescopeService(createFakeRepo(), { scanLimit: 100 }).performanceSummary({
      hours: 6,
      includeDetails: false,
      slowThresholdMs: 1000,
      errorRateThresholdPct: 5,
    });
    const rows = performanceReport(summary).split("\n");
    expect(rows[0]).toBe("📊 Performance Summary (last 6h)");
    expect(rows).toContain("   Peak hour: N/A (0 requests)");
    expect(rows.slice(-2)).toEqual(["📈 Trends", "   ✅ No issues above the configured thresholds"]);
  });

  describe("performance", () => {
    const summary: PerformanceSummary = {
      hours: 6,
      includeDetails: true,
      thresholds: { slowRequestMs: 1000, errorRatePct: 5 },
      requests: {
        total: 40,
        successCount: 30,
        errorCount: 10,
        avgDuration: 1250,
        slowCount: 8,
        successRate: 75,
        errorRate: 25,
        peak: { label: "14:00", count: 12 },
      },
      database: {
        total: 50,
        avgTime: 80,
        slowCount: 9,
        mostExpensive: { sql: `select ${"c".repeat(60)}`, duration: 950 },
        slowThresholdMs: 100,
      },
      queue: {
        total: 6,
        processedCount: 4,
        failedCount: 2,
        avgTimeMs: 1500,
        failedJobs: ["SendInvoice", "SyncStock"],
        successRate: 66.7,
        avgProcessingSeconds: 1.5,
      },
      cache: {
        total: 20,
        hits: 10,
        misses: 8,
        writes: 2,
        deletes: 0,
        hitRate: 50,
        missRate: 40,
        mostAccessed: { key: "settings", count: 7 },
      },
      errors: { total: 3, critical: 1, warning: 1, info: 1, criticalClasses: ["PaymentFailed"] },
      flags: [
        "high_error_rate",
        "slow_responses",
        "slow_queries",
        "low_cache_hit_rate",
        "queue_failures",
        "critical_exceptions",
      ],
    };

    it("renders every section with details and flags", () => {
      expect(performanceReport(summary).split("\n")).toEqual([
        "📊 Performance Summary (last 6h)",
        "",
        "🌐 Requests",
        "   Total: 40",
        "   Success: 30 (75%)",
        "   Error rate: 25%",
        "   Avg duration: 1250ms",
        "   Slow (>1000ms): 8",
        "   Peak hour: 14:00 (12 requests)",
        "",
        "💾 Database",
        "   Queries: 50",
        "   Avg time: 80ms",
        "   Slow (>100ms): 9",
        `   Most expensive: select ${"c".repeat(43)}... (950ms)`,
        "",
        "⚙️ Queue",
        "   Jobs: 6",
        "   Processed: 4 (66.7%)",
        "   Failed: 2",
        "   Avg processing: 1.5s",
        "   Recent failures: SendInvoice, SyncStock",
        "",
        "🗄️ Cache",
        "   Operations: 20",
        "   Hits: 10 (50%)",
        "   Misses: 8 (40%)",
        "   Most accessed: settings (7)",
        "",
        "🚨 Errors",
        "   Exceptions: 3",
        "   Critical: 1, warning: 1, info: 1",
        "   Critical classes: PaymentFailed",
        "",
        "📈 Trends",
        "   🔴 Error rate 25% is above the 5% threshold",
        "   🟠 Average response 1250ms is above 1000ms",
        "   🟠 9 of 50 queries took over 100ms",
        "   🟡 Cache hit rate is low (50%)",
        "   🔴 2 failed jobs in the queue",
        "   🔴 1 critical exceptions recorded",
      ]);
    });

    it("leaves the detail lines out unless asked", () => {
      const rows = performanceReport({ ...summary, includeDetails: false }).split("\n");
      expect(rows).toContain("   Slow (>100ms): 9");
      expect(rows).not.toContain("   Recent failures: SendInvoice, SyncStock");
      expect(rows).not.toContain("   Most accessed: settings (7)");
      expect(rows).not.toContain("   Critical classes: PaymentFailed");
    });
  });
});
