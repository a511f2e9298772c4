import { z } from "zod";
import {
  helloReport,
  recentEntriesReport,
  recentRequestsReport,
  slowQueriesReport,
  statusReport,
} from "../reports/entries";
import { performanceReport } from "../reports/performance";
import type { TelescopeService } from "../services/telescope-service";
import { defineTool } from "../utils/define-tools";
import type { Tool } from "../utils/define-tools";

export function createOverviewTools(telescope: TelescopeService): Tool[] {
  const hello_world = defineTool({
    name: "hello_world",
    description: "Liveness check. Returns a greeting without touching the database.",
    inputSchema: {
      name: z.string().default("World"),
    },
    failure: "Failed to greet",
    run: async ({ name }) => helloReport(name),
  });

  const telescope_status = defineTool({
    name: "telescope_status",
    description:
      "Check the database connection and the Telescope table: entry count, connection and latest entry time.",
    inputSchema: {},
    failure: "Status check failed",
    run: async () => statusReport(await telescope.status()),
  });

  const get_recent_entries = defineTool({
    name: "get_recent_entries",
    description: "Most recent Telescope entries of any type (1-50).",
    inputSchema: {
      limit: z.number().int().default(5),
    },
    failure: "Failed to fetch entries",
    run: async ({ limit }) =>
      recentEntriesReport(await telescope.recentEntries(limit), limit),
  });

  const telescope_recent_requests = defineTool({
    name: "telescope_recent_requests",
    description: "Recent HTTP requests with status, duration, user and IP (1-100).",
    inputSchema: {
      limit: z.number().int().default(10),
    },
    failure: "Failed to fetch requests",
    run: async ({ limit }) =>
      recentRequestsReport(await telescope.recentRequests(limit), limit),
  });

  const telescope_slow_queries = defineTool({
    name: "telescope_slow_queries",
    description:
      "Database queries slower than threshold_ms, slowest first, with SQL and bindings.",
    inputSchema: {
      threshold_ms: z.number().default(100),
      limit: z.number().int().default(10),
    },
    failure: "Failed to fetch slow queries",
    run: async ({ threshold_ms, limit }) =>
      slowQueriesReport(
        await telescope.slowQueries(threshold_ms, limit),
        threshold_ms,
        limit
      ),
  });

  const telescope_performance_summary = defineTool({
    name: "telescope_performance_summary",
    description:
      "Dashboard over the last N hours: requests, database, queue, cache and errors, plus trend warnings.",
    inputSchema: {
      hours: z.number().int().default(24),
      include_details: z.boolean().default(false),
      slow_threshold_ms: z.number().default(1000),
      error_rate_threshold_pct: z.number().default(5.0),
    },
    failure: "Failed to build performance summary",
    run: async (args) =>
      performanceReport(
        await telescope.performanceSummary({
          hours: args.hours,
          includeDetails: args.include_details,
          slowThresholdMs: args.slow_threshold_ms,
          errorRateThresholdPct: args.error_rate_threshold_pct,
        })
      ),
  });

  return [
    hello_world,
    telescope_status,
    get_recent_entries,
    telescope_recent_requests,
    telescope_slow_queries,
    telescope_performance_summary,
  ];
}
