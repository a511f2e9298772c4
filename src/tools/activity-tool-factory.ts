import { z } from "zod";
import { cacheReport, jobsReport, userActivityReport } from "../reports/activity";
import type { TelescopeService } from "../services/telescope-service";
import { defineTool } from "../utils/define-tools";
import type { Tool } from "../utils/define-tools";

export function createActivityTools(telescope: TelescopeService): Tool[] {
  const telescope_jobs = defineTool({
    name: "telescope_jobs",
    description:
      "Queued job status over the last N hours, filtered by status (pending, processed, failed) and queue.",
    inputSchema: {
      limit: z.number().int().default(10),
      status: z.string().optional(),
      queue: z.string().optional(),
      hours: z.number().int().default(24),
    },
    failure: "Failed to fetch jobs",
    run: async (args) => jobsReport(await telescope.jobs(args), args.limit),
  });

  const telescope_cache_stats = defineTool({
    name: "telescope_cache_stats",
    description:
      "Cache operations over the last N hours with an optional hit/miss summary and top keys.",
    inputSchema: {
      limit: z.number().int().default(50),
      operation: z.string().optional().describe("hit, miss, write (put/set) or forget (delete/flush)"),
      hours: z.number().int().default(24),
      show_summary: z.boolean().default(true),
    },
    failure: "Failed to fetch cache statistics",
    run: async (args) =>
      cacheReport(
        await telescope.cacheStats({
          limit: args.limit,
          operation: args.operation,
          hours: args.hours,
          showSummary: args.show_summary,
        }),
        args.limit
      ),
  });

  const telescope_user_activity = defineTool({
    name: "telescope_user_activity",
    description:
      "Requests per user (or all authenticated users) with suspicious-activity flags and session statistics.",
    inputSchema: {
      user_id: z.union([z.string(), z.number().int()]).optional(),
      limit: z.number().int().default(20),
      hours: z.number().int().default(24),
      include_anonymous: z.boolean().default(false),
      suspicious_only: z.boolean().default(false),
    },
    failure: "Failed to fetch user activity",
    run: async (args) =>
      userActivityReport(
        await telescope.userActivity({
          userId: args.user_id === undefined ? undefined : String(args.user_id),
          limit: args.limit,
          hours: args.hours,
          includeAnonymous: args.include_anonymous,
          suspiciousOnly: args.suspicious_only,
        }),
        args.limit
      ),
  });

  return [telescope_jobs, telescope_cache_stats, telescope_user_activity];
}
