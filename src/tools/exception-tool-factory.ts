import { z } from "zod";
import {
  exceptionDetailReport,
  exceptionsReport,
  patternsReport,
} from "../reports/exceptions";
import type { TelescopeService } from "../services/telescope-service";
import { defineTool } from "../utils/define-tools";
import type { Tool } from "../utils/define-tools";

const WINDOWS = "1h, 12h, 24h, 1d, 3d or 7d";

export function createExceptionTools(telescope: TelescopeService): Tool[] {
  const telescope_exceptions = defineTool({
    name: "telescope_exceptions",
    description:
      "Recent exceptions, optionally filtered by level and time window, or grouped by class, file or message.",
    inputSchema: {
      limit: z.number().int().default(10),
      level: z.string().optional(),
      since: z.string().optional().describe(`Time window: ${WINDOWS}`),
      group_by: z.string().optional().describe("class (or type), file or message"),
    },
    failure: "Failed to fetch exceptions",
    run: async ({ limit, level, since, group_by }) =>
      exceptionsReport(
        await telescope.exceptions({ limit, level, since, groupBy: group_by }),
        limit
      ),
  });

  const telescope_exception_detail = defineTool({
    name: "telescope_exception_detail",
    description:
      "One exception by uuid (or 8+ character uuid prefix) with stack trace, originating request and related entries.",
    inputSchema: {
      exception_id: z.string(),
      include_context: z.boolean().default(true),
      include_related: z.boolean().default(true),
    },
    failure: "Failed to fetch exception detail",
    run: async (args) =>
      exceptionDetailReport(
        await telescope.exceptionDetail({
          exceptionId: args.exception_id,
          includeContext: args.include_context,
          includeRelated: args.include_related,
        })
      ),
  });

  const telescope_exception_patterns = defineTool({
    name: "telescope_exception_patterns",
    description:
      "Recurring exception patterns in a time window with occurrence trend and priority.",
    inputSchema: {
      time_window: z.string().default("24h").describe(WINDOWS),
      min_occurrences: z.number().int().default(2),
      group_by: z.string().default("class"),
    },
    failure: "Failed to analyse exception patterns",
    run: async (args) =>
      patternsReport(
        await telescope.exceptionPatterns({
          timeWindow: args.time_window,
          minOccurrences: args.min_occurrences,
          groupBy: args.group_by,
        })
      ),
  });

  return [telescope_exceptions, telescope_exception_detail, telescope_exception_patterns];
}
