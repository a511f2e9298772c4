#!/usr/bin/env node
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { describeConnection, readConfig } from "./config/config";
import { createDb } from "./db/client";
import { createEntriesRepo } from "./repositories/entries-repo";
import { createTelescopeService } from "./services/telescope-service";
import { createActivityTools } from "./tools/activity-tool-factory";
import { createExceptionTools } from "./tools/exception-tool-factory";
import { createOverviewTools } from "./tools/overview-tool-factory";
import type { Tool } from "./utils/define-tools";

async function main(): Promise<void> {
    console.error("Starting Laravel Telescope MCP Server...");

    const config = readConfig();
    const db = createDb(config.db);
    const repo = createEntriesRepo(db, config.db.table);
    const telescope = createTelescopeService(repo, { scanLimit: config.scanLimit });

    const tools: Tool[] = [
        ...createOverviewTools(telescope),
        ...createExceptionTools(telescope),
        ...createActivityTools(telescope)
    ];

    const server = new McpServer(
        {
            name: "Laravel Telescope MCP Server",
            version: "1.0.0"
        },
        {
            capabilities: {
                tools: {}
            }
        }
    );

    tools.forEach((tool) => {
        server.tool(tool.name, tool.description, tool.inputSchema, tool.handler);
    });

    const shutdown = (signal: string) => {
        console.error(`Received ${signal}, closing database connection...`);
        db.close()
            .catch((error: unknown) => {
                console.error("Error while closing the database connection:", error);
            })
            .finally(() => process.exit(0));
    };
    process.once("SIGINT", () => shutdown("SIGINT"));
    process.once("SIGTERM", () => shutdown("SIGTERM"));

    const transport = new StdioServerTransport();
    console.error("Connecting server to transport...");
    await server.connect(transport);

    console.error(
        `Telescope MCP Server running on stdio (${tools.length} tools, database ${describeConnection(config.db)}${config.isDev ? ", development" : ""})`
    );
}

main().catch((error) => {
    console.error("Fatal error in main():", error);
    process.exit(1);
});
