#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  ConfigError,
  getMaskedConfig,
  loadConfig,
  validateConfig,
} from "./utils/config.js";
import { createLogger, type Logger } from "./utils/logger.js";
import { TesClient } from "./tes/client.js";
import type { ToolContext } from "./tools/context.js";
import { HttpServer } from "./server/http.js";
import { TOOL_NAMES, createMcpServer } from "./server/mcp-server.js";

// Until the config says otherwise, stdout may belong to the stdio transport.
// No pino-pretty worker here: this logger is replaced once config loads.
let logger: Logger = createLogger({ destination: "stderr", pretty: false });

async function main() {
  // 1. Load configuration
  const config = loadConfig();
  const stdio = config.server.transport === "stdio";
  logger = createLogger({
    level: config.log_level,
    destination: stdio ? "stderr" : "stdout",
  });

  logger.info("Starting TES Task MCP Server");
  logger.info({ config: getMaskedConfig(config) }, "Server configuration");

  // 2. Validate environment
  logger.info("Validating environment configuration...");
  const { errors, warnings } = validateConfig(config);
  for (const warning of warnings) {
    logger.warn(warning);
  }

  let client: TesClient | undefined;
  if (errors.length === 0) {
    client = TesClient.fromConfig(config.tes, logger.child({ component: "tes-client" }));
    if (!(await client.healthCheck())) {
      errors.push(`TES service at ${config.tes.url} is not accessible.`);
    }
  }

  if (!client || errors.length > 0) {
    logger.error("Environment validation failed:");
    for (const error of errors) {
      logger.error(error);
    }
    logger.error("Please fix the above issues before starting the server.");
    process.exit(1);
  }
  logger.info("Environment validation successful");

  // 3. Tool context
  const ctx: ToolContext = {
    client,
    logger: logger.child({ component: "tools" }),
    pollIntervalSeconds: config.polling.interval_seconds,
  };

  logger.info({ tesUrl: config.tes.url, tools: TOOL_NAMES }, "Available tools registered");

  // 4. Transport
  let stop: () => Promise<void>;
  if (stdio) {
    const server = createMcpServer(ctx);
    await server.connect(new StdioServerTransport());
    logger.info("MCP server listening on stdio");
    stop = () => server.close();
  } else {
    const httpServer = new HttpServer(ctx);
    await httpServer.start(config.server.port, config.server.host);
    stop = () => httpServer.stop();
  }

  // 5. Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info({ signal }, "Received shutdown signal");
    await stop();
    logger.info("Shutdown complete");
    process.exit(0);
  };

  process.on("SIGTERM", () => {
    shutdown("SIGTERM").catch((err: unknown) => {
      logger.error({ error: err }, "Error during shutdown");
      process.exit(1);
    });
  });
  process.on("SIGINT", () => {
    shutdown("SIGINT").catch((err: unknown) => {
      logger.error({ error: err }, "Error during shutdown");
      process.exit(1);
    });
  });
}

main().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    for (const issue of err.issues) {
      logger.error(issue);
    }
    logger.fatal("Invalid configuration");
  } else {
    logger.fatal({ error: err }, "Failed to start server");
  }
  process.exit(1);
});
