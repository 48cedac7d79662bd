import Fastify from "fastify";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import type { Logger } from "../utils/logger.js";
import type { ToolContext } from "../tools/context.js";
import { createMcpServer } from "./mcp-server.js";

interface HealthStatus {
  status: "ok" | "degraded";
  services: Record<string, { status: string; latency?: number }>;
  uptime: number;
}

const METHOD_NOT_ALLOWED = {
  jsonrpc: "2.0",
  error: { code: -32000, message: "Method not allowed." },
  id: null,
};

/**
 * Serves the MCP tools over stateless Streamable HTTP. Every POST gets a fresh
 * server and transport, so no session state survives between requests.
 */
export class HttpServer {
  private app = Fastify({ logger: false });
  private logger: Logger;
  private ctx: ToolContext;
  private startTime = Date.now();

  constructor(ctx: ToolContext) {
    this.ctx = ctx;
    this.logger = ctx.logger.child({ component: "http" });
    this.setupRoutes();
  }

  get instance() {
    return this.app;
  }

  private setupRoutes(): void {
    this.app.get("/health", async (_request, reply) => {
      const start = Date.now();
      const healthy = await this.ctx.client.healthCheck();
      const status: HealthStatus = {
        status: healthy ? "ok" : "degraded",
        services: {
          core: { status: "running" },
          tes: healthy
            ? { status: "reachable", latency: Date.now() - start }
            : { status: "unreachable" },
        },
        uptime: (Date.now() - this.startTime) / 1000,
      };
      return reply.code(healthy ? 200 : 503).send(status);
    });

    this.app.post("/mcp", async (request, reply) => {
      const server = createMcpServer(this.ctx);
      const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });

      reply.raw.on("close", () => {
        transport.close().catch((err: unknown) => {
          this.logger.warn({ error: err }, "Failed to close MCP transport");
        });
        server.close().catch((err: unknown) => {
          this.logger.warn({ error: err }, "Failed to close MCP server");
        });
      });

      reply.hijack();
      try {
        await server.connect(transport);
        await transport.handleRequest(request.raw, reply.raw, request.body);
      } catch (err) {
        this.logger.error({ error: err }, "Error handling MCP request");
        if (!reply.raw.headersSent) {
          reply.raw.writeHead(500, { "Content-Type": "application/json" });
          reply.raw.end(
            JSON.stringify({
              jsonrpc: "2.0",
              error: { code: -32603, message: "Internal server error" },
              id: null,
            })
          );
        }
      }
    });

    this.app.get("/mcp", async (_request, reply) => reply.code(405).send(METHOD_NOT_ALLOWED));
    this.app.delete("/mcp", async (_request, reply) => reply.code(405).send(METHOD_NOT_ALLOWED));
  }

  async start(port: number, host: string): Promise<void> {
    await this.app.listen({ port, host });
    this.logger.info({ port, host }, "MCP HTTP server started");
  }

  async stop(): Promise<void> {
    await this.app.close();
    this.logger.info("MCP HTTP server stopped");
  }
}
