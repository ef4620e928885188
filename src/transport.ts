import type { Server } from "node:http";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { SSEServerTransport } from "@modelcontextprotocol/sdk/server/sse.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import express from "express";
import type { Express, NextFunction, Request, Response } from "express";
import type { Logger, ServerConfig, TransportKind } from "./types";

export type Stop = () => Promise<void>;

export type Listening = {
  port: number;
  stop: Stop;
};

function describe(e: unknown) {
  return e instanceof Error ? e.message : String(e);
}

function jsonRpcError(res: Response, status: number, message: string) {
  res.status(status).json({ jsonrpc: "2.0", error: { code: -32000, message }, id: null });
}

// Stateless: every POST gets its own server and transport.
function mountStreamableHttp(app: Express, makeServer: () => McpServer, logger: Logger) {
  app.post("/mcp", async (req, res) => {
    const server = makeServer();
    const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });
    res.on("close", () => {
      Promise.all([transport.close(), server.close()]).catch((e) =>
        logger.warn(`Failed to close request transport: ${describe(e)}`)
      );
    });

    try {
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (e) {
      logger.error(`Error handling MCP request: ${describe(e)}`);
      if (!res.headersSent) jsonRpcError(res, 500, "Internal server error");
    }
  });

  app.get("/mcp", (_req, res) => jsonRpcError(res, 405, "Method not allowed."));
  app.delete("/mcp", (_req, res) => jsonRpcError(res, 405, "Method not allowed."));
}

function mountSse(app: Express, makeServer: () => McpServer, logger: Logger) {
  const sessions = new Map<string, SSEServerTransport>();

  app.get("/sse", async (_req, res) => {
    const transport = new SSEServerTransport("/messages", res);
    sessions.set(transport.sessionId, transport);
    res.on("close", () => sessions.delete(transport.sessionId));
    logger.debug(`SSE session ${transport.sessionId} opened`);
    try {
      await makeServer().connect(transport);
    } catch (e) {
      logger.error(`Error opening SSE session: ${describe(e)}`);
      if (!res.headersSent) jsonRpcError(res, 500, "Internal server error");
    }
  });

  app.post("/messages", async (req, res) => {
    const sessionId = typeof req.query.sessionId === "string" ? req.query.sessionId : "";
    const transport = sessions.get(sessionId);
    if (!transport) return jsonRpcError(res, 400, "Unknown or missing sessionId.");
    try {
      await transport.handlePostMessage(req, res, req.body);
    } catch (e) {
      logger.error(`Error handling SSE message: ${describe(e)}`);
      if (!res.headersSent) jsonRpcError(res, 500, "Internal server error");
    }
  });
}

/** Express app serving MCP over HTTP with the given transport kind. */
export function createHttpApp(
  kind: Exclude<TransportKind, "stdio">,
  makeServer: () => McpServer,
  logger: Logger
): Express {
  const app = express();
  app.use(express.json({ limit: "4mb" }));

  if (kind === "sse") mountSse(app, makeServer, logger);
  else mountStreamableHttp(app, makeServer, logger);

  app.use((_req, res) => jsonRpcError(res, 404, "Not found."));
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = err instanceof Error && "status" in err && typeof err.status === "number" ? err.status : 500;
    logger.warn(`Rejected HTTP request: ${describe(err)}`);
    if (!res.headersSent) jsonRpcError(res, status, status === 500 ? "Internal server error" : describe(err));
  });
  return app;
}

export async function listen(app: Express, host: string, port: number, logger: Logger): Promise<Listening> {
  const server: Server = await new Promise((resolve, reject) => {
    const s = app.listen(port, host, () => resolve(s));
    s.once("error", reject);
  });
  const address = server.address();
  const bound = address && typeof address !== "string" ? address.port : port;
  logger.info(`Listening on http://${host}:${bound}`);
  return {
    port: bound,
    stop: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      })
  };
}

export async function serve(config: ServerConfig, makeServer: () => McpServer, logger: Logger): Promise<Stop> {
  if (config.transport === "stdio") {
    const server = makeServer();
    await server.connect(new StdioServerTransport());
    logger.info("Serving MCP over stdio");
    return () => server.close();
  }
  const app = createHttpApp(config.transport, makeServer, logger);
  const { stop } = await listen(app, config.host, config.port, logger);
  logger.info(`Serving MCP over ${config.transport}`);
  return stop;
}
