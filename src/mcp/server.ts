import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import { createServer as createHttpServer, type ServerResponse } from "node:http";
import { randomUUID } from "node:crypto";
import { createLogger, newCorrelationId, withCorrelationId, type Logger } from "../shared/logging.js";
import { err, type Result } from "../shared/Result.js";
import type { HttpTransportConfig, RuntimeConfig } from "../config/runtime.js";
import { PROJECT_NAME } from "../config/constants.js";
import { PACKAGE_VERSION } from "../shared/version.js";
import { registerTools, type RegisteredTool, type ToolDependencies } from "./tools/registerTools.js";

type ToolListEntry = {
  name: string;
  description: string;
  annotations: RegisteredTool["annotations"];
  inputSchema: RegisteredTool["inputJsonSchema"];
};

export type CallToolOutcome = {
  content: { type: "text"; text: string }[];
  structuredContent: Result<unknown>;
  isError: boolean;
};

const logger = createLogger("mcp.server");

function buildToolList(tools: RegisteredTool[]): ToolListEntry[] {
  return tools.map(tool => ({
    name: tool.name,
    description: tool.description,
    annotations: tool.annotations,
    inputSchema: tool.inputJsonSchema
  }));
}

function toOutcome(result: Result<unknown>): CallToolOutcome {
  return {
    content: [{ type: "text", text: JSON.stringify(result) }],
    structuredContent: result,
    isError: result.isError
  };
}

/** Runs a tool by name. Anything a tool throws becomes an UNKNOWN error result. */
export async function callTool(
  toolMap: ReadonlyMap<string, RegisteredTool>,
  name: string,
  args: unknown,
  runtime: RuntimeConfig
): Promise<CallToolOutcome> {
  const tool = toolMap.get(name);
  if (!tool) {
    logger.warn("tool_missing", { tool: name });
    return toOutcome(err("NOT_FOUND", `Tool ${name} not found`));
  }
  try {
    const outcome = await tool.execute(args ?? {}, { runtime });
    logger.info("tool_invocation_completed", { tool: name, isError: outcome.isError });
    return toOutcome(outcome);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    logger.error("tool_invocation_failed", { tool: name, reason });
    return toOutcome(err("UNKNOWN", reason));
  }
}

export function createMcpServer(runtime: RuntimeConfig, deps?: ToolDependencies): { server: Server; tools: RegisteredTool[] } {
  const server = new Server({ name: PROJECT_NAME, version: PACKAGE_VERSION }, { capabilities: { tools: {} } });
  const tools = registerTools(deps);
  const toolMap = new Map<string, RegisteredTool>(tools.map(tool => [tool.name, tool]));

  server.setRequestHandler(ListToolsRequestSchema, async () =>
    withCorrelationId(newCorrelationId(), async () => {
      logger.info("list_tools_requested");
      return { tools: buildToolList(tools) };
    })
  );

  server.setRequestHandler(CallToolRequestSchema, async request =>
    withCorrelationId(newCorrelationId(), async () => {
      logger.info("tool_invocation_received", { tool: request.params.name });
      return callTool(toolMap, request.params.name, request.params.arguments, runtime);
    })
  );

  return { server, tools };
}

function applyCorsHeaders(response: ServerResponse, config: HttpTransportConfig): void {
  response.setHeader("Access-Control-Allow-Origin", config.corsAllowOrigin);
  response.setHeader("Access-Control-Allow-Headers", config.corsAllowHeaders);
  response.setHeader("Access-Control-Allow-Methods", config.corsAllowMethods);
  response.setHeader("Access-Control-Max-Age", "600");
}

async function startHttpServer(server: Server, tools: RegisteredTool[], transportConfig: HttpTransportConfig): Promise<void> {
  const transport = new StreamableHTTPServerTransport({
    sessionIdGenerator: () => randomUUID(),
    enableJsonResponse: transportConfig.enableJsonResponse
  });
  transport.onerror = error => {
    logger.error("http_transport_error", { reason: error.message });
  };
  await server.connect(transport);
  const httpServer = createHttpServer(async (request, response) => {
    applyCorsHeaders(response, transportConfig);
    if (request.method === "OPTIONS") {
      response.writeHead(204);
      response.end();
      return;
    }
    try {
      await transport.handleRequest(request, response);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.error("http_request_failed", { reason });
      if (!response.headersSent) {
        response.writeHead(500, { "content-type": "application/json" });
        response.end(
          JSON.stringify({
            jsonrpc: "2.0",
            error: { code: -32000, message: "Internal Server Error" },
            id: null
          })
        );
      }
    }
  });

  await new Promise<void>((resolve, reject) => {
    httpServer.on("error", reject);
    httpServer.listen(transportConfig.port, transportConfig.host, () => {
      resolve();
    });
  });

  logger.info("server_started", {
    transport: "http",
    tools: tools.map(tool => tool.name),
    host: transportConfig.host,
    port: transportConfig.port
  });
}

function installShutdownHandlers(server: Server, log: Logger): void {
  let shuttingDown = false;
  const shutdown = async (signal?: NodeJS.Signals) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    log.info("shutdown_begin", signal ? { signal } : undefined);
    try {
      await server.close();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      log.error("shutdown_error", { reason });
    } finally {
      process.exit(0);
    }
  };
  process.once("SIGINT", () => {
    void shutdown("SIGINT");
  });
  process.once("SIGTERM", () => {
    void shutdown("SIGTERM");
  });
}

async function startStdioServer(server: Server, tools: RegisteredTool[]): Promise<void> {
  const transport = new StdioServerTransport();
  transport.onerror = error => {
    logger.error("stdio_transport_error", { reason: error.message });
  };
  await server.connect(transport);
  logger.info("server_started", { transport: "stdio", tools: tools.map(tool => tool.name) });
}

export async function startServer(runtime: RuntimeConfig): Promise<void> {
  const { server, tools } = createMcpServer(runtime);
  installShutdownHandlers(server, logger);
  if (runtime.transport.kind === "http") {
    await startHttpServer(server, tools, runtime.transport);
  } else {
    await startStdioServer(server, tools);
  }
}
