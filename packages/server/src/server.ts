#!/usr/bin/env node

/**
 * MCP server for Strongbox
 * Exposes the store's record and table operations via stdio transport
 *
 * Protocol: Model Context Protocol (MCP) over stdio
 * All logging goes to stderr; stdout is reserved for protocol frames
 *
 * Environment:
 * - STRONGBOX_DATA_DIR, STRONGBOX_KEY, STRONGBOX_MAX_FILE_SIZE: store config
 * - STRONGBOX_READONLY=true: expose read operations only
 * - LOG_LEVEL: debug | info | warn | error
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ErrorCode,
  McpError,
} from "@modelcontextprotocol/sdk/types.js";
import { logger as sdkLogger, openStore, resolveConfig } from "@strongbox/sdk";
import { createDispatcher } from "./dispatcher.js";
import { StoreService } from "./service/store-service.js";
import { callTool, listTools } from "./tools.js";
import { logger } from "./observability/logger.js";

const SERVER_VERSION = "0.1.0";

async function main(): Promise<void> {
  // Store events would otherwise reach stdout and corrupt the protocol stream
  sdkLogger.setSink((_level, line) => console.error(line));

  const readOnly = process.env.STRONGBOX_READONLY === "true";
  const config = resolveConfig(process.env);
  const store = await openStore(config);
  const service = new StoreService(store, { autosave: !readOnly });
  const dispatcher = createDispatcher(service, { readOnly });

  const server = new Server(
    {
      name: "strongbox-server",
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: listTools(readOnly) }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    const result = await callTool(dispatcher, name, args);
    if (!result) {
      throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
    }
    return result;
  });

  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info("server.start", {
    mode: readOnly ? "readonly" : "readwrite",
    data_dir: config.dataDir,
    encrypted: store.encrypted,
  });

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info("server.shutdown", { signal });

    let exitCode = 0;
    try {
      await service.close();
    } catch (error) {
      exitCode = 1;
      logger.error("server.close.failed", {
        err_message: error instanceof Error ? error.message : String(error),
      });
    }

    await transport.close();
    process.exit(exitCode);
  };

  const onSignal = (signal: string): void => {
    shutdown(signal).catch((error: unknown) => {
      logger.error("server.shutdown.failed", {
        err_message: error instanceof Error ? error.message : String(error),
      });
      process.exit(1);
    });
  };

  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

main().catch((error: unknown) => {
  logger.error("server.fatal", {
    err_message: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
