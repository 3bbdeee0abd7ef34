/**
 * Knowledge Server
 *
 * Builds the MCP server around an open knowledge graph and manages
 * the stdio lifecycle for the CLI.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js"
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js"
import { JsonFileGateway, Logger, openKnowledgeGraph, type KnowledgeGraph } from "@codememo/knowledge-graph"
import type { ServerConfig } from "./config"
import { registerKnowledgeTools } from "./tools"

export const SERVER_NAME = "codememo"
export const SERVER_VERSION = "0.1.0"

export interface KnowledgeServerOptions {
  logger?: Logger
  name?: string
  version?: string
}

/**
 * An MCP server exposing every knowledge tool over the given graph.
 * The caller keeps ownership of the graph.
 */
export function createKnowledgeServer(graph: KnowledgeGraph, options: KnowledgeServerOptions = {}): McpServer {
  const server = new McpServer({
    name: options.name ?? SERVER_NAME,
    version: options.version ?? SERVER_VERSION,
  })
  registerKnowledgeTools(server, graph, options.logger ?? new Logger({ scope: SERVER_NAME }))
  return server
}

export interface RunningServer {
  graph: KnowledgeGraph
  server: McpServer
  /** Close the transport, then the graph */
  stop(): Promise<void>
}

/**
 * Open the configured graph and serve it on stdin/stdout.
 */
export async function startStdioServer(config: ServerConfig, logger: Logger): Promise<RunningServer> {
  const graph = await openKnowledgeGraph({
    gateway: new JsonFileGateway(config.storagePath),
    logger,
    onLoadFailure: config.onLoadFailure,
  })
  logger.info(`Using knowledge graph storage at: ${graph.location}`)

  const server = createKnowledgeServer(graph, { logger })
  await server.connect(new StdioServerTransport())
  logger.info("Knowledge server listening on stdio")

  let stopping: Promise<void> | undefined
  const stop = (): Promise<void> => {
    stopping ??= (async () => {
      await server.close()
      await graph.close()
    })()
    return stopping
  }

  return { graph, server, stop }
}
