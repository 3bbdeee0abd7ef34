/**
 * MCP server for the code knowledge graph.
 *
 * @packageDocumentation
 */

export { createKnowledgeServer, startStdioServer, SERVER_NAME, SERVER_VERSION } from "./server"
export type { KnowledgeServerOptions, RunningServer } from "./server"
export { registerKnowledgeTools, DEFAULT_QUERY_LIMIT, TOOL_NAMES } from "./tools"
export type { ToolName } from "./tools"
export {
  loadConfig,
  defaultStoragePath,
  defaultDataDirectory,
  currentHost,
  ConfigError,
  APP_DIRECTORY,
  STORAGE_FILE,
} from "./config"
export type { ServerConfig, ConfigOverrides, HostInfo } from "./config"
export * from "./formatters"
