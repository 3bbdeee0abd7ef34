#!/usr/bin/env -S npx tsx
/**
 * codememo command line
 *
 *   codememo serve [--storage <path>] [--log-level <level>] [--on-load-failure <policy>]
 *   codememo stats [--storage <path>]
 */

import "dotenv/config"
import { Command } from "commander"
import { JsonFileGateway, Logger, openKnowledgeGraph } from "@codememo/knowledge-graph"
import { loadConfig, type ConfigOverrides } from "./config"
import { formatStatistics } from "./formatters"
import { SERVER_NAME, SERVER_VERSION, startStdioServer } from "./server"

interface ServeOptions {
  storage?: string
  logLevel?: string
  onLoadFailure?: string
}

interface StatsOptions {
  storage?: string
}

async function serve(options: ServeOptions): Promise<void> {
  const overrides: ConfigOverrides = {
    storagePath: options.storage,
    logLevel: options.logLevel,
    onLoadFailure: options.onLoadFailure,
  }
  const config = loadConfig(process.env, overrides)
  const logger = new Logger({ level: config.logLevel, scope: SERVER_NAME })
  const running = await startStdioServer(config, logger)

  const shutdown = (signal: NodeJS.Signals): void => {
    logger.info(`Received ${signal}, shutting down`)
    running.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error("Shutdown failed", error)
        process.exit(1)
      },
    )
  }
  process.once("SIGINT", shutdown)
  process.once("SIGTERM", shutdown)
}

async function stats(options: StatsOptions): Promise<void> {
  const config = loadConfig(process.env, { storagePath: options.storage })
  const logger = new Logger({ level: "warn", scope: SERVER_NAME })
  const graph = await openKnowledgeGraph({ gateway: new JsonFileGateway(config.storagePath), logger })
  try {
    console.log(`Storage: ${graph.location}\n`)
    console.log(formatStatistics(await graph.getKnowledgeStatistics()))
  } finally {
    await graph.close()
  }
}

const program = new Command()

program.name(SERVER_NAME).description("Code knowledge graph served over MCP").version(SERVER_VERSION)

program
  .command("serve", { isDefault: true })
  .description("Start the MCP server on stdio")
  .option("-s, --storage <path>", "knowledge graph file")
  .option("-l, --log-level <level>", "debug, info, warn, error or silent")
  .option("--on-load-failure <policy>", "fail or start-empty")
  .action(async (options: ServeOptions) => {
    await serve(options)
  })

program
  .command("stats")
  .description("Print statistics for a stored knowledge graph")
  .option("-s, --storage <path>", "knowledge graph file")
  .action(async (options: StatsOptions) => {
    await stats(options)
  })

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error))
  process.exitCode = 1
})
