/**
 * Server Configuration
 *
 * Environment variables (optionally from a .env file) validated with
 * zod. Command-line flags override the environment.
 *
 * | Variable                  | Default                                  |
 * |---------------------------|------------------------------------------|
 * | CODEMEMO_STORAGE_PATH     | <data dir>/codememo/knowledge.json       |
 * | CODEMEMO_LOG_LEVEL        | info                                     |
 * | CODEMEMO_ON_LOAD_FAILURE  | fail                                     |
 * | XDG_DATA_HOME             | platform data directory                  |
 */

import { existsSync } from "node:fs"
import { homedir } from "node:os"
import { join } from "node:path"
import { z } from "zod"
import { LOG_LEVELS, type LoadFailurePolicy, type LogLevel } from "@codememo/knowledge-graph"

export const APP_DIRECTORY = "codememo"
export const STORAGE_FILE = "knowledge.json"

const LOAD_FAILURE_POLICIES = ["fail", "start-empty"] as const

/** Blank variables count as unset. */
const optionalString = z.preprocess(
  (value) => (typeof value === "string" && value.trim() === "" ? undefined : value),
  z.string().trim().optional(),
)

const environmentSchema = z.object({
  CODEMEMO_STORAGE_PATH: optionalString,
  CODEMEMO_LOG_LEVEL: z.preprocess((value) => value || undefined, z.enum(LOG_LEVELS).default("info")),
  CODEMEMO_ON_LOAD_FAILURE: z.preprocess(
    (value) => value || undefined,
    z.enum(LOAD_FAILURE_POLICIES).default("fail"),
  ),
  XDG_DATA_HOME: optionalString,
})

export interface ServerConfig {
  storagePath: string
  logLevel: LogLevel
  onLoadFailure: LoadFailurePolicy
}

/**
 * Values given on the command line.
 */
export interface ConfigOverrides {
  storagePath?: string
  logLevel?: string
  onLoadFailure?: string
}

/**
 * The parts of the host that decide the default data directory.
 */
export interface HostInfo {
  platform: NodeJS.Platform
  homeDir: string
  exists(path: string): boolean
}

export const currentHost: HostInfo = {
  platform: process.platform,
  homeDir: homedir(),
  exists: existsSync,
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[],
  ) {
    super(message)
    this.name = "ConfigError"
  }
}

/**
 * Platform data directory: XDG_DATA_HOME when set, otherwise
 * AppData/Local on Windows, Library/Application Support on macOS,
 * and ~/.local/share elsewhere.
 */
export function defaultDataDirectory(xdgDataHome: string | undefined, host: HostInfo = currentHost): string {
  if (xdgDataHome) return xdgDataHome
  if (host.platform === "win32") return join(host.homeDir, "AppData", "Local")
  const library = join(host.homeDir, "Library")
  if (host.platform === "darwin" || host.exists(library)) {
    return join(library, "Application Support")
  }
  return join(host.homeDir, ".local", "share")
}

export function defaultStoragePath(xdgDataHome: string | undefined, host: HostInfo = currentHost): string {
  return join(defaultDataDirectory(xdgDataHome, host), APP_DIRECTORY, STORAGE_FILE)
}

/**
 * Resolve the server configuration.
 * @throws ConfigError listing every invalid setting
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {},
  host: HostInfo = currentHost,
): ServerConfig {
  const result = environmentSchema.safeParse({
    ...env,
    CODEMEMO_STORAGE_PATH: overrides.storagePath ?? env.CODEMEMO_STORAGE_PATH,
    CODEMEMO_LOG_LEVEL: overrides.logLevel ?? env.CODEMEMO_LOG_LEVEL,
    CODEMEMO_ON_LOAD_FAILURE: overrides.onLoadFailure ?? env.CODEMEMO_ON_LOAD_FAILURE,
  })

  if (!result.success) {
    const issues = result.error.errors.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    throw new ConfigError(`Invalid configuration:\n  ${issues.join("\n  ")}`, issues)
  }

  const settings = result.data
  return {
    storagePath: settings.CODEMEMO_STORAGE_PATH ?? defaultStoragePath(settings.XDG_DATA_HOME, host),
    logLevel: settings.CODEMEMO_LOG_LEVEL,
    onLoadFailure: settings.CODEMEMO_ON_LOAD_FAILURE,
  }
}
