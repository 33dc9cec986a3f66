import fs from "fs"
import os from "os"
import path from "path"
import { xdgConfig } from "xdg-basedir"
import { isLogLevel, type LogLevel } from "./logger"

export type MigrationSource = "code" | "files"

export type DatabaseConfig = {
  path: string | null
  autoMigrate: boolean
  migrationSource: MigrationSource
}

export type SnippetConfig = {
  open: string
  close: string
  ellipsis: string
  tokens: number
}

export type SearchConfig = {
  maxResults: number
  snippet: SnippetConfig
}

export type LoggingConfig = {
  level: LogLevel
}

export type SkillbookConfig = {
  database: DatabaseConfig
  search: SearchConfig
  logging: LoggingConfig
}

export type LoadedSkillbookConfig = {
  path: string
  loadedFromFile: boolean
  config: SkillbookConfig
  loadError?: string
}

export const MAX_SEARCH_RESULTS = 1000
export const MAX_SNIPPET_TOKENS = 64

export const DEFAULT_SKILLBOOK_CONFIG: SkillbookConfig = {
  database: {
    path: null,
    autoMigrate: true,
    migrationSource: "code",
  },
  search: {
    maxResults: 50,
    snippet: {
      open: "[",
      close: "]",
      ellipsis: "...",
      tokens: 30,
    },
  },
  logging: {
    level: "warn",
  },
}

export function resolveConfigRoot(): string {
  const base = xdgConfig ?? path.join(os.homedir(), ".config")
  return path.join(base, "skillbook")
}

export function resolveSkillbookDir(): string {
  const override = process.env.SKILLBOOK_DIR
  if (override && override.trim()) return override.trim()
  return resolveConfigRoot()
}

export function resolveSkillbookConfigPath(): string {
  const override = process.env.SKILLBOOK_CONFIG
  if (override && override.trim()) {
    const value = override.trim()
    return path.isAbsolute(value) ? value : path.resolve(value)
  }
  return path.join(resolveSkillbookDir(), "config.json")
}

export function expandHome(value: string): string {
  if (value === "~") return os.homedir()
  if (value.startsWith("~/")) return path.join(os.homedir(), value.slice(2))
  return value
}

export function resolveDbPath(config: SkillbookConfig = DEFAULT_SKILLBOOK_CONFIG): string {
  const override = process.env.SKILLBOOK_DB
  if (override && override.trim()) return expandHome(override.trim())
  if (config.database.path) return expandHome(config.database.path)
  return path.join(resolveSkillbookDir(), "skillbook.db")
}

type RawSection = Record<string, unknown> | undefined

function cloneDefaultConfig(): SkillbookConfig {
  return {
    database: { ...DEFAULT_SKILLBOOK_CONFIG.database },
    search: {
      maxResults: DEFAULT_SKILLBOOK_CONFIG.search.maxResults,
      snippet: { ...DEFAULT_SKILLBOOK_CONFIG.search.snippet },
    },
    logging: { ...DEFAULT_SKILLBOOK_CONFIG.logging },
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value)
}

function parseBoolean(value: unknown, fallback: boolean): boolean {
  if (typeof value === "boolean") return value
  return fallback
}

function parseString(value: unknown, fallback: string): string {
  if (typeof value === "string") return value
  return fallback
}

function parseOptionalPath(value: unknown, fallback: string | null): string | null {
  if (typeof value !== "string") return fallback
  const trimmed = value.trim()
  return trimmed.length ? trimmed : null
}

function parseBoundedInt(value: unknown, fallback: number, min: number, max: number): number {
  if (typeof value !== "number" || !Number.isFinite(value)) return fallback
  const parsed = Math.trunc(value)
  if (parsed < min || parsed > max) return fallback
  return parsed
}

function parseMigrationSource(value: unknown, fallback: MigrationSource): MigrationSource {
  return value === "code" || value === "files" ? value : fallback
}

function parseDatabaseConfig(value: RawSection, fallback: DatabaseConfig): DatabaseConfig {
  return {
    path: parseOptionalPath(value?.path, fallback.path),
    autoMigrate: parseBoolean(value?.autoMigrate, fallback.autoMigrate),
    migrationSource: parseMigrationSource(value?.migrationSource, fallback.migrationSource),
  }
}

function parseSnippetConfig(value: RawSection, fallback: SnippetConfig): SnippetConfig {
  return {
    open: parseString(value?.open, fallback.open),
    close: parseString(value?.close, fallback.close),
    ellipsis: parseString(value?.ellipsis, fallback.ellipsis),
    tokens: parseBoundedInt(value?.tokens, fallback.tokens, 1, MAX_SNIPPET_TOKENS),
  }
}

function parseSearchConfig(value: RawSection, fallback: SearchConfig): SearchConfig {
  return {
    maxResults: parseBoundedInt(value?.maxResults, fallback.maxResults, 1, MAX_SEARCH_RESULTS),
    snippet: parseSnippetConfig(section(value?.snippet), fallback.snippet),
  }
}

function parseLoggingConfig(value: RawSection, fallback: LoggingConfig): LoggingConfig {
  const level = value?.level
  return {
    level: isLogLevel(level) ? level : fallback.level,
  }
}

function section(value: unknown): RawSection {
  return isRecord(value) ? value : undefined
}

function parseConfig(raw: Record<string, unknown>): SkillbookConfig {
  return {
    database: parseDatabaseConfig(section(raw.database), DEFAULT_SKILLBOOK_CONFIG.database),
    search: parseSearchConfig(section(raw.search), DEFAULT_SKILLBOOK_CONFIG.search),
    logging: parseLoggingConfig(section(raw.logging), DEFAULT_SKILLBOOK_CONFIG.logging),
  }
}

export function normalizeSkillbookConfig(raw: unknown): SkillbookConfig {
  if (!isRecord(raw)) {
    return cloneDefaultConfig()
  }
  return parseConfig(raw)
}

export function saveSkillbookConfig(config: SkillbookConfig): LoadedSkillbookConfig {
  const filePath = resolveSkillbookConfigPath()
  const normalized = normalizeSkillbookConfig(config)
  fs.mkdirSync(path.dirname(filePath), { recursive: true })
  fs.writeFileSync(filePath, `${JSON.stringify(normalized, null, 2)}\n`, "utf8")
  return {
    path: filePath,
    loadedFromFile: true,
    config: normalized,
  }
}

export function loadSkillbookConfig(): LoadedSkillbookConfig {
  const filePath = resolveSkillbookConfigPath()
  try {
    if (!fs.existsSync(filePath)) {
      return {
        path: filePath,
        loadedFromFile: false,
        config: cloneDefaultConfig(),
      }
    }
    const text = fs.readFileSync(filePath, "utf8")
    const parsed: unknown = JSON.parse(text)
    return {
      path: filePath,
      loadedFromFile: true,
      config: normalizeSkillbookConfig(parsed),
    }
  } catch (error) {
    const loadError = error instanceof Error ? error.message : String(error)
    return {
      path: filePath,
      loadedFromFile: false,
      config: cloneDefaultConfig(),
      loadError,
    }
  }
}
