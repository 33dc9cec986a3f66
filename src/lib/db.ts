import fs from "fs"
import path from "path"
import Database from "better-sqlite3"
import { DEFAULT_SKILLBOOK_CONFIG, resolveDbPath, type SkillbookConfig } from "./config"
import { ioError, wrapDbError } from "./errors"
import { createLogger } from "./logger"
import { migrate } from "./migrate"
import { migrateFromFiles } from "./migrate-files"

export type DatabaseConnection = Database.Database

export type OpenDatabaseOptions = {
  path?: string
  config?: SkillbookConfig
  migrate?: boolean
}

export const MEMORY_DB_PATH = ":memory:"

const log = createLogger("db")

export function ensureParentDir(filePath: string) {
  const dir = path.dirname(filePath)
  try {
    fs.mkdirSync(dir, { recursive: true })
  } catch (error) {
    throw ioError(`create database directory ${dir}`, error)
  }
}

export function runConfiguredMigrations(db: DatabaseConnection, config: SkillbookConfig) {
  if (config.database.migrationSource === "files") {
    migrateFromFiles(db)
  } else {
    migrate(db)
  }
}

export function openDatabase(options: OpenDatabaseOptions = {}): DatabaseConnection {
  const config = options.config ?? DEFAULT_SKILLBOOK_CONFIG
  const dbPath = options.path ?? resolveDbPath(config)
  const inMemory = dbPath === MEMORY_DB_PATH
  if (!inMemory) ensureParentDir(dbPath)

  let db: DatabaseConnection
  try {
    db = new Database(dbPath)
  } catch (error) {
    throw wrapDbError("open database", error, { path: dbPath })
  }
  try {
    db.pragma("foreign_keys = ON")
    if (!inMemory) db.pragma("journal_mode = WAL")
  } catch (error) {
    db.close()
    throw wrapDbError("configure database", error, { path: dbPath })
  }

  if (options.migrate ?? config.database.autoMigrate) {
    try {
      runConfiguredMigrations(db, config)
    } catch (error) {
      db.close()
      log.error("migration failed; connection closed", { path: dbPath })
      throw error
    }
  }

  log.debug("database opened", { path: dbPath })
  return db
}
