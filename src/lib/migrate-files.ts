import fs from "fs"
import path from "path"
import { fileURLToPath } from "url"
import type { DatabaseConnection } from "./db"
import { invalidInput, ioError, notFound, wrapDbError } from "./errors"
import { createLogger } from "./logger"
import { execTolerant } from "./migrate"

export type MigrationFile = {
  id: string
  up: string[]
  down: string[]
}

export type FileMigrationReport = {
  status: "up-to-date" | "migrated"
  applied: string[]
}

export type FileRollbackReport = {
  reverted: string[]
}

const FILE_PATTERN = /^(\d+-[a-z0-9-]+)\.(up|down)\.sql$/
const STATEMENT_SEPARATOR = /^\s*--;;\s*$/m

const log = createLogger("migrate-files")

// Bundled output sits in dist/ at the package root; sources sit in src/lib/.
function migrationDirCandidates(moduleDir: string): string[] {
  if (path.basename(moduleDir) === "dist") return [path.resolve(moduleDir, "../migrations")]
  return [path.resolve(moduleDir, "../../migrations"), path.resolve(moduleDir, "../migrations")]
}

export function resolveMigrationsDir(moduleDir: string = path.dirname(fileURLToPath(import.meta.url))): string {
  const override = process.env.SKILLBOOK_MIGRATIONS_DIR
  if (override && override.trim()) return override.trim()
  const candidates = migrationDirCandidates(moduleDir)
  for (const candidate of candidates) {
    if (fs.existsSync(candidate)) return candidate
  }
  return candidates[0]
}

export function splitStatements(text: string): string[] {
  return text
    .split(STATEMENT_SEPARATOR)
    .map((statement) => statement.trim())
    .filter((statement) => statement.length > 0)
}

function readStatements(filePath: string): string[] {
  try {
    return splitStatements(fs.readFileSync(filePath, "utf8"))
  } catch (error) {
    throw ioError(`read migration file ${filePath}`, error)
  }
}

export function loadMigrationFiles(dir: string = resolveMigrationsDir()): MigrationFile[] {
  let entries: string[]
  try {
    entries = fs.readdirSync(dir)
  } catch (error) {
    throw ioError(`read migrations directory ${dir}`, error)
  }

  const found = new Map<string, { up?: string; down?: string }>()
  for (const entry of entries) {
    const match = FILE_PATTERN.exec(entry)
    if (!match) continue
    const [, id, direction] = match
    const pair = found.get(id) ?? {}
    if (direction === "up") pair.up = path.join(dir, entry)
    else pair.down = path.join(dir, entry)
    found.set(id, pair)
  }

  return [...found.keys()].sort().map((id) => {
    const pair = found.get(id)
    if (!pair?.up) throw invalidInput(`migration ${id} has no up file`, { [id]: ["missing .up.sql"] })
    if (!pair.down) throw invalidInput(`migration ${id} has no down file`, { [id]: ["missing .down.sql"] })
    return { id, up: readStatements(pair.up), down: readStatements(pair.down) }
  })
}

function ensureChangelog(db: DatabaseConnection) {
  try {
    db.exec(
      `CREATE TABLE IF NOT EXISTS migration_changelog (
        id TEXT PRIMARY KEY,
        applied_at INTEGER NOT NULL
      )`,
    )
  } catch (error) {
    throw wrapDbError("create migration changelog", error)
  }
}

export function appliedMigrationIds(db: DatabaseConnection): string[] {
  ensureChangelog(db)
  return db
    .prepare<[], { id: string }>("SELECT id FROM migration_changelog ORDER BY id ASC")
    .all()
    .map((row) => row.id)
}

export function migrateFromFiles(db: DatabaseConnection, dir?: string): FileMigrationReport {
  const files = loadMigrationFiles(dir)
  const applied = new Set(appliedMigrationIds(db))
  const pending = files.filter((file) => !applied.has(file.id))
  if (!pending.length) {
    log.info("schema up to date", { applied: applied.size })
    return { status: "up-to-date", applied: [] }
  }

  for (const file of pending) {
    try {
      db.transaction(() => {
        for (const statement of file.up) {
          db.exec(statement)
        }
        db.prepare("INSERT INTO migration_changelog (id, applied_at) VALUES (?, ?)").run(file.id, Date.now())
      })()
    } catch (error) {
      throw wrapDbError(`apply migration ${file.id}`, error, { id: file.id })
    }
    log.info("applied migration", { id: file.id })
  }

  return { status: "migrated", applied: pending.map((file) => file.id) }
}

export function rollbackFiles(db: DatabaseConnection, amount = 1, dir?: string): FileRollbackReport {
  if (!Number.isInteger(amount) || amount < 1) {
    throw invalidInput("rollback amount must be a positive integer", { amount: [String(amount)] })
  }
  const files = new Map(loadMigrationFiles(dir).map((file) => [file.id, file]))
  const targets = appliedMigrationIds(db).reverse().slice(0, amount)

  for (const id of targets) {
    const file = files.get(id)
    if (!file) throw notFound(`migration file ${id}`)
    try {
      db.transaction(() => {
        db.prepare("DELETE FROM migration_changelog WHERE id = ?").run(id)
        for (const statement of file.down) {
          db.exec(statement)
        }
      })()
    } catch (error) {
      throw wrapDbError(`roll back migration ${id}`, error, { id })
    }
    log.info("rolled back migration", { id })
  }

  return { reverted: targets }
}

export function resetFromFiles(db: DatabaseConnection, dir?: string): FileMigrationReport {
  const files = loadMigrationFiles(dir).reverse()
  ensureChangelog(db)
  try {
    db.transaction(() => {
      for (const file of files) {
        for (const statement of file.down) {
          execTolerant(db, statement)
        }
      }
      db.prepare("DELETE FROM migration_changelog").run()
    })()
  } catch (error) {
    throw wrapDbError("reset schema", error)
  }
  log.info("schema reset", { migrations: files.length })
  return migrateFromFiles(db, dir)
}
