import type { DatabaseConnection } from "./db"
import { invalidInput, notFound, wrapDbError } from "./errors"
import { createLogger } from "./logger"
import type { MigrationReport, MigrationUnit, RollbackReport } from "./models"
import { MIGRATIONS } from "./schema"

const log = createLogger("migrate")

// Tolerated during reset.
export const MISSING_OBJECT_ERROR = /no such (table|trigger|index|view)/i

function assertUnits(units: MigrationUnit[]) {
  const seen = new Set<number>()
  for (const unit of units) {
    if (!Number.isInteger(unit.version) || unit.version < 1) {
      throw invalidInput(`migration ${unit.name} has an invalid version`, { version: [String(unit.version)] })
    }
    if (seen.has(unit.version)) {
      throw invalidInput(`duplicate migration version ${unit.version}`, { version: [String(unit.version)] })
    }
    seen.add(unit.version)
  }
}

export function latestVersion(units: MigrationUnit[] = MIGRATIONS): number {
  return units.reduce((max, unit) => Math.max(max, unit.version), 0)
}

export function currentVersion(db: DatabaseConnection): number {
  try {
    const table = db
      .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'schema_version'")
      .get()
    if (!table) return 0
    const row = db.prepare<[], { version: number | null }>("SELECT MAX(version) AS version FROM schema_version").get()
    return row?.version ?? 0
  } catch (error) {
    throw wrapDbError("read schema version", error)
  }
}

export function pendingMigrations(db: DatabaseConnection, units: MigrationUnit[] = MIGRATIONS): MigrationUnit[] {
  assertUnits(units)
  const current = currentVersion(db)
  return units.filter((unit) => unit.version > current).sort((a, b) => a.version - b.version)
}

function applyUnit(db: DatabaseConnection, unit: MigrationUnit) {
  try {
    db.transaction(() => {
      for (const statement of unit.up) {
        db.exec(statement)
      }
      db.prepare("INSERT INTO schema_version (version, applied_at) VALUES (?, ?)").run(unit.version, Date.now())
    })()
  } catch (error) {
    throw wrapDbError(`apply migration ${unit.version} (${unit.name})`, error, { version: unit.version })
  }
  log.info("applied migration", { version: unit.version, name: unit.name })
}

export function migrate(db: DatabaseConnection, units: MigrationUnit[] = MIGRATIONS): MigrationReport {
  const from = currentVersion(db)
  const pending = pendingMigrations(db, units)
  if (!pending.length) {
    log.info("schema up to date", { version: from })
    return { status: "up-to-date", from, to: from, applied: [] }
  }
  for (const unit of pending) {
    applyUnit(db, unit)
  }
  return {
    status: "migrated",
    from,
    to: currentVersion(db),
    applied: pending.map((unit) => unit.version),
  }
}

export function rollback(db: DatabaseConnection, units: MigrationUnit[] = MIGRATIONS): RollbackReport {
  assertUnits(units)
  const from = currentVersion(db)
  if (from === 0) {
    return { from, to: 0, reverted: [] }
  }
  const unit = units.find((candidate) => candidate.version === from)
  if (!unit) throw notFound(`migration unit ${from}`)

  try {
    db.transaction(() => {
      db.prepare("DELETE FROM schema_version WHERE version = ?").run(unit.version)
      for (const statement of unit.down) {
        db.exec(statement)
      }
    })()
  } catch (error) {
    throw wrapDbError(`roll back migration ${unit.version} (${unit.name})`, error, { version: unit.version })
  }

  const to = currentVersion(db)
  log.info("rolled back migration", { version: unit.version, name: unit.name })
  return { from, to, reverted: [unit.version] }
}

export function execTolerant(db: DatabaseConnection, statement: string) {
  try {
    db.exec(statement)
  } catch (error) {
    if (error instanceof Error && MISSING_OBJECT_ERROR.test(error.message)) {
      log.debug("skipped missing object", { statement, reason: error.message })
      return
    }
    throw error
  }
}

export function reset(db: DatabaseConnection, units: MigrationUnit[] = MIGRATIONS): MigrationReport {
  assertUnits(units)
  const ordered = [...units].sort((a, b) => b.version - a.version)
  try {
    db.transaction(() => {
      for (const unit of ordered) {
        for (const statement of unit.down) {
          execTolerant(db, statement)
        }
      }
    })()
  } catch (error) {
    throw wrapDbError("reset schema", error)
  }
  log.info("schema reset", { units: ordered.length })
  return migrate(db, units)
}
