import { afterEach, describe, expect, test, vi } from "vitest"
import { currentVersion, latestVersion, migrate, pendingMigrations, reset, rollback } from "../src/lib/migrate"
import type { MigrationUnit } from "../src/lib/models"
import { MIGRATIONS } from "../src/lib/schema"
import { captureError, cleanupSandboxes, openBareDb, tableNames } from "./helpers"

afterEach(() => {
  cleanupSandboxes()
})

function insertRawSkill(db: ReturnType<typeof openBareDb>) {
  db.prepare(
    "INSERT INTO skills (path, category, name, content, file_hash, size_bytes) VALUES (?, ?, ?, ?, ?, ?)",
  ).run("skills/raw.md", "raw", "raw", "raw content", "hash-raw", 11)
}

describe("migrate", () => {
  test("applies every unit in ascending order on a fresh database", () => {
    const db = openBareDb()
    expect(currentVersion(db)).toBe(0)
    expect(pendingMigrations(db).map((unit) => unit.version)).toEqual([1, 2, 3])

    const report = migrate(db)

    expect(report).toEqual({ status: "migrated", from: 0, to: 3, applied: [1, 2, 3] })
    expect(currentVersion(db)).toBe(latestVersion())
    expect(pendingMigrations(db)).toEqual([])
    const tables = tableNames(db)
    for (const table of [
      "schema_version",
      "skills",
      "prompts",
      "prompt_skills",
      "skills_fts",
      "prompts_fts",
      "implementation_plans",
      "implementation_plans_fts",
      "task_lists",
      "tasks",
      "plan_skills",
      "prompt_fragments",
      "prompt_fragment_skills",
      "prompt_references",
    ]) {
      expect(tables).toContain(table)
    }
  })

  test("a second run keeps the version and executes no DDL", () => {
    const db = openBareDb()
    migrate(db)
    const exec = vi.spyOn(db, "exec")

    const report = migrate(db)

    expect(report).toEqual({ status: "up-to-date", from: 3, to: 3, applied: [] })
    expect(exec).not.toHaveBeenCalled()
    expect(currentVersion(db)).toBe(3)
  })

  test("a failing unit commits nothing and stops the remaining units", () => {
    const db = openBareDb()
    const units: MigrationUnit[] = [
      ...MIGRATIONS,
      {
        version: 4,
        name: "broken",
        up: ["CREATE TABLE extra_notes (id INTEGER PRIMARY KEY)", "CREATE TABLE broken ("],
        down: ["DROP TABLE IF EXISTS extra_notes"],
      },
      {
        version: 5,
        name: "after_broken",
        up: ["CREATE TABLE after_broken (id INTEGER PRIMARY KEY)"],
        down: ["DROP TABLE IF EXISTS after_broken"],
      },
    ]

    const error = captureError(() => migrate(db, units))

    expect(error.kind).toBe("Db")
    expect(error.context?.operation).toBe("apply migration 4 (broken)")
    expect(currentVersion(db)).toBe(3)
    expect(tableNames(db)).not.toContain("extra_notes")
    expect(tableNames(db)).not.toContain("after_broken")
  })

  test("rejects duplicate unit versions before touching the database", () => {
    const db = openBareDb()
    const error = captureError(() => migrate(db, [MIGRATIONS[0], MIGRATIONS[0]]))
    expect(error.kind).toBe("InvalidInput")
    expect(tableNames(db)).toEqual([])
  })
})

describe("rollback", () => {
  test("reverts only the latest applied unit", () => {
    const db = openBareDb()
    migrate(db)

    const report = rollback(db)

    expect(report).toEqual({ from: 3, to: 2, reverted: [3] })
    const tables = tableNames(db)
    expect(tables).not.toContain("prompt_fragments")
    expect(tables).not.toContain("prompt_references")
    expect(tables).toContain("implementation_plans")
    expect(migrate(db).applied).toEqual([3])
  })

  test("is a no-op on an empty database", () => {
    const db = openBareDb()
    expect(rollback(db)).toEqual({ from: 0, to: 0, reverted: [] })
  })

  test("walking back every unit leaves no tables behind", () => {
    const db = openBareDb()
    migrate(db)
    rollback(db)
    rollback(db)
    expect(rollback(db)).toEqual({ from: 1, to: 0, reverted: [1] })
    expect(currentVersion(db)).toBe(0)
    expect(tableNames(db)).toEqual([])
  })
})

describe("reset", () => {
  test("drops all data and reapplies every unit", () => {
    const db = openBareDb()
    migrate(db)
    insertRawSkill(db)

    const report = reset(db)

    expect(report).toEqual({ status: "migrated", from: 0, to: 3, applied: [1, 2, 3] })
    const row = db.prepare<[], { count: number }>("SELECT COUNT(*) AS count FROM skills").get()
    expect(row?.count).toBe(0)
  })

  test("works on a partially migrated database", () => {
    const db = openBareDb()
    migrate(db, MIGRATIONS.slice(0, 1))
    expect(currentVersion(db)).toBe(1)

    const report = reset(db)

    expect(report.to).toBe(3)
    expect(tableNames(db)).toContain("prompt_references")
  })
})
