import { mkdtempSync, rmSync } from "node:fs"
import { tmpdir } from "node:os"
import path from "node:path"
import Database from "better-sqlite3"
import { SkillbookApp } from "../src/lib/app"
import { openDatabase, type DatabaseConnection } from "../src/lib/db"
import { AppError } from "../src/lib/errors"
import type { SkillInput } from "../src/lib/models"

const sandboxes: string[] = []
const apps: SkillbookApp[] = []
const connections: DatabaseConnection[] = []

export function makeSandbox(): string {
  const dir = mkdtempSync(path.join(tmpdir(), "skillbook-test-"))
  sandboxes.push(dir)
  return dir
}

export function openTestApp(): SkillbookApp {
  const dir = makeSandbox()
  const db = openDatabase({ path: path.join(dir, "skillbook.db"), migrate: true })
  const app = new SkillbookApp(db)
  apps.push(app)
  return app
}

// Unmigrated in-memory connection for exercising the migrators directly.
export function openBareDb(): DatabaseConnection {
  const db = new Database(":memory:")
  db.pragma("foreign_keys = ON")
  connections.push(db)
  return db
}

export function cleanupSandboxes() {
  while (apps.length) {
    apps.pop()?.close()
  }
  while (connections.length) {
    const db = connections.pop()
    if (db?.open) db.close()
  }
  while (sandboxes.length) {
    const dir = sandboxes.pop()
    if (dir) {
      rmSync(dir, { recursive: true, force: true })
    }
  }
}

export function skillInput(overrides: Partial<SkillInput> = {}): SkillInput {
  return {
    path: "skills/testing/vitest.md",
    category: "testing",
    name: "vitest",
    title: "Vitest basics",
    description: "Writing unit tests",
    content: "Use describe and test blocks to group assertions.",
    ...overrides,
  }
}

export function captureError(fn: () => unknown): AppError {
  try {
    fn()
  } catch (error) {
    if (error instanceof AppError) return error
    throw error
  }
  throw new Error("expected an AppError to be thrown")
}

export function tableNames(db: DatabaseConnection): string[] {
  return db
    .prepare<[], { name: string }>(
      "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name",
    )
    .all()
    .map((row) => row.name)
}
