import { mkdirSync, writeFileSync } from "node:fs"
import os from "node:os"
import path from "node:path"
import { afterEach, describe, expect, test, vi } from "vitest"
import {
  DEFAULT_SKILLBOOK_CONFIG,
  loadSkillbookConfig,
  normalizeSkillbookConfig,
  resolveDbPath,
  resolveSkillbookConfigPath,
  saveSkillbookConfig,
} from "../src/lib/config"
import { cleanupSandboxes, makeSandbox } from "./helpers"

afterEach(() => {
  vi.unstubAllEnvs()
  cleanupSandboxes()
})

function useSandboxDir(): string {
  const dir = makeSandbox()
  vi.stubEnv("SKILLBOOK_DIR", dir)
  vi.stubEnv("SKILLBOOK_CONFIG", "")
  vi.stubEnv("SKILLBOOK_DB", "")
  return dir
}

describe("normalizeSkillbookConfig", () => {
  test("non-objects fall back to the defaults", () => {
    expect(normalizeSkillbookConfig(null)).toEqual(DEFAULT_SKILLBOOK_CONFIG)
    expect(normalizeSkillbookConfig([1, 2])).toEqual(DEFAULT_SKILLBOOK_CONFIG)
  })

  test("keeps valid fields and replaces invalid ones field by field", () => {
    const config = normalizeSkillbookConfig({
      database: { path: "  ", autoMigrate: "yes", migrationSource: "files" },
      search: { maxResults: 5000, snippet: { open: "<", tokens: 10.7 } },
      logging: { level: "loud" },
    })

    expect(config).toEqual({
      database: { path: null, autoMigrate: true, migrationSource: "files" },
      search: { maxResults: 50, snippet: { open: "<", close: "]", ellipsis: "...", tokens: 10 } },
      logging: { level: "warn" },
    })
  })
})

describe("config file", () => {
  test("a missing file yields the defaults", () => {
    const dir = useSandboxDir()
    const loaded = loadSkillbookConfig()
    expect(loaded).toEqual({
      path: path.join(dir, "config.json"),
      loadedFromFile: false,
      config: DEFAULT_SKILLBOOK_CONFIG,
    })
  })

  test("save then load returns the normalized config", () => {
    useSandboxDir()
    const config = {
      ...DEFAULT_SKILLBOOK_CONFIG,
      search: { ...DEFAULT_SKILLBOOK_CONFIG.search, maxResults: 7 },
      logging: { level: "debug" as const },
    }

    saveSkillbookConfig(config)
    const loaded = loadSkillbookConfig()

    expect(loaded.loadedFromFile).toBe(true)
    expect(loaded.config).toEqual(config)
  })

  test("an unreadable file reports loadError and uses the defaults", () => {
    const dir = useSandboxDir()
    writeFileSync(path.join(dir, "config.json"), "{ not json")

    const loaded = loadSkillbookConfig()

    expect(loaded.loadedFromFile).toBe(false)
    expect(loaded.config).toEqual(DEFAULT_SKILLBOOK_CONFIG)
    expect(loaded.loadError).toBeTypeOf("string")
  })

  test("SKILLBOOK_CONFIG points at an explicit file", () => {
    const dir = useSandboxDir()
    const custom = path.join(dir, "nested", "custom.json")
    mkdirSync(path.dirname(custom), { recursive: true })
    writeFileSync(custom, JSON.stringify({ search: { maxResults: 3 } }))
    vi.stubEnv("SKILLBOOK_CONFIG", custom)

    expect(resolveSkillbookConfigPath()).toBe(custom)
    expect(loadSkillbookConfig().config.search.maxResults).toBe(3)
  })
})

describe("resolveDbPath", () => {
  test("prefers SKILLBOOK_DB, then the configured path, then the skillbook dir", () => {
    const dir = useSandboxDir()
    expect(resolveDbPath()).toBe(path.join(dir, "skillbook.db"))

    const configured = { ...DEFAULT_SKILLBOOK_CONFIG, database: { ...DEFAULT_SKILLBOOK_CONFIG.database, path: "~/data/sb.db" } }
    expect(resolveDbPath(configured)).toBe(path.join(os.homedir(), "data/sb.db"))

    vi.stubEnv("SKILLBOOK_DB", "/tmp/override.db")
    expect(resolveDbPath(configured)).toBe("/tmp/override.db")
  })
})
