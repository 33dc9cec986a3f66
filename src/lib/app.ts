import { DEFAULT_SKILLBOOK_CONFIG, loadSkillbookConfig, type SkillbookConfig } from "./config"
import { openDatabase, type DatabaseConnection } from "./db"
import { FragmentStore } from "./fragments"
import { createLogger, setLogLevel } from "./logger"
import { migrate, reset, rollback } from "./migrate"
import {
  migrateFromFiles,
  resetFromFiles,
  rollbackFiles,
  type FileMigrationReport,
  type FileRollbackReport,
} from "./migrate-files"
import type { MigrationReport, RollbackReport } from "./models"
import { PlanStore } from "./plans"
import { PositionManager } from "./positions"
import { PromptStore } from "./prompts"
import { SearchEngine } from "./search"
import { SkillStore } from "./skills"
import { TaskStore } from "./tasks"

export type OpenSkillbookOptions = {
  path?: string
  config?: SkillbookConfig
  migrate?: boolean
}

const log = createLogger("app")

export class SkillbookApp {
  readonly db: DatabaseConnection
  readonly config: SkillbookConfig
  readonly positions: PositionManager
  readonly plans: PlanStore
  readonly tasks: TaskStore
  readonly skills: SkillStore
  readonly prompts: PromptStore
  readonly fragments: FragmentStore
  readonly search: SearchEngine

  constructor(db: DatabaseConnection, config: SkillbookConfig = DEFAULT_SKILLBOOK_CONFIG) {
    this.db = db
    this.config = config
    this.positions = new PositionManager(db)
    this.plans = new PlanStore(db, this.positions)
    this.tasks = new TaskStore(db, this.positions)
    this.skills = new SkillStore(db)
    this.prompts = new PromptStore(db, this.positions)
    this.fragments = new FragmentStore(db, this.positions)
    this.search = new SearchEngine(db, config.search)
  }

  migrate(): MigrationReport | FileMigrationReport {
    return this.usesFiles() ? migrateFromFiles(this.db) : migrate(this.db)
  }

  rollback(): RollbackReport | FileRollbackReport {
    return this.usesFiles() ? rollbackFiles(this.db) : rollback(this.db)
  }

  reset(): MigrationReport | FileMigrationReport {
    return this.usesFiles() ? resetFromFiles(this.db) : reset(this.db)
  }

  close() {
    if (this.db.open) this.db.close()
  }

  private usesFiles(): boolean {
    return this.config.database.migrationSource === "files"
  }
}

export function openSkillbook(options: OpenSkillbookOptions = {}): SkillbookApp {
  let config = options.config
  if (!config) {
    const loaded = loadSkillbookConfig()
    if (loaded.loadError) {
      log.warn("config load failed; using defaults", { path: loaded.path, error: loaded.loadError })
    }
    config = loaded.config
  }
  if (!process.env.SKILLBOOK_LOG_LEVEL?.trim()) {
    setLogLevel(config.logging.level)
  }
  const db = openDatabase({ path: options.path, config, migrate: options.migrate })
  return new SkillbookApp(db, config)
}
