export { SkillbookApp, openSkillbook, type OpenSkillbookOptions } from "./lib/app"
export {
  DEFAULT_SKILLBOOK_CONFIG,
  loadSkillbookConfig,
  normalizeSkillbookConfig,
  resolveDbPath,
  resolveSkillbookConfigPath,
  resolveSkillbookDir,
  saveSkillbookConfig,
  type LoadedSkillbookConfig,
  type MigrationSource,
  type SkillbookConfig,
} from "./lib/config"
export { MEMORY_DB_PATH, ensureParentDir, openDatabase, type DatabaseConnection, type OpenDatabaseOptions } from "./lib/db"
export { AppError, invalidInput, isAppError, notFound, type AppErrorKind, type FieldErrors } from "./lib/errors"
export { FragmentStore } from "./lib/fragments"
export { createLogger, setLogLevel, setLogSink, type LogLevel, type Logger } from "./lib/logger"
export { currentVersion, latestVersion, migrate, pendingMigrations, reset, rollback } from "./lib/migrate"
export {
  loadMigrationFiles,
  migrateFromFiles,
  resetFromFiles,
  resolveMigrationsDir,
  rollbackFiles,
  type FileMigrationReport,
  type FileRollbackReport,
  type MigrationFile,
} from "./lib/migrate-files"
export * from "./lib/models"
export { PlanStore } from "./lib/plans"
export { POSITION_SCOPES, PositionManager, type PositionScope } from "./lib/positions"
export { PromptStore } from "./lib/prompts"
export { MIGRATIONS } from "./lib/schema"
export { SearchEngine, type IndexCheck } from "./lib/search"
export { SkillStore } from "./lib/skills"
export { TaskStore } from "./lib/tasks"
export type { PositionMap } from "./lib/util"
