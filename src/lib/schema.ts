import type { MigrationUnit } from "./models"

// Unit 1 owns schema_version, so its down list drops the marker table last.
export const MIGRATIONS: MigrationUnit[] = [
  {
    version: 1,
    name: "skills_and_prompts",
    up: [
      `CREATE TABLE IF NOT EXISTS schema_version (
        version INTEGER PRIMARY KEY,
        applied_at INTEGER NOT NULL DEFAULT (CAST(strftime('%s', 'now') AS INTEGER) * 1000)
      )`,
      `CREATE TABLE IF NOT EXISTS skills (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        path TEXT NOT NULL UNIQUE,
        category TEXT NOT NULL,
        name TEXT NOT NULL,
        title TEXT,
        description TEXT,
        content TEXT NOT NULL,
        file_hash TEXT NOT NULL,
        size_bytes INTEGER NOT NULL,
        token_count INTEGER,
        created_at INTEGER NOT NULL DEFAULT (CAST(strftime('%s', 'now') AS INTEGER) * 1000),
        updated_at INTEGER NOT NULL DEFAULT (CAST(strftime('%s', 'now') AS INTEGER) * 1000)
      )`,
      "CREATE INDEX IF NOT EXISTS idx_skills_category ON skills(category)",
      "CREATE INDEX IF NOT EXISTS idx_skills_name ON skills(name)",
      "CREATE INDEX IF NOT EXISTS idx_skills_hash ON skills(file_hash)",
      `CREATE TABLE IF NOT EXISTS prompts (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        path TEXT NOT NULL UNIQUE,
        name TEXT NOT NULL UNIQUE,
        title TEXT,
        author TEXT,
        description TEXT,
        content TEXT NOT NULL,
        file_hash TEXT NOT NULL,
        size_bytes INTEGER NOT NULL,
        token_count INTEGER,
        created_at INTEGER NOT NULL DEFAULT (CAST(strftime('%s', 'now') AS INTEGER) * 1000),
        updated_at INTEGER NOT NULL DEFAULT (CAST(strftime('%s', 'now') AS INTEGER) * 1000)
      )`,
      "CREATE INDEX IF NOT EXISTS idx_prompts_hash ON prompts(file_hash)",
      `CREATE TABLE IF NOT EXISTS prompt_skills (
        prompt_id INTEGER NOT NULL,
        skill_id INTEGER NOT NULL,
        position INTEGER NOT NULL DEFAULT 0,
        created_at INTEGER NOT NULL DEFAULT (CAST(strftime('%s', 'now') AS INTEGER) * 1000),
        PRIMARY KEY (prompt_id, skill_id),
        FOREIGN KEY (prompt_id) REFERENCES prompts(id) ON DELETE CASCADE,
        FOREIGN KEY (skill_id) REFERENCES skills(id) ON DELETE CASCADE
      )`,
      "CREATE INDEX IF NOT EXISTS idx_prompt_skills_order ON prompt_skills(prompt_id, position)",
      "CREATE INDEX IF NOT EXISTS idx_prompt_skills_skill ON prompt_skills(skill_id)",
      `CREATE VIRTUAL TABLE IF NOT EXISTS skills_fts USING fts5(
        path,
        category,
        name,
        title,
        description,
        content,
        content='skills',
        content_rowid='id'
      )`,
      `CREATE TRIGGER IF NOT EXISTS skills_ai AFTER INSERT ON skills BEGIN
        INSERT INTO skills_fts(rowid, path, category, name, title, description, content)
        VALUES (new.id, new.path, new.category, new.name, new.title, new.description, new.content);
      END`,
      `CREATE TRIGGER IF NOT EXISTS skills_ad AFTER DELETE ON skills BEGIN
        INSERT INTO skills_fts(skills_fts, rowid, path, category, name, title, description, content)
        VALUES ('delete', old.id, old.path, old.category, old.name, old.title, old.description, old.content);
      END`,
      `CREATE TRIGGER IF NOT EXISTS skills_au AFTER UPDATE ON skills BEGIN
        INSERT INTO skills_fts(skills_fts, rowid, path, category, name, title, description, content)
        VALUES ('delete', old.id, old.path, old.category, old.name, old.title, old.description, old.content);
        INSERT INTO skills_fts(rowid, path, category, name, title, description, content)
        VALUES (new.id, new.path, new.category, new.name, new.title, new.description, new.content);
      END`,
      `CREATE VIRTUAL TABLE IF NOT EXISTS prompts_fts USING fts5(
        path,
        name,
        title,
        author,
        description,
        content,
        content='prompts',
        content_rowid='id'
      )`,
      `CREATE TRIGGER IF NOT EXISTS prompts_ai AFTER INSERT ON prompts BEGIN
        INSERT INTO prompts_fts(rowid, path, name, title, author, description, content)
        VALUES (new.id, new.path, new.name, new.title, new.author, new.description, new.content);
      END`,
      `CREATE TRIGGER IF NOT EXISTS prompts_ad AFTER DELETE ON prompts BEGIN
        INSERT INTO prompts_fts(prompts_fts, rowid, path, name, title, author, description, content)
        VALUES ('delete', old.id, old.path, old.name, old.title, old.author, old.description, old.content);
      END`,
      `CREATE TRIGGER IF NOT EXISTS prompts_au AFTER UPDATE ON prompts BEGIN
        INSERT INTO prompts_fts(prompts_fts, rowid, path, name, title, author, description, content)
        VALUES ('delete', old.id, old.path, old.name, old.title, old.author, old.description, old.content);
        INSERT INTO prompts_fts(rowid, path, name, title, author, description, content)
        VALUES (new.id, new.path, new.name, new.title, new.author, new.description, new.content);
      END`,
    ],
    down: [
      "DROP TRIGGER IF EXISTS prompts_au",
      "DROP TRIGGER IF EXISTS prompts_ad",
      "DROP TRIGGER IF EXISTS prompts_ai",
      "DROP TABLE IF EXISTS prompts_fts",
      "DROP TRIGGER IF EXISTS skills_au",
      "DROP TRIGGER IF EXISTS skills_ad",
      "DROP TRIGGER IF EXISTS skills_ai",
      "DROP TABLE IF EXISTS skills_fts",
      "DROP INDEX IF EXISTS idx_prompt_skills_skill",
      "DROP INDEX IF EXISTS idx_prompt_skills_order",
      "DROP TABLE IF EXISTS prompt_skills",
      "DROP INDEX IF EXISTS idx_prompts_hash",
      "DROP TABLE IF EXISTS prompts",
      "DROP INDEX IF EXISTS idx_skills_hash",
      "DROP INDEX IF EXISTS idx_skills_name",
      "DROP INDEX IF EXISTS idx_skills_category",
      "DROP TABLE IF EXISTS skills",
      "DROP TABLE IF EXISTS schema_version",
    ],
  },
  {
    version: 2,
    name: "implementation_plans",
    up: [
      `CREATE TABLE IF NOT EXISTS implementation_plans (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL UNIQUE,
        title TEXT,
        summary TEXT,
        description TEXT,
        content TEXT NOT NULL DEFAULT '',
        status TEXT NOT NULL DEFAULT 'draft'
          CHECK (status IN ('draft', 'in-progress', 'completed', 'archived', 'cancelled')),
        created_by TEXT,
        assigned_to TEXT,
        created_at INTEGER NOT NULL DEFAULT (CAST(strftime('%s', 'now') AS INTEGER) * 1000),
        updated_at INTEGER NOT NULL DEFAULT (CAST(strftime('%s', 'now') AS INTEGER) * 1000),
        completed_at INTEGER
      )`,
      "CREATE INDEX IF NOT EXISTS idx_plans_status ON implementation_plans(status)",
      "CREATE INDEX IF NOT EXISTS idx_plans_assigned_to ON implementation_plans(assigned_to)",
      `CREATE VIRTUAL TABLE IF NOT EXISTS implementation_plans_fts USING fts5(
        name,
        title,
        summary,
        description,
        content,
        content='implementation_plans',
        content_rowid='id'
      )`,
      `CREATE TRIGGER IF NOT EXISTS implementation_plans_ai AFTER INSERT ON implementation_plans BEGIN
        INSERT INTO implementation_plans_fts(rowid, name, title, summary, description, content)
        VALUES (new.id, new.name, new.title, new.summary, new.description, new.content);
      END`,
      `CREATE TRIGGER IF NOT EXISTS implementation_plans_ad AFTER DELETE ON implementation_plans BEGIN
        INSERT INTO implementation_plans_fts(implementation_plans_fts, rowid, name, title, summary, description, content)
        VALUES ('delete', old.id, old.name, old.title, old.summary, old.description, old.content);
      END`,
      `CREATE TRIGGER IF NOT EXISTS implementation_plans_au AFTER UPDATE ON implementation_plans BEGIN
        INSERT INTO implementation_plans_fts(implementation_plans_fts, rowid, name, title, summary, description, content)
        VALUES ('delete', old.id, old.name, old.title, old.summary, old.description, old.content);
        INSERT INTO implementation_plans_fts(rowid, name, title, summary, description, content)
        VALUES (new.id, new.name, new.title, new.summary, new.description, new.content);
      END`,
      `CREATE TABLE IF NOT EXISTS task_lists (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        plan_id INTEGER NOT NULL,
        name TEXT NOT NULL,
        description TEXT,
        position INTEGER NOT NULL DEFAULT 0,
        created_at INTEGER NOT NULL DEFAULT (CAST(strftime('%s', 'now') AS INTEGER) * 1000),
        updated_at INTEGER NOT NULL DEFAULT (CAST(strftime('%s', 'now') AS INTEGER) * 1000),
        FOREIGN KEY (plan_id) REFERENCES implementation_plans(id) ON DELETE CASCADE
      )`,
      "CREATE INDEX IF NOT EXISTS idx_task_lists_plan_order ON task_lists(plan_id, position)",
      `CREATE TABLE IF NOT EXISTS tasks (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        list_id INTEGER NOT NULL,
        name TEXT NOT NULL,
        description TEXT,
        position INTEGER NOT NULL DEFAULT 0,
        completed INTEGER NOT NULL DEFAULT 0 CHECK (completed IN (0, 1)),
        completed_at INTEGER,
        assigned_to TEXT,
        created_at INTEGER NOT NULL DEFAULT (CAST(strftime('%s', 'now') AS INTEGER) * 1000),
        updated_at INTEGER NOT NULL DEFAULT (CAST(strftime('%s', 'now') AS INTEGER) * 1000),
        FOREIGN KEY (list_id) REFERENCES task_lists(id) ON DELETE CASCADE
      )`,
      "CREATE INDEX IF NOT EXISTS idx_tasks_list_order ON tasks(list_id, position)",
      `CREATE TABLE IF NOT EXISTS plan_skills (
        plan_id INTEGER NOT NULL,
        skill_id INTEGER NOT NULL,
        position INTEGER NOT NULL DEFAULT 0,
        created_at INTEGER NOT NULL DEFAULT (CAST(strftime('%s', 'now') AS INTEGER) * 1000),
        PRIMARY KEY (plan_id, skill_id),
        FOREIGN KEY (plan_id) REFERENCES implementation_plans(id) ON DELETE CASCADE,
        FOREIGN KEY (skill_id) REFERENCES skills(id) ON DELETE CASCADE
      )`,
      "CREATE INDEX IF NOT EXISTS idx_plan_skills_skill ON plan_skills(skill_id)",
    ],
    down: [
      "DROP INDEX IF EXISTS idx_plan_skills_skill",
      "DROP TABLE IF EXISTS plan_skills",
      "DROP INDEX IF EXISTS idx_tasks_list_order",
      "DROP TABLE IF EXISTS tasks",
      "DROP INDEX IF EXISTS idx_task_lists_plan_order",
      "DROP TABLE IF EXISTS task_lists",
      "DROP TRIGGER IF EXISTS implementation_plans_au",
      "DROP TRIGGER IF EXISTS implementation_plans_ad",
      "DROP TRIGGER IF EXISTS implementation_plans_ai",
      "DROP TABLE IF EXISTS implementation_plans_fts",
      "DROP INDEX IF EXISTS idx_plans_assigned_to",
      "DROP INDEX IF EXISTS idx_plans_status",
      "DROP TABLE IF EXISTS implementation_plans",
    ],
  },
  {
    version: 3,
    name: "prompt_fragments",
    up: [
      `CREATE TABLE IF NOT EXISTS prompt_fragments (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL UNIQUE,
        title TEXT NOT NULL,
        description TEXT,
        created_at INTEGER NOT NULL DEFAULT (CAST(strftime('%s', 'now') AS INTEGER) * 1000),
        updated_at INTEGER NOT NULL DEFAULT (CAST(strftime('%s', 'now') AS INTEGER) * 1000)
      )`,
      `CREATE TABLE IF NOT EXISTS prompt_fragment_skills (
        fragment_id INTEGER NOT NULL,
        skill_id INTEGER NOT NULL,
        position INTEGER NOT NULL DEFAULT 0,
        created_at INTEGER NOT NULL DEFAULT (CAST(strftime('%s', 'now') AS INTEGER) * 1000),
        PRIMARY KEY (fragment_id, skill_id),
        FOREIGN KEY (fragment_id) REFERENCES prompt_fragments(id) ON DELETE CASCADE,
        FOREIGN KEY (skill_id) REFERENCES skills(id) ON DELETE CASCADE
      )`,
      "CREATE INDEX IF NOT EXISTS idx_fragment_skills_skill ON prompt_fragment_skills(skill_id)",
      `CREATE TABLE IF NOT EXISTS prompt_references (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        source_prompt_id INTEGER NOT NULL,
        reference_type TEXT NOT NULL CHECK (reference_type IN ('prompt', 'fragment')),
        target_prompt_id INTEGER,
        target_fragment_id INTEGER,
        position INTEGER NOT NULL DEFAULT 0,
        created_at INTEGER NOT NULL DEFAULT (CAST(strftime('%s', 'now') AS INTEGER) * 1000),
        FOREIGN KEY (source_prompt_id) REFERENCES prompts(id) ON DELETE CASCADE,
        FOREIGN KEY (target_prompt_id) REFERENCES prompts(id) ON DELETE CASCADE,
        FOREIGN KEY (target_fragment_id) REFERENCES prompt_fragments(id) ON DELETE CASCADE,
        CHECK (
          (reference_type = 'prompt' AND target_prompt_id IS NOT NULL AND target_fragment_id IS NULL)
          OR (reference_type = 'fragment' AND target_fragment_id IS NOT NULL AND target_prompt_id IS NULL)
        )
      )`,
      "CREATE INDEX IF NOT EXISTS idx_prompt_references_source ON prompt_references(source_prompt_id, position)",
    ],
    down: [
      "DROP INDEX IF EXISTS idx_prompt_references_source",
      "DROP TABLE IF EXISTS prompt_references",
      "DROP INDEX IF EXISTS idx_fragment_skills_skill",
      "DROP TABLE IF EXISTS prompt_fragment_skills",
      "DROP TABLE IF EXISTS prompt_fragments",
    ],
  },
]
