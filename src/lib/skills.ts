import type { DatabaseConnection } from "./db"
import { notFound } from "./errors"
import { createLogger } from "./logger"
import type { CategoryCount, SkillChanges, SkillInput, SkillQuery, SkillRow, SyncResult } from "./models"
import { buildAssignments, deriveDocumentFields, guardDb } from "./util"
import {
  DEFAULT_LIST_LIMIT,
  createSkillSchema,
  skillQuerySchema,
  updateSkillSchema,
  validate,
  validateId,
} from "./validation"

const SKILL_UPDATE_COLUMNS = [
  "path",
  "category",
  "name",
  "title",
  "description",
  "content",
  "file_hash",
  "size_bytes",
  "token_count",
] as const satisfies readonly (keyof SkillChanges)[]

type SkillInsert = {
  path: string
  category: string
  name: string
  title: string | null
  description: string | null
  content: string
  file_hash: string
  size_bytes: number
  token_count: number | null
  now: number
}

const log = createLogger("skills")

export class SkillStore {
  private db: DatabaseConnection

  constructor(db: DatabaseConnection) {
    this.db = db
  }

  create(input: SkillInput): SkillRow {
    const parsed = validate(createSkillSchema, input, "skill")
    const skill = guardDb("create skill", input, () => this.insert(parsed))
    log.debug("skill created", { id: skill.id, path: skill.path })
    return skill
  }

  findById(id: number): SkillRow | null {
    const skillId = validateId(id, "skill id")
    return guardDb("get skill", { id }, () =>
      this.db.prepare<[number], SkillRow>("SELECT * FROM skills WHERE id = ?").get(skillId) ?? null,
    )
  }

  getById(id: number): SkillRow {
    const row = this.findById(id)
    if (!row) throw notFound(`skill id ${id}`)
    return row
  }

  getByPath(path: string): SkillRow {
    return guardDb("get skill by path", { path }, () => {
      const row = this.findByPath(path)
      if (!row) throw notFound(`skill ${path}`)
      return row
    })
  }

  getByName(name: string, category?: string | null): SkillRow {
    return guardDb("get skill by name", { name, category }, () => {
      const row = category
        ? this.db
            .prepare<[string, string], SkillRow>("SELECT * FROM skills WHERE name = ? AND category = ?")
            .get(name, category)
        : this.db
            .prepare<[string], SkillRow>("SELECT * FROM skills WHERE name = ? ORDER BY category ASC, id ASC LIMIT 1")
            .get(name)
      if (!row) throw notFound(category ? `skill ${category}/${name}` : `skill ${name}`)
      return row
    })
  }

  list(query: SkillQuery = {}): SkillRow[] {
    const parsed = validate(skillQuerySchema, query, "skill query")
    const limit = parsed.limit ?? DEFAULT_LIST_LIMIT
    const offset = parsed.offset ?? 0
    return guardDb("list skills", query, () => {
      if (parsed.category) {
        return this.db
          .prepare<[string, number, number], SkillRow>(
            "SELECT * FROM skills WHERE category = ? ORDER BY category ASC, name ASC, id ASC LIMIT ? OFFSET ?",
          )
          .all(parsed.category, limit, offset)
      }
      return this.db
        .prepare<[number, number], SkillRow>(
          "SELECT * FROM skills ORDER BY category ASC, name ASC, id ASC LIMIT ? OFFSET ?",
        )
        .all(limit, offset)
    })
  }

  update(id: number, changes: SkillChanges): SkillRow {
    const skillId = validateId(id, "skill id")
    const parsed = validate(updateSkillSchema, changes, "skill changes")
    const fields = parsed.content === undefined ? parsed : { ...parsed, ...deriveDocumentFields(parsed.content, parsed) }
    const { clause, params } = buildAssignments(SKILL_UPDATE_COLUMNS, fields, "skill")
    const skill = guardDb("update skill", { id, changes }, () => {
      const row = this.db
        .prepare<Record<string, unknown>, SkillRow>(
          `UPDATE skills SET ${clause}, updated_at = @updated_at WHERE id = @id RETURNING *`,
        )
        .get({ ...params, updated_at: Date.now(), id: skillId })
      if (!row) throw notFound(`skill id ${skillId}`)
      return row
    })
    log.debug("skill updated", { id: skillId, fields: Object.keys(params) })
    return skill
  }

  delete(id: number): SkillRow {
    const skillId = validateId(id, "skill id")
    return guardDb("delete skill", { id }, () => {
      const row = this.db.prepare<[number], SkillRow>("DELETE FROM skills WHERE id = ? RETURNING *").get(skillId)
      if (!row) throw notFound(`skill id ${skillId}`)
      return row
    })
  }

  listCategories(): CategoryCount[] {
    return guardDb("list skill categories", undefined, () =>
      this.db
        .prepare<[], CategoryCount>(
          "SELECT category, COUNT(*) AS count FROM skills GROUP BY category ORDER BY category ASC",
        )
        .all(),
    )
  }

  /**
   * Upserts a skill keyed by path. The stored row is rewritten only when the content hash
   * differs from the one on record.
   */
  sync(input: SkillInput): SyncResult<SkillRow> {
    const parsed = validate(createSkillSchema, input, "skill")
    const result = guardDb("sync skill", input, () => {
      const tx = this.db.transaction((): SyncResult<SkillRow> => {
        const existing = this.findByPath(parsed.path)
        if (!existing) {
          return { status: "created", record: this.insert(parsed) }
        }
        const next = toInsert(parsed)
        if (existing.file_hash === next.file_hash) {
          return { status: "unchanged", record: existing }
        }
        const row = this.db
          .prepare<SkillInsert & { id: number }, SkillRow>(
            `UPDATE skills
             SET path = @path, category = @category, name = @name, title = @title, description = @description,
                 content = @content, file_hash = @file_hash, size_bytes = @size_bytes,
                 token_count = @token_count, updated_at = @now
             WHERE id = @id RETURNING *`,
          )
          .get({ ...next, id: existing.id })
        if (!row) throw notFound(`skill id ${existing.id}`)
        return { status: "updated", record: row }
      })
      return tx()
    })
    log.debug("skill synced", { path: parsed.path, status: result.status })
    return result
  }

  private findByPath(path: string): SkillRow | undefined {
    return this.db.prepare<[string], SkillRow>("SELECT * FROM skills WHERE path = ?").get(path)
  }

  private insert(input: SkillInput): SkillRow {
    const row = this.db
      .prepare<SkillInsert, SkillRow>(
        `INSERT INTO skills
           (path, category, name, title, description, content, file_hash, size_bytes, token_count, created_at, updated_at)
         VALUES
           (@path, @category, @name, @title, @description, @content, @file_hash, @size_bytes, @token_count, @now, @now)
         RETURNING *`,
      )
      .get(toInsert(input))
    if (!row) throw notFound(`skill ${input.path}`)
    return row
  }
}

function toInsert(input: SkillInput): SkillInsert {
  return {
    path: input.path,
    category: input.category,
    name: input.name,
    title: input.title ?? null,
    description: input.description ?? null,
    content: input.content,
    ...deriveDocumentFields(input.content, input),
    now: Date.now(),
  }
}
