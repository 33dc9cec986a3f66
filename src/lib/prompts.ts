import type { DatabaseConnection } from "./db"
import { notFound } from "./errors"
import { createLogger } from "./logger"
import type {
  LinkedSkill,
  PageQuery,
  PromptChanges,
  PromptInput,
  PromptRow,
  PromptSkillRow,
  SyncResult,
} from "./models"
import type { PositionManager } from "./positions"
import { SkillLinkTable } from "./skill-links"
import { buildAssignments, deriveDocumentFields, guardDb, type PositionMap } from "./util"
import {
  DEFAULT_LIST_LIMIT,
  createPromptSchema,
  pageQuerySchema,
  promptSkillSchema,
  updatePromptSchema,
  validate,
  validateId,
} from "./validation"

const PROMPT_UPDATE_COLUMNS = [
  "path",
  "name",
  "title",
  "author",
  "description",
  "content",
  "file_hash",
  "size_bytes",
  "token_count",
] as const satisfies readonly (keyof PromptChanges)[]

type PromptInsert = {
  path: string
  name: string
  title: string | null
  author: string | null
  description: string | null
  content: string
  file_hash: string
  size_bytes: number
  token_count: number | null
  now: number
}

const log = createLogger("prompts")

export class PromptStore {
  private db: DatabaseConnection
  private skillLinks: SkillLinkTable<PromptSkillRow>

  constructor(db: DatabaseConnection, positions: PositionManager) {
    this.db = db
    this.skillLinks = new SkillLinkTable<PromptSkillRow>(db, positions, {
      scope: "prompt_skills",
      ownerTable: "prompts",
      ownerLabel: "prompt",
    })
  }

  create(input: PromptInput): PromptRow {
    const parsed = validate(createPromptSchema, input, "prompt")
    const prompt = guardDb("create prompt", input, () => this.insert(parsed))
    log.debug("prompt created", { id: prompt.id, name: prompt.name })
    return prompt
  }

  findById(id: number): PromptRow | null {
    const promptId = validateId(id, "prompt id")
    return guardDb("get prompt", { id }, () =>
      this.db.prepare<[number], PromptRow>("SELECT * FROM prompts WHERE id = ?").get(promptId) ?? null,
    )
  }

  getById(id: number): PromptRow {
    const row = this.findById(id)
    if (!row) throw notFound(`prompt id ${id}`)
    return row
  }

  getByName(name: string): PromptRow {
    return guardDb("get prompt by name", { name }, () => {
      const row = this.findByName(name)
      if (!row) throw notFound(`prompt ${name}`)
      return row
    })
  }

  list(query: PageQuery = {}): PromptRow[] {
    const parsed = validate(pageQuerySchema, query, "prompt query")
    return guardDb("list prompts", query, () =>
      this.db
        .prepare<[number, number], PromptRow>("SELECT * FROM prompts ORDER BY name ASC, id ASC LIMIT ? OFFSET ?")
        .all(parsed.limit ?? DEFAULT_LIST_LIMIT, parsed.offset ?? 0),
    )
  }

  update(id: number, changes: PromptChanges): PromptRow {
    const promptId = validateId(id, "prompt id")
    const parsed = validate(updatePromptSchema, changes, "prompt changes")
    const fields = parsed.content === undefined ? parsed : { ...parsed, ...deriveDocumentFields(parsed.content, parsed) }
    const { clause, params } = buildAssignments(PROMPT_UPDATE_COLUMNS, fields, "prompt")
    return guardDb("update prompt", { id, changes }, () => {
      const row = this.db
        .prepare<Record<string, unknown>, PromptRow>(
          `UPDATE prompts SET ${clause}, updated_at = @updated_at WHERE id = @id RETURNING *`,
        )
        .get({ ...params, updated_at: Date.now(), id: promptId })
      if (!row) throw notFound(`prompt id ${promptId}`)
      return row
    })
  }

  delete(id: number): PromptRow {
    const promptId = validateId(id, "prompt id")
    return guardDb("delete prompt", { id }, () => {
      const row = this.db.prepare<[number], PromptRow>("DELETE FROM prompts WHERE id = ? RETURNING *").get(promptId)
      if (!row) throw notFound(`prompt id ${promptId}`)
      return row
    })
  }

  /** Upserts a prompt keyed by name; unchanged content hashes leave the row untouched. */
  sync(input: PromptInput): SyncResult<PromptRow> {
    const parsed = validate(createPromptSchema, input, "prompt")
    const result = guardDb("sync prompt", input, () => {
      const tx = this.db.transaction((): SyncResult<PromptRow> => {
        const existing = this.findByName(parsed.name)
        if (!existing) {
          return { status: "created", record: this.insert(parsed) }
        }
        const next = toInsert(parsed)
        if (existing.file_hash === next.file_hash) {
          return { status: "unchanged", record: existing }
        }
        const row = this.db
          .prepare<PromptInsert & { id: number }, PromptRow>(
            `UPDATE prompts
             SET path = @path, name = @name, title = @title, author = @author, description = @description,
                 content = @content, file_hash = @file_hash, size_bytes = @size_bytes,
                 token_count = @token_count, updated_at = @now
             WHERE id = @id RETURNING *`,
          )
          .get({ ...next, id: existing.id })
        if (!row) throw notFound(`prompt id ${existing.id}`)
        return { status: "updated", record: row }
      })
      return tx()
    })
    log.debug("prompt synced", { name: parsed.name, status: result.status })
    return result
  }

  associateSkill(input: { prompt_id: number; skill_id: number; position?: number | null }): PromptSkillRow {
    const parsed = validate(promptSkillSchema, input, "prompt skill")
    return this.skillLinks.associate(parsed.prompt_id, parsed.skill_id, parsed.position)
  }

  dissociateSkill(promptId: number, skillId: number): PromptSkillRow {
    return this.skillLinks.dissociate(promptId, skillId)
  }

  dissociateAllSkills(promptId: number): number {
    return this.skillLinks.dissociateAll(promptId)
  }

  listSkills(promptId: number): LinkedSkill[] {
    return this.skillLinks.list(promptId)
  }

  reorderSkills(promptId: number, positions: PositionMap): LinkedSkill[] {
    return this.skillLinks.reorder(promptId, positions)
  }

  private findByName(name: string): PromptRow | undefined {
    return this.db.prepare<[string], PromptRow>("SELECT * FROM prompts WHERE name = ?").get(name)
  }

  private insert(input: PromptInput): PromptRow {
    const row = this.db
      .prepare<PromptInsert, PromptRow>(
        `INSERT INTO prompts
           (path, name, title, author, description, content, file_hash, size_bytes, token_count, created_at, updated_at)
         VALUES
           (@path, @name, @title, @author, @description, @content, @file_hash, @size_bytes, @token_count, @now, @now)
         RETURNING *`,
      )
      .get(toInsert(input))
    if (!row) throw notFound(`prompt ${input.name}`)
    return row
  }
}

function toInsert(input: PromptInput): PromptInsert {
  return {
    path: input.path,
    name: input.name,
    title: input.title ?? null,
    author: input.author ?? null,
    description: input.description ?? null,
    content: input.content,
    ...deriveDocumentFields(input.content, input),
    now: Date.now(),
  }
}
