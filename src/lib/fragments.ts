import type { DatabaseConnection } from "./db"
import { invalidInput, notFound } from "./errors"
import { createLogger } from "./logger"
import type {
  FragmentChanges,
  FragmentInput,
  FragmentReference,
  FragmentRow,
  FragmentSkillRow,
  LinkedSkill,
  PageQuery,
  PromptRow,
  PromptWithReferences,
  ReferenceInput,
  ReferenceRow,
} from "./models"
import type { PositionManager } from "./positions"
import { SkillLinkTable } from "./skill-links"
import { buildAssignments, guardDb, type PositionMap } from "./util"
import {
  DEFAULT_LIST_LIMIT,
  createFragmentSchema,
  fragmentSkillSchema,
  pageQuerySchema,
  referenceSchema,
  updateFragmentSchema,
  validate,
  validateId,
} from "./validation"

const FRAGMENT_UPDATE_COLUMNS = ["name", "title", "description"] as const satisfies readonly (keyof FragmentChanges)[]

const log = createLogger("fragments")

export class FragmentStore {
  private db: DatabaseConnection
  private positions: PositionManager
  private skillLinks: SkillLinkTable<FragmentSkillRow>

  constructor(db: DatabaseConnection, positions: PositionManager) {
    this.db = db
    this.positions = positions
    this.skillLinks = new SkillLinkTable<FragmentSkillRow>(db, positions, {
      scope: "prompt_fragment_skills",
      ownerTable: "prompt_fragments",
      ownerLabel: "fragment",
    })
  }

  create(input: FragmentInput): FragmentRow {
    const parsed = validate(createFragmentSchema, input, "fragment")
    const fragment = guardDb("create fragment", input, () => {
      const now = Date.now()
      const row = this.db
        .prepare<[string, string, string | null, number, number], FragmentRow>(
          `INSERT INTO prompt_fragments (name, title, description, created_at, updated_at)
           VALUES (?, ?, ?, ?, ?) RETURNING *`,
        )
        .get(parsed.name, parsed.title, parsed.description ?? null, now, now)
      if (!row) throw notFound(`fragment ${parsed.name}`)
      return row
    })
    log.debug("fragment created", { id: fragment.id, name: fragment.name })
    return fragment
  }

  findById(id: number): FragmentRow | null {
    const fragmentId = validateId(id, "fragment id")
    return guardDb("get fragment", { id }, () =>
      this.db.prepare<[number], FragmentRow>("SELECT * FROM prompt_fragments WHERE id = ?").get(fragmentId) ?? null,
    )
  }

  getById(id: number): FragmentRow {
    const row = this.findById(id)
    if (!row) throw notFound(`fragment id ${id}`)
    return row
  }

  getByName(name: string): FragmentRow {
    return guardDb("get fragment by name", { name }, () => {
      const row = this.db.prepare<[string], FragmentRow>("SELECT * FROM prompt_fragments WHERE name = ?").get(name)
      if (!row) throw notFound(`fragment ${name}`)
      return row
    })
  }

  list(query: PageQuery = {}): FragmentRow[] {
    const parsed = validate(pageQuerySchema, query, "fragment query")
    return guardDb("list fragments", query, () =>
      this.db
        .prepare<[number, number], FragmentRow>(
          "SELECT * FROM prompt_fragments ORDER BY name ASC, id ASC LIMIT ? OFFSET ?",
        )
        .all(parsed.limit ?? DEFAULT_LIST_LIMIT, parsed.offset ?? 0),
    )
  }

  update(id: number, changes: FragmentChanges): FragmentRow {
    const fragmentId = validateId(id, "fragment id")
    const parsed = validate(updateFragmentSchema, changes, "fragment changes")
    const { clause, params } = buildAssignments(FRAGMENT_UPDATE_COLUMNS, parsed, "fragment")
    return guardDb("update fragment", { id, changes }, () => {
      const row = this.db
        .prepare<Record<string, unknown>, FragmentRow>(
          `UPDATE prompt_fragments SET ${clause}, updated_at = @updated_at WHERE id = @id RETURNING *`,
        )
        .get({ ...params, updated_at: Date.now(), id: fragmentId })
      if (!row) throw notFound(`fragment id ${fragmentId}`)
      return row
    })
  }

  delete(id: number): FragmentRow {
    const fragmentId = validateId(id, "fragment id")
    return guardDb("delete fragment", { id }, () => {
      const row = this.db
        .prepare<[number], FragmentRow>("DELETE FROM prompt_fragments WHERE id = ? RETURNING *")
        .get(fragmentId)
      if (!row) throw notFound(`fragment id ${fragmentId}`)
      return row
    })
  }

  associateSkill(input: { fragment_id: number; skill_id: number; position?: number | null }): FragmentSkillRow {
    const parsed = validate(fragmentSkillSchema, input, "fragment skill")
    return this.skillLinks.associate(parsed.fragment_id, parsed.skill_id, parsed.position)
  }

  removeSkill(fragmentId: number, skillId: number): FragmentSkillRow {
    return this.skillLinks.dissociate(fragmentId, skillId)
  }

  listSkills(fragmentId: number): LinkedSkill[] {
    return this.skillLinks.list(fragmentId)
  }

  reorderSkills(fragmentId: number, positions: PositionMap): LinkedSkill[] {
    return this.skillLinks.reorder(fragmentId, positions)
  }

  fragmentsContainingSkill(skillId: number): FragmentRow[] {
    const id = validateId(skillId, "skill id")
    return guardDb("list fragments containing skill", { skillId }, () =>
      this.db
        .prepare<[number], FragmentRow>(
          `SELECT f.* FROM prompt_fragments f
           JOIN prompt_fragment_skills fs ON fs.fragment_id = f.id
           WHERE fs.skill_id = ?
           ORDER BY f.name ASC, f.id ASC`,
        )
        .all(id),
    )
  }

  /**
   * Links a prompt to another prompt or to a fragment. Exactly one target column is set, and it
   * must match `reference_type`.
   */
  addReference(input: ReferenceInput): ReferenceRow {
    const parsed = validate(referenceSchema, input, "prompt reference")
    const targetPromptId = parsed.target_prompt_id ?? null
    const targetFragmentId = parsed.target_fragment_id ?? null
    if (targetPromptId === parsed.source_prompt_id) {
      throw invalidInput("a prompt cannot reference itself", { target_prompt_id: ["equals source_prompt_id"] })
    }

    const reference = guardDb("add prompt reference", input, () => {
      const tx = this.db.transaction(() => {
        this.requirePrompt(parsed.source_prompt_id)
        if (targetPromptId !== null) this.requirePrompt(targetPromptId)
        if (targetFragmentId !== null) this.getById(targetFragmentId)
        const position =
          parsed.position ?? this.positions.nextPosition("prompt_references", parsed.source_prompt_id)
        const row = this.db
          .prepare<[number, string, number | null, number | null, number, number], ReferenceRow>(
            `INSERT INTO prompt_references
               (source_prompt_id, reference_type, target_prompt_id, target_fragment_id, position, created_at)
             VALUES (?, ?, ?, ?, ?, ?) RETURNING *`,
          )
          .get(parsed.source_prompt_id, parsed.reference_type, targetPromptId, targetFragmentId, position, Date.now())
        if (!row) throw notFound(`reference from prompt ${parsed.source_prompt_id}`)
        return row
      })
      return tx()
    })
    log.debug("reference added", { id: reference.id, source: reference.source_prompt_id, type: reference.reference_type })
    return reference
  }

  listReferences(promptId: number): ReferenceRow[] {
    const id = validateId(promptId, "prompt id")
    return guardDb("list prompt references", { promptId }, () => {
      this.requirePrompt(id)
      return this.db
        .prepare<[number], ReferenceRow>(
          "SELECT * FROM prompt_references WHERE source_prompt_id = ? ORDER BY position ASC, id ASC",
        )
        .all(id)
    })
  }

  removeReference(id: number): ReferenceRow {
    const referenceId = validateId(id, "reference id")
    return guardDb("remove prompt reference", { id }, () => {
      const row = this.db
        .prepare<[number], ReferenceRow>("DELETE FROM prompt_references WHERE id = ? RETURNING *")
        .get(referenceId)
      if (!row) throw notFound(`reference id ${referenceId}`)
      return row
    })
  }

  reorderReferences(promptId: number, positions: PositionMap): ReferenceRow[] {
    this.positions.reorder("prompt_references", promptId, positions)
    return this.listReferences(promptId)
  }

  promptWithFragmentReferences(promptId: number): PromptWithReferences {
    const id = validateId(promptId, "prompt id")
    return guardDb("get prompt with fragment references", { promptId }, () => {
      const read = this.db.transaction((): PromptWithReferences => {
        const prompt = this.db.prepare<[number], PromptRow>("SELECT * FROM prompts WHERE id = ?").get(id)
        if (!prompt) throw notFound(`prompt id ${id}`)
        const fragmentReferences = this.db
          .prepare<[number], FragmentReference>(
            `SELECT r.*, f.name AS name, f.title AS title
             FROM prompt_references r
             JOIN prompt_fragments f ON f.id = r.target_fragment_id
             WHERE r.source_prompt_id = ? AND r.reference_type = 'fragment'
             ORDER BY r.position ASC, r.id ASC`,
          )
          .all(id)
        return { ...prompt, fragment_references: fragmentReferences }
      })
      return read()
    })
  }

  private requirePrompt(id: number) {
    const row = this.db.prepare<[number], { id: number }>("SELECT id FROM prompts WHERE id = ?").get(id)
    if (!row) throw notFound(`prompt id ${id}`)
  }
}
