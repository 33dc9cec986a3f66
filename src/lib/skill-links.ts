import type { DatabaseConnection } from "./db"
import { notFound } from "./errors"
import { createLogger } from "./logger"
import type { LinkedSkill, SkillLinkRow } from "./models"
import { POSITION_SCOPES, type PositionManager } from "./positions"
import { guardDb, type PositionMap } from "./util"
import { idSchema, validate } from "./validation"

export type SkillLinkScope = "prompt_skills" | "plan_skills" | "prompt_fragment_skills"

export type SkillLinkOptions = {
  scope: SkillLinkScope
  ownerTable: string
  ownerLabel: string
}

const log = createLogger("skill-links")

/** Ordered owner→skill junction shared by prompts, plans and fragments. */
export class SkillLinkTable<R extends SkillLinkRow> {
  private db: DatabaseConnection
  private positions: PositionManager
  private options: SkillLinkOptions
  private ownerColumn: string

  constructor(db: DatabaseConnection, positions: PositionManager, options: SkillLinkOptions) {
    this.db = db
    this.positions = positions
    this.options = options
    this.ownerColumn = POSITION_SCOPES[options.scope].scopeColumn
  }

  requireOwner(ownerId: number) {
    const row = this.db.prepare<[number], { id: number }>(`SELECT id FROM ${this.options.ownerTable} WHERE id = ?`).get(ownerId)
    if (!row) throw notFound(`${this.options.ownerLabel} id ${ownerId}`)
  }

  private requireSkill(skillId: number) {
    const row = this.db.prepare<[number], { id: number }>("SELECT id FROM skills WHERE id = ?").get(skillId)
    if (!row) throw notFound(`skill id ${skillId}`)
  }

  associate(ownerId: number, skillId: number, position?: number | null): R {
    const input = { ownerId, skillId, position }
    return guardDb(`associate skill with ${this.options.ownerLabel}`, input, () => {
      const tx = this.db.transaction(() => {
        this.requireOwner(ownerId)
        this.requireSkill(skillId)
        const slot = position ?? this.positions.nextPosition(this.options.scope, ownerId)
        const row = this.db
          .prepare<[number, number, number, number], R>(
            `INSERT INTO ${this.options.scope} (${this.ownerColumn}, skill_id, position, created_at)
             VALUES (?, ?, ?, ?) RETURNING *`,
          )
          .get(ownerId, skillId, slot, Date.now())
        if (!row) throw notFound(`${this.options.ownerLabel} skill link ${ownerId}/${skillId}`)
        return row
      })
      const row = tx()
      log.debug("skill linked", { scope: this.options.scope, ownerId, skillId, position: row.position })
      return row
    })
  }

  dissociate(ownerId: number, skillId: number): R {
    const owner = validate(idSchema, ownerId, `${this.options.ownerLabel} id`)
    const skill = validate(idSchema, skillId, "skill id")
    return guardDb(`dissociate skill from ${this.options.ownerLabel}`, { ownerId, skillId }, () => {
      const row = this.db
        .prepare<[number, number], R>(
          `DELETE FROM ${this.options.scope} WHERE ${this.ownerColumn} = ? AND skill_id = ? RETURNING *`,
        )
        .get(owner, skill)
      if (!row) throw notFound(`skill ${skill} on ${this.options.ownerLabel} ${owner}`)
      return row
    })
  }

  dissociateAll(ownerId: number): number {
    const owner = validate(idSchema, ownerId, `${this.options.ownerLabel} id`)
    return guardDb(`dissociate all skills from ${this.options.ownerLabel}`, { ownerId }, () => {
      this.requireOwner(owner)
      return this.db.prepare<[number]>(`DELETE FROM ${this.options.scope} WHERE ${this.ownerColumn} = ?`).run(owner).changes
    })
  }

  list(ownerId: number): LinkedSkill[] {
    const owner = validate(idSchema, ownerId, `${this.options.ownerLabel} id`)
    return guardDb(`list ${this.options.ownerLabel} skills`, { ownerId }, () => {
      this.requireOwner(owner)
      return this.db
        .prepare<[number], LinkedSkill>(
          `SELECT s.id, s.path, s.category, s.name, s.title, s.description,
                  l.position AS position, l.created_at AS linked_at
           FROM ${this.options.scope} l
           JOIN skills s ON s.id = l.skill_id
           WHERE l.${this.ownerColumn} = ?
           ORDER BY l.position ASC, s.id ASC`,
        )
        .all(owner)
    })
  }

  reorder(ownerId: number, positions: PositionMap): LinkedSkill[] {
    this.positions.reorder(this.options.scope, ownerId, positions)
    return this.list(ownerId)
  }
}
