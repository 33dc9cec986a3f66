import type { DatabaseConnection } from "./db"
import { notFound } from "./errors"
import { createLogger } from "./logger"
import { guardDb, joinIds, positionEntries, type PositionMap } from "./util"
import { idSchema, positionEntriesSchema, validate } from "./validation"

type ScopeSpec = {
  table: string
  scopeColumn: string
  memberColumn: string
  timestamped: boolean
}

export const POSITION_SCOPES = {
  task_lists: { table: "task_lists", scopeColumn: "plan_id", memberColumn: "id", timestamped: true },
  tasks: { table: "tasks", scopeColumn: "list_id", memberColumn: "id", timestamped: true },
  prompt_skills: { table: "prompt_skills", scopeColumn: "prompt_id", memberColumn: "skill_id", timestamped: false },
  plan_skills: { table: "plan_skills", scopeColumn: "plan_id", memberColumn: "skill_id", timestamped: false },
  prompt_fragment_skills: {
    table: "prompt_fragment_skills",
    scopeColumn: "fragment_id",
    memberColumn: "skill_id",
    timestamped: false,
  },
  prompt_references: {
    table: "prompt_references",
    scopeColumn: "source_prompt_id",
    memberColumn: "id",
    timestamped: false,
  },
} as const satisfies Record<string, ScopeSpec>

export type PositionScope = keyof typeof POSITION_SCOPES

const log = createLogger("positions")

export class PositionManager {
  private db: DatabaseConnection

  constructor(db: DatabaseConnection) {
    this.db = db
  }

  nextPosition(scope: PositionScope, scopeId: number): number {
    const target = POSITION_SCOPES[scope]
    const id = validate(idSchema, scopeId, `${scope} scope id`)
    return guardDb("next position", { scope, scopeId }, () => {
      const row = this.db
        .prepare<[number], { next: number }>(
          `SELECT COALESCE(MAX(position) + 1, 0) AS next FROM ${target.table} WHERE ${target.scopeColumn} = ?`,
        )
        .get(id)
      return row?.next ?? 0
    })
  }

  /**
   * Applies every mapping in one transaction. A member id outside the scope aborts the whole
   * batch with NotFound. Duplicate or sparse positions are stored as given.
   */
  reorder(scope: PositionScope, scopeId: number, positions: PositionMap): void {
    const target = POSITION_SCOPES[scope]
    const id = validate(idSchema, scopeId, `${scope} scope id`)
    const entries = validate(positionEntriesSchema, positionEntries(positions), `${scope} positions`)
    if (!entries.length) return

    const assignTimestamp = target.timestamped ? ", updated_at = @now" : ""
    const sql = `UPDATE ${target.table} SET position = @position${assignTimestamp}
      WHERE ${target.scopeColumn} = @scopeId AND ${target.memberColumn} = @memberId`

    guardDb("reorder", { scope, scopeId, positions: entries }, () => {
      const tx = this.db.transaction(() => {
        const statement = this.db.prepare<Record<string, number>>(sql)
        const now = Date.now()
        const missing: number[] = []
        for (const [memberId, position] of entries) {
          const params: Record<string, number> = { position, scopeId: id, memberId }
          if (target.timestamped) params.now = now
          const result = statement.run(params)
          if (result.changes === 0) missing.push(memberId)
        }
        if (missing.length) {
          throw notFound(`${target.memberColumn} ${joinIds(missing)} in ${scope} ${id}`)
        }
      })
      tx()
    })
    log.debug("reordered", { scope, scopeId: id, count: entries.length })
  }
}
