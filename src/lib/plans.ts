import type { DatabaseConnection } from "./db"
import { notFound } from "./errors"
import { createLogger } from "./logger"
import type {
  LinkedSkill,
  PlanChanges,
  PlanDetail,
  PlanInput,
  PlanQuery,
  PlanRow,
  PlanSkillRow,
  TaskListRow,
  TaskRow,
  TaskSummary,
} from "./models"
import type { PositionManager } from "./positions"
import { SkillLinkTable } from "./skill-links"
import { buildAssignments, guardDb, type PositionMap } from "./util"
import {
  DEFAULT_LIST_LIMIT,
  createPlanSchema,
  planQuerySchema,
  planSkillSchema,
  updatePlanSchema,
  validate,
  validateId,
} from "./validation"

const PLAN_UPDATE_COLUMNS = [
  "name",
  "title",
  "summary",
  "description",
  "content",
  "status",
  "assigned_to",
] as const satisfies readonly (keyof PlanChanges)[]

type PlanInsert = {
  name: string
  title: string | null
  summary: string | null
  description: string | null
  content: string
  status: string
  created_by: string | null
  assigned_to: string | null
  now: number
}

const log = createLogger("plans")

export class PlanStore {
  private db: DatabaseConnection
  private skillLinks: SkillLinkTable<PlanSkillRow>

  constructor(db: DatabaseConnection, positions: PositionManager) {
    this.db = db
    this.skillLinks = new SkillLinkTable<PlanSkillRow>(db, positions, {
      scope: "plan_skills",
      ownerTable: "implementation_plans",
      ownerLabel: "plan",
    })
  }

  create(input: PlanInput): PlanRow {
    const parsed = validate(createPlanSchema, input, "plan")
    const plan = guardDb("create plan", input, () => {
      const row = this.db
        .prepare<PlanInsert, PlanRow>(
          `INSERT INTO implementation_plans
             (name, title, summary, description, content, status, created_by, assigned_to, created_at, updated_at)
           VALUES (@name, @title, @summary, @description, @content, @status, @created_by, @assigned_to, @now, @now)
           RETURNING *`,
        )
        .get({
          name: parsed.name,
          title: parsed.title ?? null,
          summary: parsed.summary ?? null,
          description: parsed.description ?? null,
          content: parsed.content ?? "",
          status: parsed.status ?? "draft",
          created_by: parsed.created_by ?? null,
          assigned_to: parsed.assigned_to ?? null,
          now: Date.now(),
        })
      if (!row) throw notFound(`plan ${parsed.name}`)
      return row
    })
    log.debug("plan created", { id: plan.id })
    return plan
  }

  findById(id: number): PlanRow | null {
    const planId = validateId(id, "plan id")
    return guardDb("get plan", { id }, () =>
      this.db.prepare<[number], PlanRow>("SELECT * FROM implementation_plans WHERE id = ?").get(planId) ?? null,
    )
  }

  getById(id: number): PlanRow {
    const row = this.findById(id)
    if (!row) throw notFound(`plan id ${id}`)
    return row
  }

  getByName(name: string): PlanRow {
    return guardDb("get plan by name", { name }, () => {
      const row = this.db.prepare<[string], PlanRow>("SELECT * FROM implementation_plans WHERE name = ?").get(name)
      if (!row) throw notFound(`plan ${name}`)
      return row
    })
  }

  list(query: PlanQuery = {}): PlanRow[] {
    const parsed = validate(planQuerySchema, query, "plan query")
    const where: string[] = []
    const params: Record<string, string | number> = {
      limit: parsed.limit ?? DEFAULT_LIST_LIMIT,
      offset: parsed.offset ?? 0,
    }
    if (parsed.status) {
      where.push("status = @status")
      params.status = parsed.status
    }
    if (parsed.created_by) {
      where.push("created_by = @created_by")
      params.created_by = parsed.created_by
    }
    if (parsed.assigned_to) {
      where.push("assigned_to = @assigned_to")
      params.assigned_to = parsed.assigned_to
    }
    const whereSql = where.length ? `WHERE ${where.join(" AND ")}` : ""
    return guardDb("list plans", query, () =>
      this.db
        .prepare<Record<string, string | number>, PlanRow>(
          `SELECT * FROM implementation_plans ${whereSql}
           ORDER BY created_at DESC, id DESC
           LIMIT @limit OFFSET @offset`,
        )
        .all(params),
    )
  }

  update(id: number, changes: PlanChanges): PlanRow {
    const planId = validateId(id, "plan id")
    const parsed = validate(updatePlanSchema, changes, "plan changes")
    const { clause, params } = buildAssignments(PLAN_UPDATE_COLUMNS, parsed, "plan")
    const plan = guardDb("update plan", { id, changes }, () => {
      const row = this.db
        .prepare<Record<string, unknown>, PlanRow>(
          `UPDATE implementation_plans SET ${clause}, updated_at = @updated_at WHERE id = @id RETURNING *`,
        )
        .get({ ...params, updated_at: Date.now(), id: planId })
      if (!row) throw notFound(`plan id ${planId}`)
      return row
    })
    log.debug("plan updated", { id: planId, fields: Object.keys(params) })
    return plan
  }

  delete(id: number): PlanRow {
    const planId = validateId(id, "plan id")
    const plan = guardDb("delete plan", { id }, () => {
      const row = this.db
        .prepare<[number], PlanRow>("DELETE FROM implementation_plans WHERE id = ? RETURNING *")
        .get(planId)
      if (!row) throw notFound(`plan id ${planId}`)
      return row
    })
    log.debug("plan deleted", { id: planId })
    return plan
  }

  complete(id: number): PlanRow {
    const planId = validateId(id, "plan id")
    return guardDb("complete plan", { id }, () => {
      const row = this.db
        .prepare<{ id: number; now: number }, PlanRow>(
          `UPDATE implementation_plans
           SET status = 'completed', completed_at = @now, updated_at = @now
           WHERE id = @id RETURNING *`,
        )
        .get({ id: planId, now: Date.now() })
      if (!row) throw notFound(`plan id ${planId}`)
      return row
    })
  }

  archive(id: number): PlanRow {
    const planId = validateId(id, "plan id")
    return guardDb("archive plan", { id }, () => {
      const row = this.db
        .prepare<{ id: number; now: number }, PlanRow>(
          "UPDATE implementation_plans SET status = 'archived', updated_at = @now WHERE id = @id RETURNING *",
        )
        .get({ id: planId, now: Date.now() })
      if (!row) throw notFound(`plan id ${planId}`)
      return row
    })
  }

  getDetail(id: number): PlanDetail {
    const planId = validateId(id, "plan id")
    return guardDb("get plan detail", { id }, () => {
      const read = this.db.transaction((): PlanDetail => {
        const plan = this.getById(planId)
        const lists = this.db
          .prepare<[number], TaskListRow>("SELECT * FROM task_lists WHERE plan_id = ? ORDER BY position ASC, id ASC")
          .all(planId)
        const rows = this.db
          .prepare<[number], TaskRow>(
            `SELECT t.* FROM tasks t
             JOIN task_lists l ON l.id = t.list_id
             WHERE l.plan_id = ?
             ORDER BY t.position ASC, t.id ASC`,
          )
          .all(planId)
        return {
          plan,
          lists: lists.map((list) => ({ ...list, tasks: rows.filter((task) => task.list_id === list.id) })),
        }
      })
      return read()
    })
  }

  taskSummary(id: number): TaskSummary {
    const planId = validateId(id, "plan id")
    return guardDb("summarize plan tasks", { id }, () => {
      this.getById(planId)
      const row = this.db
        .prepare<[number], { total: number; completed: number }>(
          `SELECT COUNT(t.id) AS total, COALESCE(SUM(t.completed), 0) AS completed
           FROM tasks t
           JOIN task_lists l ON l.id = t.list_id
           WHERE l.plan_id = ?`,
        )
        .get(planId)
      const total = row?.total ?? 0
      const completed = row?.completed ?? 0
      return { total, completed, pending: total - completed }
    })
  }

  associateSkill(input: { plan_id: number; skill_id: number; position?: number | null }): PlanSkillRow {
    const parsed = validate(planSkillSchema, input, "plan skill")
    return this.skillLinks.associate(parsed.plan_id, parsed.skill_id, parsed.position)
  }

  dissociateSkill(planId: number, skillId: number): PlanSkillRow {
    return this.skillLinks.dissociate(planId, skillId)
  }

  listSkills(planId: number): LinkedSkill[] {
    return this.skillLinks.list(planId)
  }

  reorderSkills(planId: number, positions: PositionMap): LinkedSkill[] {
    return this.skillLinks.reorder(planId, positions)
  }
}
