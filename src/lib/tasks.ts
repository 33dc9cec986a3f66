import type { DatabaseConnection } from "./db"
import { notFound } from "./errors"
import { createLogger } from "./logger"
import type {
  PlanTaskRow,
  TaskChanges,
  TaskInput,
  TaskListChanges,
  TaskListInput,
  TaskListRow,
  TaskRow,
} from "./models"
import type { PositionManager } from "./positions"
import { buildAssignments, guardDb, type PositionMap } from "./util"
import {
  createTaskListSchema,
  createTaskSchema,
  updateTaskListSchema,
  updateTaskSchema,
  validate,
  validateId,
} from "./validation"

const LIST_UPDATE_COLUMNS = ["name", "description", "position"] as const satisfies readonly (keyof TaskListChanges)[]
const TASK_UPDATE_COLUMNS = [
  "name",
  "description",
  "position",
  "assigned_to",
] as const satisfies readonly (keyof TaskChanges)[]

const log = createLogger("tasks")

export class TaskStore {
  private db: DatabaseConnection
  private positions: PositionManager

  constructor(db: DatabaseConnection, positions: PositionManager) {
    this.db = db
    this.positions = positions
  }

  createList(input: TaskListInput): TaskListRow {
    const parsed = validate(createTaskListSchema, input, "task list")
    const list = guardDb("create task list", input, () => {
      const tx = this.db.transaction(() => {
        const plan = this.db
          .prepare<[number], { id: number }>("SELECT id FROM implementation_plans WHERE id = ?")
          .get(parsed.plan_id)
        if (!plan) throw notFound(`plan id ${parsed.plan_id}`)
        const position = parsed.position ?? this.positions.nextPosition("task_lists", parsed.plan_id)
        const now = Date.now()
        const row = this.db
          .prepare<[number, string, string | null, number, number, number], TaskListRow>(
            `INSERT INTO task_lists (plan_id, name, description, position, created_at, updated_at)
             VALUES (?, ?, ?, ?, ?, ?) RETURNING *`,
          )
          .get(parsed.plan_id, parsed.name, parsed.description ?? null, position, now, now)
        if (!row) throw notFound(`task list ${parsed.name}`)
        return row
      })
      return tx()
    })
    log.debug("task list created", { id: list.id, planId: list.plan_id, position: list.position })
    return list
  }

  findList(id: number): TaskListRow | null {
    const listId = validateId(id, "task list id")
    return guardDb("get task list", { id }, () =>
      this.db.prepare<[number], TaskListRow>("SELECT * FROM task_lists WHERE id = ?").get(listId) ?? null,
    )
  }

  getList(id: number): TaskListRow {
    const row = this.findList(id)
    if (!row) throw notFound(`task list id ${id}`)
    return row
  }

  listForPlan(planId: number): TaskListRow[] {
    const id = validateId(planId, "plan id")
    return guardDb("list task lists", { planId }, () =>
      this.db
        .prepare<[number], TaskListRow>("SELECT * FROM task_lists WHERE plan_id = ? ORDER BY position ASC, id ASC")
        .all(id),
    )
  }

  updateList(id: number, changes: TaskListChanges): TaskListRow {
    const listId = validateId(id, "task list id")
    const parsed = validate(updateTaskListSchema, changes, "task list changes")
    const { clause, params } = buildAssignments(LIST_UPDATE_COLUMNS, parsed, "task list")
    return guardDb("update task list", { id, changes }, () => {
      const row = this.db
        .prepare<Record<string, unknown>, TaskListRow>(
          `UPDATE task_lists SET ${clause}, updated_at = @updated_at WHERE id = @id RETURNING *`,
        )
        .get({ ...params, updated_at: Date.now(), id: listId })
      if (!row) throw notFound(`task list id ${listId}`)
      return row
    })
  }

  deleteList(id: number): TaskListRow {
    const listId = validateId(id, "task list id")
    return guardDb("delete task list", { id }, () => {
      const row = this.db.prepare<[number], TaskListRow>("DELETE FROM task_lists WHERE id = ? RETURNING *").get(listId)
      if (!row) throw notFound(`task list id ${listId}`)
      return row
    })
  }

  reorderLists(planId: number, positions: PositionMap): TaskListRow[] {
    this.positions.reorder("task_lists", planId, positions)
    return this.listForPlan(planId)
  }

  createTask(input: TaskInput): TaskRow {
    const parsed = validate(createTaskSchema, input, "task")
    const task = guardDb("create task", input, () => {
      const tx = this.db.transaction(() => {
        this.getList(parsed.list_id)
        const position = parsed.position ?? this.positions.nextPosition("tasks", parsed.list_id)
        const now = Date.now()
        const row = this.db
          .prepare<[number, string, string | null, number, string | null, number, number], TaskRow>(
            `INSERT INTO tasks (list_id, name, description, position, completed, assigned_to, created_at, updated_at)
             VALUES (?, ?, ?, ?, 0, ?, ?, ?) RETURNING *`,
          )
          .get(parsed.list_id, parsed.name, parsed.description ?? null, position, parsed.assigned_to ?? null, now, now)
        if (!row) throw notFound(`task ${parsed.name}`)
        return row
      })
      return tx()
    })
    log.debug("task created", { id: task.id, listId: task.list_id, position: task.position })
    return task
  }

  findTask(id: number): TaskRow | null {
    const taskId = validateId(id, "task id")
    return guardDb("get task", { id }, () =>
      this.db.prepare<[number], TaskRow>("SELECT * FROM tasks WHERE id = ?").get(taskId) ?? null,
    )
  }

  getTask(id: number): TaskRow {
    const row = this.findTask(id)
    if (!row) throw notFound(`task id ${id}`)
    return row
  }

  listForList(listId: number): TaskRow[] {
    const id = validateId(listId, "task list id")
    return guardDb("list tasks", { listId }, () =>
      this.db.prepare<[number], TaskRow>("SELECT * FROM tasks WHERE list_id = ? ORDER BY position ASC, id ASC").all(id),
    )
  }

  listTasksForPlan(planId: number): PlanTaskRow[] {
    const id = validateId(planId, "plan id")
    return guardDb("list plan tasks", { planId }, () =>
      this.db
        .prepare<[number], PlanTaskRow>(
          `SELECT t.*, l.name AS list_name, l.position AS list_position
           FROM tasks t
           JOIN task_lists l ON l.id = t.list_id
           WHERE l.plan_id = ?
           ORDER BY l.position ASC, l.id ASC, t.position ASC, t.id ASC`,
        )
        .all(id),
    )
  }

  updateTask(id: number, changes: TaskChanges): TaskRow {
    const taskId = validateId(id, "task id")
    const parsed = validate(updateTaskSchema, changes, "task changes")
    const { clause, params } = buildAssignments(TASK_UPDATE_COLUMNS, parsed, "task")
    return guardDb("update task", { id, changes }, () => {
      const row = this.db
        .prepare<Record<string, unknown>, TaskRow>(
          `UPDATE tasks SET ${clause}, updated_at = @updated_at WHERE id = @id RETURNING *`,
        )
        .get({ ...params, updated_at: Date.now(), id: taskId })
      if (!row) throw notFound(`task id ${taskId}`)
      return row
    })
  }

  deleteTask(id: number): TaskRow {
    const taskId = validateId(id, "task id")
    return guardDb("delete task", { id }, () => {
      const row = this.db.prepare<[number], TaskRow>("DELETE FROM tasks WHERE id = ? RETURNING *").get(taskId)
      if (!row) throw notFound(`task id ${taskId}`)
      return row
    })
  }

  completeTask(id: number): TaskRow {
    return this.setCompleted(id, true)
  }

  uncompleteTask(id: number): TaskRow {
    return this.setCompleted(id, false)
  }

  reorderTasks(listId: number, positions: PositionMap): TaskRow[] {
    this.positions.reorder("tasks", listId, positions)
    return this.listForList(listId)
  }

  private setCompleted(id: number, completed: boolean): TaskRow {
    const taskId = validateId(id, "task id")
    const now = Date.now()
    return guardDb(completed ? "complete task" : "uncomplete task", { id }, () => {
      const row = this.db
        .prepare<[number, number | null, number, number], TaskRow>(
          "UPDATE tasks SET completed = ?, completed_at = ?, updated_at = ? WHERE id = ? RETURNING *",
        )
        .get(completed ? 1 : 0, completed ? now : null, now, taskId)
      if (!row) throw notFound(`task id ${taskId}`)
      return row
    })
  }
}
