export const PLAN_STATUSES = ["draft", "in-progress", "completed", "archived", "cancelled"] as const
export type PlanStatus = (typeof PLAN_STATUSES)[number]

export const REFERENCE_TYPES = ["prompt", "fragment"] as const
export type ReferenceType = (typeof REFERENCE_TYPES)[number]

export interface PlanRow {
  id: number
  name: string
  title: string | null
  summary: string | null
  description: string | null
  content: string
  status: PlanStatus
  created_by: string | null
  assigned_to: string | null
  created_at: number
  updated_at: number
  completed_at: number | null
}

export interface TaskListRow {
  id: number
  plan_id: number
  name: string
  description: string | null
  position: number
  created_at: number
  updated_at: number
}

export interface TaskRow {
  id: number
  list_id: number
  name: string
  description: string | null
  position: number
  completed: 0 | 1
  completed_at: number | null
  assigned_to: string | null
  created_at: number
  updated_at: number
}

export interface PlanTaskRow extends TaskRow {
  list_name: string
  list_position: number
}

export interface SkillRow {
  id: number
  path: string
  category: string
  name: string
  title: string | null
  description: string | null
  content: string
  file_hash: string
  size_bytes: number
  token_count: number | null
  created_at: number
  updated_at: number
}

export interface PromptRow {
  id: number
  path: string
  name: string
  title: string | null
  author: string | null
  description: string | null
  content: string
  file_hash: string
  size_bytes: number
  token_count: number | null
  created_at: number
  updated_at: number
}

export interface FragmentRow {
  id: number
  name: string
  title: string
  description: string | null
  created_at: number
  updated_at: number
}

export interface SkillLinkRow {
  skill_id: number
  position: number
  created_at: number
}

export interface PromptSkillRow extends SkillLinkRow {
  prompt_id: number
}

export interface PlanSkillRow extends SkillLinkRow {
  plan_id: number
}

export interface FragmentSkillRow extends SkillLinkRow {
  fragment_id: number
}

export type LinkedSkill = Pick<SkillRow, "id" | "path" | "category" | "name" | "title" | "description"> & {
  position: number
  linked_at: number
}

export interface ReferenceRow {
  id: number
  source_prompt_id: number
  reference_type: ReferenceType
  target_prompt_id: number | null
  target_fragment_id: number | null
  position: number
  created_at: number
}

export interface FragmentReference extends ReferenceRow {
  name: string | null
  title: string | null
}

export type PromptWithReferences = PromptRow & {
  fragment_references: FragmentReference[]
}

export type TaskListDetail = TaskListRow & {
  tasks: TaskRow[]
}

export interface PlanDetail {
  plan: PlanRow
  lists: TaskListDetail[]
}

export interface TaskSummary {
  total: number
  completed: number
  pending: number
}

export interface PlanInput {
  name: string
  title?: string | null
  summary?: string | null
  description?: string | null
  content?: string | null
  status?: PlanStatus | null
  created_by?: string | null
  assigned_to?: string | null
}

export interface PlanChanges {
  name?: string
  title?: string | null
  summary?: string | null
  description?: string | null
  content?: string
  status?: PlanStatus
  assigned_to?: string | null
}

export interface PlanQuery {
  status?: PlanStatus | null
  created_by?: string | null
  assigned_to?: string | null
  limit?: number
  offset?: number
}

export interface TaskListInput {
  plan_id: number
  name: string
  description?: string | null
  position?: number | null
}

export interface TaskListChanges {
  name?: string
  description?: string | null
  position?: number
}

export interface TaskInput {
  list_id: number
  name: string
  description?: string | null
  position?: number | null
  assigned_to?: string | null
}

export interface TaskChanges {
  name?: string
  description?: string | null
  position?: number
  assigned_to?: string | null
}

export interface SkillInput {
  path: string
  category: string
  name: string
  title?: string | null
  description?: string | null
  content: string
  file_hash?: string
  size_bytes?: number
  token_count?: number | null
}

export interface SkillChanges {
  path?: string
  category?: string
  name?: string
  title?: string | null
  description?: string | null
  content?: string
  file_hash?: string
  size_bytes?: number
  token_count?: number | null
}

export interface SkillQuery {
  category?: string | null
  limit?: number
  offset?: number
}

export interface PromptInput {
  path: string
  name: string
  title?: string | null
  author?: string | null
  description?: string | null
  content: string
  file_hash?: string
  size_bytes?: number
  token_count?: number | null
}

export interface PromptChanges {
  path?: string
  name?: string
  title?: string | null
  author?: string | null
  description?: string | null
  content?: string
  file_hash?: string
  size_bytes?: number
  token_count?: number | null
}

export interface PageQuery {
  limit?: number
  offset?: number
}

export interface FragmentInput {
  name: string
  title: string
  description?: string | null
}

export interface FragmentChanges {
  name?: string
  title?: string
  description?: string | null
}

export interface ReferenceInput {
  source_prompt_id: number
  reference_type: ReferenceType
  target_prompt_id?: number | null
  target_fragment_id?: number | null
  position?: number | null
}

export type SyncStatus = "created" | "updated" | "unchanged"

export interface SyncResult<T> {
  status: SyncStatus
  record: T
}

export interface CategoryCount {
  category: string
  count: number
}

export type SearchHit<T> = T & {
  snippet: string
  rank: number
}

export interface SnippetOptions {
  open: string
  close: string
  ellipsis: string
  tokens: number
}

export interface SearchOptions {
  maxResults?: number
  /** Skills only; prompt and plan searches reject it. */
  category?: string | null
  snippet?: Partial<SnippetOptions>
}

export interface SearchAllResult {
  skills: SearchHit<SkillRow>[]
  prompts: SearchHit<PromptRow>[]
  plans: SearchHit<PlanRow>[]
}

export interface CatalogStats {
  skills: number
  prompts: number
  plans: number
  totalSizeBytes: number
  totalTokens: number
  categories: number
  categoryBreakdown: CategoryCount[]
}

export type SearchableKind = "skills" | "prompts" | "plans"

export interface MigrationUnit {
  version: number
  name: string
  up: string[]
  down: string[]
}

export interface MigrationReport {
  status: "up-to-date" | "migrated"
  from: number
  to: number
  applied: number[]
}

export interface RollbackReport {
  from: number
  to: number
  reverted: number[]
}
