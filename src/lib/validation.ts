import { z } from "zod"
import { invalidInput, type FieldErrors } from "./errors"
import { MAX_SEARCH_RESULTS, MAX_SNIPPET_TOKENS } from "./config"
import {
  PLAN_STATUSES,
  REFERENCE_TYPES,
  type FragmentChanges,
  type FragmentInput,
  type PageQuery,
  type PlanChanges,
  type PlanInput,
  type PlanQuery,
  type PromptChanges,
  type PromptInput,
  type ReferenceInput,
  type SearchOptions,
  type SkillChanges,
  type SkillInput,
  type SkillQuery,
  type TaskChanges,
  type TaskInput,
  type TaskListChanges,
  type TaskListInput,
} from "./models"

export const MAX_LIST_LIMIT = 1000
export const DEFAULT_LIST_LIMIT = 100

const nonBlank = (max: number) =>
  z
    .string()
    .min(1)
    .max(max)
    .refine((value) => value.trim().length > 0, { message: "cannot be empty" })

const optionalText = (max: number) => z.string().max(max).nullable().optional()

export const idSchema = z.number().int().min(1)
export const positionSchema = z.number().int().min(0)

const limitSchema = z.number().int().min(1).max(MAX_LIST_LIMIT).optional()
const offsetSchema = z.number().int().min(0).optional()
const statusSchema = z.enum(PLAN_STATUSES)

export const createPlanSchema = z
  .object({
    name: nonBlank(255),
    title: optionalText(500),
    summary: optionalText(1000),
    description: optionalText(2000),
    content: z.string().nullable().optional(),
    status: statusSchema.nullable().optional(),
    created_by: optionalText(255),
    assigned_to: optionalText(255),
  })
  .strict() satisfies z.ZodType<PlanInput>

export const updatePlanSchema = z
  .object({
    name: nonBlank(255).optional(),
    title: optionalText(500),
    summary: optionalText(1000),
    description: optionalText(2000),
    content: z.string().optional(),
    status: statusSchema.optional(),
    assigned_to: optionalText(255),
  })
  .strict() satisfies z.ZodType<PlanChanges>

export const planQuerySchema = z
  .object({
    status: statusSchema.nullable().optional(),
    created_by: optionalText(255),
    assigned_to: optionalText(255),
    limit: limitSchema,
    offset: offsetSchema,
  })
  .strict() satisfies z.ZodType<PlanQuery>

export const createTaskListSchema = z
  .object({
    plan_id: idSchema,
    name: nonBlank(255),
    description: optionalText(2000),
    position: positionSchema.nullable().optional(),
  })
  .strict() satisfies z.ZodType<TaskListInput>

export const updateTaskListSchema = z
  .object({
    name: nonBlank(255).optional(),
    description: optionalText(2000),
    position: positionSchema.optional(),
  })
  .strict() satisfies z.ZodType<TaskListChanges>

export const createTaskSchema = z
  .object({
    list_id: idSchema,
    name: nonBlank(255),
    description: optionalText(2000),
    position: positionSchema.nullable().optional(),
    assigned_to: optionalText(255),
  })
  .strict() satisfies z.ZodType<TaskInput>

export const updateTaskSchema = z
  .object({
    name: nonBlank(255).optional(),
    description: optionalText(2000),
    position: positionSchema.optional(),
    assigned_to: optionalText(255),
  })
  .strict() satisfies z.ZodType<TaskChanges>

const documentFields = {
  content: z.string(),
  file_hash: z.string().min(1).max(128).optional(),
  size_bytes: z.number().int().min(0).optional(),
  token_count: z.number().int().min(0).nullable().optional(),
}

export const createSkillSchema = z
  .object({
    path: nonBlank(1024),
    category: nonBlank(255),
    name: nonBlank(255),
    title: optionalText(500),
    description: optionalText(2000),
    ...documentFields,
  })
  .strict() satisfies z.ZodType<SkillInput>

export const updateSkillSchema = z
  .object({
    path: nonBlank(1024).optional(),
    category: nonBlank(255).optional(),
    name: nonBlank(255).optional(),
    title: optionalText(500),
    description: optionalText(2000),
    content: z.string().optional(),
    file_hash: documentFields.file_hash,
    size_bytes: documentFields.size_bytes,
    token_count: documentFields.token_count,
  })
  .strict() satisfies z.ZodType<SkillChanges>

export const skillQuerySchema = z
  .object({
    category: optionalText(255),
    limit: limitSchema,
    offset: offsetSchema,
  })
  .strict() satisfies z.ZodType<SkillQuery>

export const createPromptSchema = z
  .object({
    path: nonBlank(1024),
    name: nonBlank(255),
    title: optionalText(500),
    author: optionalText(255),
    description: optionalText(2000),
    ...documentFields,
  })
  .strict() satisfies z.ZodType<PromptInput>

export const updatePromptSchema = z
  .object({
    path: nonBlank(1024).optional(),
    name: nonBlank(255).optional(),
    title: optionalText(500),
    author: optionalText(255),
    description: optionalText(2000),
    content: z.string().optional(),
    file_hash: documentFields.file_hash,
    size_bytes: documentFields.size_bytes,
    token_count: documentFields.token_count,
  })
  .strict() satisfies z.ZodType<PromptChanges>

export const pageQuerySchema = z
  .object({
    limit: limitSchema,
    offset: offsetSchema,
  })
  .strict() satisfies z.ZodType<PageQuery>

export const createFragmentSchema = z
  .object({
    name: nonBlank(255),
    title: nonBlank(500),
    description: optionalText(2000),
  })
  .strict() satisfies z.ZodType<FragmentInput>

export const updateFragmentSchema = z
  .object({
    name: nonBlank(255).optional(),
    title: nonBlank(500).optional(),
    description: optionalText(2000),
  })
  .strict() satisfies z.ZodType<FragmentChanges>

export const promptSkillSchema = z
  .object({ prompt_id: idSchema, skill_id: idSchema, position: positionSchema.nullable().optional() })
  .strict()

export const planSkillSchema = z
  .object({ plan_id: idSchema, skill_id: idSchema, position: positionSchema.nullable().optional() })
  .strict()

export const fragmentSkillSchema = z
  .object({ fragment_id: idSchema, skill_id: idSchema, position: positionSchema.nullable().optional() })
  .strict()

export const referenceSchema = z
  .object({
    source_prompt_id: idSchema,
    reference_type: z.enum(REFERENCE_TYPES),
    target_prompt_id: idSchema.nullable().optional(),
    target_fragment_id: idSchema.nullable().optional(),
    position: positionSchema.nullable().optional(),
  })
  .strict()
  .superRefine((value, ctx) => {
    const hasPrompt = value.target_prompt_id !== undefined && value.target_prompt_id !== null
    const hasFragment = value.target_fragment_id !== undefined && value.target_fragment_id !== null
    if (hasPrompt && hasFragment) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["reference_type"],
        message: "ambiguous reference target: set either target_prompt_id or target_fragment_id",
      })
      return
    }
    if (value.reference_type === "prompt" && !hasPrompt) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["target_prompt_id"],
        message: "required when reference_type is prompt",
      })
    }
    if (value.reference_type === "fragment" && !hasFragment) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["target_fragment_id"],
        message: "required when reference_type is fragment",
      })
    }
  }) satisfies z.ZodType<ReferenceInput>

export const searchQuerySchema = nonBlank(10_000)

export const searchOptionsSchema = z
  .object({
    maxResults: z.number().int().min(1).max(MAX_SEARCH_RESULTS).optional(),
    category: optionalText(255),
    snippet: z
      .object({
        open: z.string().max(64).optional(),
        close: z.string().max(64).optional(),
        ellipsis: z.string().max(64).optional(),
        tokens: z.number().int().min(1).max(MAX_SNIPPET_TOKENS).optional(),
      })
      .strict()
      .optional(),
  })
  .strict() satisfies z.ZodType<SearchOptions>

export const positionEntriesSchema = z.array(z.tuple([idSchema, positionSchema]))

export function collectFieldErrors(error: z.ZodError): FieldErrors {
  const fields: FieldErrors = {}
  const push = (key: string, message: string) => {
    const list = fields[key] ?? []
    list.push(message)
    fields[key] = list
  }
  for (const issue of error.issues) {
    if (issue.code === z.ZodIssueCode.unrecognized_keys) {
      for (const key of issue.keys) push(key, "unknown field")
      continue
    }
    push(issue.path.length ? issue.path.join(".") : "value", issue.message)
  }
  return fields
}

export function validate<S extends z.ZodTypeAny>(schema: S, value: unknown, label: string): z.output<S> {
  const result = schema.safeParse(value)
  if (!result.success) {
    throw invalidInput(`invalid ${label}`, collectFieldErrors(result.error))
  }
  return result.data
}

export function validateId(value: unknown, label: string): number {
  return validate(idSchema, value, label)
}
