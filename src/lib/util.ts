import { createHash } from "crypto"
import { AppError, invalidInput, wrapDbError } from "./errors"

export type SqlValue = string | number | bigint | Buffer | null

export type Assignments = {
  clause: string
  params: Record<string, SqlValue>
}

export function joinIds(ids: number[]): string {
  return ids.map((id) => String(id)).join(", ")
}

export function contentHash(content: string): string {
  return createHash("sha256").update(content, "utf8").digest("hex")
}

export function byteLength(content: string): number {
  return Buffer.byteLength(content, "utf8")
}

// Rough estimate, four characters per token.
export function estimateTokens(content: string): number {
  return Math.floor(content.length / 4)
}

/**
 * Builds the SET list of an UPDATE from a fixed column list. Only columns whose value is defined
 * are assigned, each through a named parameter of the same name.
 */
export function buildAssignments<K extends string>(
  columns: readonly K[],
  changes: Partial<Record<K, SqlValue>>,
  label: string,
): Assignments {
  const parts: string[] = []
  const params: Record<string, SqlValue> = {}
  for (const column of columns) {
    const value = changes[column]
    if (value === undefined) continue
    parts.push(`${column} = @${column}`)
    params[column] = value
  }
  if (!parts.length) {
    throw invalidInput(`no fields to update for ${label}`, { changes: ["at least one field is required"] })
  }
  return { clause: parts.join(", "), params }
}

export function guardDb<T>(operation: string, input: unknown, fn: () => T): T {
  try {
    return fn()
  } catch (error) {
    if (error instanceof AppError) throw error
    throw wrapDbError(operation, error, input)
  }
}

export type PositionMap = Record<number, number> | Map<number, number>

export function positionEntries(positions: PositionMap): Array<[number, number]> {
  if (positions instanceof Map) return [...positions.entries()]
  return Object.entries(positions).map(([id, position]) => [Number(id), position])
}

export type DerivedDocumentFields = {
  file_hash: string
  size_bytes: number
  token_count: number | null
}

export function deriveDocumentFields(
  content: string,
  given: { file_hash?: string; size_bytes?: number; token_count?: number | null },
): DerivedDocumentFields {
  return {
    file_hash: given.file_hash ?? contentHash(content),
    size_bytes: given.size_bytes ?? byteLength(content),
    token_count: given.token_count === undefined ? estimateTokens(content) : given.token_count,
  }
}
