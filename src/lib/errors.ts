export type AppErrorKind = "InvalidInput" | "NotFound" | "Db" | "Io"

export type FieldErrors = Record<string, string[]>

export type ErrorContext = {
  operation: string
  input?: unknown
}

type AppErrorOptions = {
  fields?: FieldErrors
  context?: ErrorContext
  cause?: unknown
}

export class AppError extends Error {
  public readonly kind: AppErrorKind
  public readonly detail: string
  public readonly fields: FieldErrors
  public readonly context: ErrorContext | null

  constructor(kind: AppErrorKind, detail: string, options: AppErrorOptions = {}) {
    super(detail, options.cause === undefined ? undefined : { cause: options.cause })
    this.name = "AppError"
    this.kind = kind
    this.detail = detail
    this.fields = options.fields ?? {}
    this.context = options.context ?? null
  }

  toDisplayString(): string {
    const label =
      this.kind === "InvalidInput"
        ? "Invalid input"
        : this.kind === "NotFound"
          ? "Not found"
          : this.kind === "Io"
            ? "I/O error"
            : null
    const fieldLines = Object.entries(this.fields).flatMap(([field, messages]) =>
      messages.map((message) => `  - ${field}: ${message}`),
    )
    const detail = fieldLines.length ? `${this.detail}\n${fieldLines.join("\n")}` : this.detail
    if (!label) {
      return detail
    }
    if (detail.includes("\n")) {
      return `${label}:\n${detail}`
    }
    return `${label}: ${detail}`
  }
}

export function invalidInput(message: string, fields: FieldErrors = {}): AppError {
  return new AppError("InvalidInput", message, { fields })
}

export function notFound(message: string): AppError {
  return new AppError("NotFound", message)
}

export function wrapDbError(operation: string, err: unknown, input?: unknown): AppError {
  const detail = err instanceof Error ? `${operation}: ${err.message}` : operation
  return new AppError("Db", detail, { context: { operation, input }, cause: err })
}

export function ioError(message: string, err: unknown): AppError {
  const detail = err instanceof Error ? `${message}: ${err.message}` : message
  return new AppError("Io", detail, { cause: err })
}

export function isAppError(err: unknown, kind?: AppErrorKind): err is AppError {
  return err instanceof AppError && (kind === undefined || err.kind === kind)
}
