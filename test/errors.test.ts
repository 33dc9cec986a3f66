import { describe, expect, test } from "vitest"
import { AppError, invalidInput, ioError, isAppError, notFound, wrapDbError } from "../src/lib/errors"

describe("AppError", () => {
  test("display strings carry the kind label and field lines", () => {
    expect(notFound("plan id 3").toDisplayString()).toBe("Not found: plan id 3")
    expect(invalidInput("invalid plan", { name: ["too long", "cannot be empty"] }).toDisplayString()).toBe(
      "Invalid input:\ninvalid plan\n  - name: too long\n  - name: cannot be empty",
    )
    expect(ioError("read migrations", new Error("EACCES")).toDisplayString()).toBe("I/O error: read migrations: EACCES")
  })

  test("wrapDbError keeps the cause, operation and input", () => {
    const cause = new Error("UNIQUE constraint failed: implementation_plans.name")
    const error = wrapDbError("create plan", cause, { name: "dup" })

    expect(error).toBeInstanceOf(AppError)
    expect(error.kind).toBe("Db")
    expect(error.detail).toBe("create plan: UNIQUE constraint failed: implementation_plans.name")
    expect(error.cause).toBe(cause)
    expect(error.context).toEqual({ operation: "create plan", input: { name: "dup" } })
    expect(error.toDisplayString()).toBe(error.detail)
  })

  test("non-Error causes fall back to the operation", () => {
    expect(wrapDbError("delete plan", "busy").detail).toBe("delete plan")
  })

  test("isAppError narrows by kind", () => {
    const error = notFound("skill id 1")
    expect(isAppError(error)).toBe(true)
    expect(isAppError(error, "NotFound")).toBe(true)
    expect(isAppError(error, "Db")).toBe(false)
    expect(isAppError(new Error("plain"))).toBe(false)
  })
})
