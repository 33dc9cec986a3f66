import { afterEach, describe, expect, test } from "vitest"
import type { PromptInput } from "../src/lib/models"
import { captureError, cleanupSandboxes, openTestApp, skillInput } from "./helpers"

afterEach(() => {
  cleanupSandboxes()
})

function promptInput(overrides: Partial<PromptInput> = {}): PromptInput {
  return {
    path: "prompts/review.md",
    name: "review",
    title: "Code review",
    author: "user-a",
    description: "Review checklist",
    content: "Check naming and error handling.",
    ...overrides,
  }
}

describe("PromptStore", () => {
  test("create, read, update and delete", () => {
    const app = openTestApp()
    const prompt = app.prompts.create(promptInput())

    expect(prompt).toMatchObject({ name: "review", author: "user-a", size_bytes: 32, token_count: 8 })
    expect(app.prompts.getByName("review")).toEqual(prompt)

    const updated = app.prompts.update(prompt.id, { author: null, content: "Shorter." })
    expect(updated.author).toBeNull()
    expect(updated.size_bytes).toBe(8)

    expect(app.prompts.delete(prompt.id).id).toBe(prompt.id)
    expect(app.prompts.findById(prompt.id)).toBeNull()
    expect(captureError(() => app.prompts.getById(prompt.id)).kind).toBe("NotFound")
  })

  test("list orders by name", () => {
    const app = openTestApp()
    app.prompts.create(promptInput({ path: "prompts/z.md", name: "zeta" }))
    app.prompts.create(promptInput({ path: "prompts/a.md", name: "alpha" }))
    expect(app.prompts.list().map((prompt) => prompt.name)).toEqual(["alpha", "zeta"])
    expect(app.prompts.list({ offset: 1 }).map((prompt) => prompt.name)).toEqual(["zeta"])
  })

  test("sync is keyed by name", () => {
    const app = openTestApp()
    const created = app.prompts.sync(promptInput())
    expect(created.status).toBe("created")
    expect(app.prompts.sync(promptInput()).status).toBe("unchanged")

    const moved = app.prompts.sync(promptInput({ path: "prompts/moved.md", content: "New body" }))
    expect(moved.status).toBe("updated")
    expect(moved.record.id).toBe(created.record.id)
    expect(moved.record.path).toBe("prompts/moved.md")
  })
})

describe("prompt skills", () => {
  test("links default to the next position and list in position order", () => {
    const app = openTestApp()
    const prompt = app.prompts.create(promptInput())
    const s1 = app.skills.create(skillInput({ path: "s/1", name: "one" }))
    const s2 = app.skills.create(skillInput({ path: "s/2", name: "two" }))
    const s3 = app.skills.create(skillInput({ path: "s/3", name: "three" }))

    app.prompts.associateSkill({ prompt_id: prompt.id, skill_id: s1.id })
    app.prompts.associateSkill({ prompt_id: prompt.id, skill_id: s2.id, position: 10 })
    const third = app.prompts.associateSkill({ prompt_id: prompt.id, skill_id: s3.id })

    expect(third).toMatchObject({ prompt_id: prompt.id, skill_id: s3.id, position: 11 })
    expect(app.prompts.listSkills(prompt.id).map((skill) => [skill.name, skill.position])).toEqual([
      ["one", 0],
      ["two", 10],
      ["three", 11],
    ])
  })

  test("reorder, dissociate and dissociate all", () => {
    const app = openTestApp()
    const prompt = app.prompts.create(promptInput())
    const s1 = app.skills.create(skillInput({ path: "s/1", name: "one" }))
    const s2 = app.skills.create(skillInput({ path: "s/2", name: "two" }))
    app.prompts.associateSkill({ prompt_id: prompt.id, skill_id: s1.id })
    app.prompts.associateSkill({ prompt_id: prompt.id, skill_id: s2.id })

    expect(app.prompts.reorderSkills(prompt.id, { [s1.id]: 5 }).map((skill) => skill.name)).toEqual(["two", "one"])
    expect(app.prompts.dissociateSkill(prompt.id, s2.id).skill_id).toBe(s2.id)
    expect(captureError(() => app.prompts.dissociateSkill(prompt.id, s2.id)).kind).toBe("NotFound")

    app.prompts.associateSkill({ prompt_id: prompt.id, skill_id: s2.id })
    expect(app.prompts.dissociateAllSkills(prompt.id)).toBe(2)
    expect(app.prompts.listSkills(prompt.id)).toEqual([])
  })

  test("deleting a skill removes its links", () => {
    const app = openTestApp()
    const prompt = app.prompts.create(promptInput())
    const skill = app.skills.create(skillInput())
    app.prompts.associateSkill({ prompt_id: prompt.id, skill_id: skill.id })

    app.skills.delete(skill.id)

    expect(app.prompts.listSkills(prompt.id)).toEqual([])
  })

  test("associations need an existing prompt", () => {
    const app = openTestApp()
    const skill = app.skills.create(skillInput())
    expect(captureError(() => app.prompts.associateSkill({ prompt_id: 7, skill_id: skill.id })).detail).toBe(
      "prompt id 7",
    )
    expect(captureError(() => app.prompts.listSkills(7)).kind).toBe("NotFound")
  })
})
