import { afterEach, describe, expect, test } from "vitest"
import { SearchEngine } from "../src/lib/search"
import { captureError, cleanupSandboxes, openTestApp, skillInput } from "./helpers"

afterEach(() => {
  cleanupSandboxes()
})

describe("index consistency", () => {
  test("skill writes are reflected in search results", () => {
    const app = openTestApp()
    const skill = app.skills.create(skillInput({ content: "the quasar pattern" }))
    expect(app.search.searchSkills("quasar").map((hit) => hit.id)).toEqual([skill.id])

    app.skills.update(skill.id, { content: "the nebula pattern" })
    expect(app.search.searchSkills("quasar")).toEqual([])
    expect(app.search.searchSkills("nebula").map((hit) => hit.id)).toEqual([skill.id])

    app.skills.delete(skill.id)
    expect(app.search.searchSkills("nebula")).toEqual([])
  })

  test("plan writes are reflected in search results", () => {
    const app = openTestApp()
    const plan = app.plans.create({ name: "indexing", content: "migrate the obsidian service" })
    expect(app.search.searchPlans("obsidian").map((hit) => hit.id)).toEqual([plan.id])

    app.plans.update(plan.id, { summary: "tangerine rollout", content: "nothing here" })
    expect(app.search.searchPlans("obsidian")).toEqual([])
    expect(app.search.searchPlans("tangerine").map((hit) => hit.id)).toEqual([plan.id])

    app.plans.complete(plan.id)
    expect(app.search.searchPlans("tangerine").map((hit) => hit.status)).toEqual(["completed"])

    app.plans.delete(plan.id)
    expect(app.search.searchPlans("tangerine")).toEqual([])
  })

  test("raw SQL writes keep the index consistent", () => {
    const app = openTestApp()
    app.db
      .prepare("INSERT INTO skills (path, category, name, content, file_hash, size_bytes) VALUES (?, ?, ?, ?, ?, ?)")
      .run("skills/raw.md", "raw", "raw", "lantern notes", "hash-raw", 14)
    expect(app.search.searchSkills("lantern").map((hit) => hit.path)).toEqual(["skills/raw.md"])

    app.db.prepare("UPDATE skills SET content = ? WHERE path = ?").run("kettle notes", "skills/raw.md")
    expect(app.search.searchSkills("lantern")).toEqual([])
    expect(app.search.searchSkills("kettle")).toHaveLength(1)

    app.db.prepare("DELETE FROM skills WHERE path = ?").run("skills/raw.md")
    expect(app.search.searchSkills("kettle")).toEqual([])

    for (const kind of ["skills", "prompts", "plans"] as const) {
      expect(app.search.checkIndex(kind)).toEqual({ kind, ok: true })
    }
  })

  test("rebuilding an index keeps it searchable", () => {
    const app = openTestApp()
    app.skills.create(skillInput({ content: "marimba guide" }))
    app.search.rebuildIndex("skills")
    expect(app.search.searchSkills("marimba")).toHaveLength(1)
    expect(app.search.checkIndex("skills").ok).toBe(true)
  })
})

describe("SearchEngine queries", () => {
  test("maxResults caps the result count", () => {
    const app = openTestApp()
    for (const n of [1, 2, 3]) {
      app.skills.create(skillInput({ path: `skills/${n}.md`, name: `s${n}`, content: `shared token ${n}` }))
    }
    expect(app.search.searchSkills("shared")).toHaveLength(3)
    expect(app.search.searchSkills("shared", { maxResults: 1 })).toHaveLength(1)
  })

  test("results are ordered by ascending rank", () => {
    const app = openTestApp()
    app.skills.create(skillInput({ path: "a", name: "a", content: "zephyr once among many other unrelated words here" }))
    app.skills.create(skillInput({ path: "b", name: "b", content: "zephyr zephyr zephyr" }))

    const hits = app.search.searchSkills("zephyr")

    expect(hits.map((hit) => hit.path)).toEqual(["b", "a"])
    expect(hits[0].rank).toBeLessThanOrEqual(hits[1].rank)
  })

  test("snippets use the configured or requested markers", () => {
    const app = openTestApp()
    app.skills.create(skillInput({ content: "alpha beta gamma" }))

    expect(app.search.searchSkills("beta")[0].snippet).toBe("alpha [beta] gamma")
    expect(app.search.searchSkills("beta", { snippet: { open: "<b>", close: "</b>" } })[0].snippet).toBe(
      "alpha <b>beta</b> gamma",
    )
  })

  test("the engine honours its own search config", () => {
    const app = openTestApp()
    app.skills.create(skillInput({ content: "alpha beta gamma" }))
    app.skills.create(skillInput({ path: "second", content: "beta again" }))
    const engine = new SearchEngine(app.db, {
      maxResults: 1,
      snippet: { open: "*", close: "*", ellipsis: "~", tokens: 10 },
    })

    const hits = engine.searchSkills("beta")

    expect(hits).toHaveLength(1)
    expect(hits[0].snippet).toContain("*beta*")
  })

  test("category narrows skill results", () => {
    const app = openTestApp()
    app.skills.create(skillInput({ path: "x", category: "db", content: "cobalt" }))
    app.skills.create(skillInput({ path: "y", category: "web", content: "cobalt" }))
    expect(app.search.searchSkills("cobalt", { category: "web" }).map((hit) => hit.path)).toEqual(["y"])
  })

  test("category is refused where the kind has none and narrows only skills in searchAll", () => {
    const app = openTestApp()
    app.skills.create(skillInput({ path: "x", category: "db", content: "cobalt" }))
    app.skills.create(skillInput({ path: "y", category: "web", content: "cobalt" }))
    app.prompts.create({ path: "prompts/c.md", name: "c", content: "cobalt prompt" })

    const promptError = captureError(() => app.search.searchPrompts("cobalt", { category: "web" }))
    expect(promptError.kind).toBe("InvalidInput")
    expect(promptError.fields).toEqual({ category: ["prompts have no category"] })
    expect(captureError(() => app.search.searchPlans("cobalt", { category: "web" })).fields).toEqual({
      category: ["plans have no category"],
    })

    const all = app.search.searchAll("cobalt", { category: "web" })
    expect(all.skills.map((hit) => hit.path)).toEqual(["y"])
    expect(all.prompts.map((hit) => hit.name)).toEqual(["c"])
  })

  test("searchAll covers skills, prompts and plans", () => {
    const app = openTestApp()
    app.skills.create(skillInput({ content: "saffron skill" }))
    app.prompts.create({ path: "prompts/w.md", name: "w", content: "saffron prompt" })
    app.plans.create({ name: "saffron-plan", title: "saffron" })

    const result = app.search.searchAll("saffron")

    expect(result.skills).toHaveLength(1)
    expect(app.search.searchPrompts("saffron").map((hit) => hit.name)).toEqual(["w"])
    expect(result.prompts.map((hit) => hit.name)).toEqual(["w"])
    expect(result.plans.map((hit) => hit.name)).toEqual(["saffron-plan"])
  })

  test("a malformed query is a database error", () => {
    const app = openTestApp()
    const error = captureError(() => app.search.searchSkills("AND"))
    expect(error.kind).toBe("Db")
    expect(error.context?.operation).toBe("search skills")
  })

  test("invalid queries and options are rejected before searching", () => {
    const app = openTestApp()
    expect(captureError(() => app.search.searchSkills("  ")).kind).toBe("InvalidInput")
    expect(Object.keys(captureError(() => app.search.searchSkills("x", { maxResults: 0 })).fields)).toEqual([
      "maxResults",
    ])
    expect(Object.keys(captureError(() => app.search.searchSkills("x", { maxResults: 1001 })).fields)).toEqual([
      "maxResults",
    ])
    expect(
      Object.keys(captureError(() => app.search.searchSkills("x", { snippet: { tokens: 65 } })).fields),
    ).toEqual(["snippet.tokens"])
  })
})

describe("stats", () => {
  test("summarizes the catalog", () => {
    const app = openTestApp()
    app.skills.create(skillInput({ path: "a", category: "db", content: "12345678" }))
    app.skills.create(skillInput({ path: "b", category: "db", content: "1234" }))
    app.skills.create(skillInput({ path: "c", category: "api", content: "1234" }))
    app.prompts.create({ path: "p", name: "p", content: "1234567890123456" })
    app.plans.create({ name: "plan" })

    expect(app.search.stats()).toEqual({
      skills: 3,
      prompts: 1,
      plans: 1,
      totalSizeBytes: 32,
      totalTokens: 8,
      categories: 2,
      categoryBreakdown: [
        { category: "api", count: 1 },
        { category: "db", count: 2 },
      ],
    })
  })
})
