import { DEFAULT_SKILLBOOK_CONFIG, type SearchConfig } from "./config"
import type { DatabaseConnection } from "./db"
import { invalidInput } from "./errors"
import { createLogger } from "./logger"
import type {
  CatalogStats,
  CategoryCount,
  PlanRow,
  PromptRow,
  SearchAllResult,
  SearchHit,
  SearchOptions,
  SearchableKind,
  SkillRow,
  SnippetOptions,
} from "./models"
import { guardDb } from "./util"
import { searchOptionsSchema, searchQuerySchema, validate } from "./validation"

type SearchSource = {
  table: string
  fts: string
  // FTS5 column index for snippet(); -1 lets SQLite pick the best column.
  snippetColumn: number
  categoryFilter: boolean
}

const SEARCH_SOURCES = {
  skills: { table: "skills", fts: "skills_fts", snippetColumn: 5, categoryFilter: true },
  prompts: { table: "prompts", fts: "prompts_fts", snippetColumn: 5, categoryFilter: false },
  plans: { table: "implementation_plans", fts: "implementation_plans_fts", snippetColumn: -1, categoryFilter: false },
} as const satisfies Record<SearchableKind, SearchSource>

type ResolvedSearch = {
  query: string
  limit: number
  category: string | null
  snippet: SnippetOptions
}

export type IndexCheck = {
  kind: SearchableKind
  ok: true
}

const log = createLogger("search")

export class SearchEngine {
  private db: DatabaseConnection
  private config: SearchConfig

  constructor(db: DatabaseConnection, config: SearchConfig = DEFAULT_SKILLBOOK_CONFIG.search) {
    this.db = db
    this.config = config
  }

  searchSkills(query: string, options: SearchOptions = {}): SearchHit<SkillRow>[] {
    return this.run<SkillRow>("skills", this.resolve(query, options, "skills"))
  }

  searchPrompts(query: string, options: SearchOptions = {}): SearchHit<PromptRow>[] {
    return this.run<PromptRow>("prompts", this.resolve(query, options, "prompts"))
  }

  searchPlans(query: string, options: SearchOptions = {}): SearchHit<PlanRow>[] {
    return this.run<PlanRow>("plans", this.resolve(query, options, "plans"))
  }

  /** `category` narrows the skill results only. */
  searchAll(query: string, options: SearchOptions = {}): SearchAllResult {
    const resolved = this.resolve(query, options)
    return {
      skills: this.run<SkillRow>("skills", resolved),
      prompts: this.run<PromptRow>("prompts", resolved),
      plans: this.run<PlanRow>("plans", resolved),
    }
  }

  stats(): CatalogStats {
    return guardDb("catalog stats", undefined, () => {
      const read = this.db.transaction((): CatalogStats => {
        const totals = this.db
          .prepare<[], Omit<CatalogStats, "categoryBreakdown">>(
            `SELECT
               (SELECT COUNT(*) FROM skills) AS skills,
               (SELECT COUNT(*) FROM prompts) AS prompts,
               (SELECT COUNT(*) FROM implementation_plans) AS plans,
               (SELECT COALESCE(SUM(size_bytes), 0) FROM skills)
                 + (SELECT COALESCE(SUM(size_bytes), 0) FROM prompts) AS totalSizeBytes,
               (SELECT COALESCE(SUM(token_count), 0) FROM skills)
                 + (SELECT COALESCE(SUM(token_count), 0) FROM prompts) AS totalTokens,
               (SELECT COUNT(DISTINCT category) FROM skills) AS categories`,
          )
          .get()
        const categoryBreakdown = this.db
          .prepare<[], CategoryCount>(
            `SELECT category, COUNT(*) AS count FROM skills
             GROUP BY category
             ORDER BY category ASC`,
          )
          .all()
        return {
          skills: totals?.skills ?? 0,
          prompts: totals?.prompts ?? 0,
          plans: totals?.plans ?? 0,
          totalSizeBytes: totals?.totalSizeBytes ?? 0,
          totalTokens: totals?.totalTokens ?? 0,
          categories: totals?.categories ?? 0,
          categoryBreakdown,
        }
      })
      return read()
    })
  }

  rebuildIndex(kind: SearchableKind) {
    const { fts } = SEARCH_SOURCES[kind]
    guardDb(`rebuild ${kind} index`, { kind }, () => {
      this.db.prepare(`INSERT INTO ${fts}(${fts}) VALUES ('rebuild')`).run()
    })
    log.info("search index rebuilt", { kind })
  }

  /** Verifies the index against its content table; a mismatch surfaces as a Db error. */
  checkIndex(kind: SearchableKind): IndexCheck {
    const { fts } = SEARCH_SOURCES[kind]
    guardDb(`check ${kind} index`, { kind }, () => {
      this.db.prepare(`INSERT INTO ${fts}(${fts}, rank) VALUES ('integrity-check', 1)`).run()
    })
    return { kind, ok: true }
  }

  private resolve(query: string, options: SearchOptions, kind?: SearchableKind): ResolvedSearch {
    const text = validate(searchQuerySchema, query, "search query")
    const parsed = validate(searchOptionsSchema, options, "search options")
    if (kind && !SEARCH_SOURCES[kind].categoryFilter && parsed.category) {
      throw invalidInput("invalid search options", { category: [`${kind} have no category`] })
    }
    const defaults = this.config.snippet
    return {
      query: text,
      limit: parsed.maxResults ?? this.config.maxResults,
      category: parsed.category ?? null,
      snippet: {
        open: parsed.snippet?.open ?? defaults.open,
        close: parsed.snippet?.close ?? defaults.close,
        ellipsis: parsed.snippet?.ellipsis ?? defaults.ellipsis,
        tokens: parsed.snippet?.tokens ?? defaults.tokens,
      },
    }
  }

  private run<T>(kind: SearchableKind, search: ResolvedSearch): SearchHit<T>[] {
    const source: SearchSource = SEARCH_SOURCES[kind]
    const params: Record<string, string | number> = {
      query: search.query,
      limit: search.limit,
      open: search.snippet.open,
      close: search.snippet.close,
      ellipsis: search.snippet.ellipsis,
      tokens: search.snippet.tokens,
    }
    let filter = ""
    if (source.categoryFilter && search.category) {
      filter = "AND s.category = @category"
      params.category = search.category
    }
    const hits = guardDb(`search ${kind}`, { query: search.query, limit: search.limit }, () =>
      this.db
        .prepare<Record<string, string | number>, SearchHit<T>>(
          `SELECT s.*,
                  snippet(${source.fts}, ${source.snippetColumn}, @open, @close, @ellipsis, @tokens) AS snippet,
                  ${source.fts}.rank AS rank
           FROM ${source.fts}
           JOIN ${source.table} s ON s.id = ${source.fts}.rowid
           WHERE ${source.fts} MATCH @query ${filter}
           ORDER BY ${source.fts}.rank ASC
           LIMIT @limit`,
        )
        .all(params),
    )
    log.debug("search", { kind, query: search.query, hits: hits.length })
    return hits
  }
}
