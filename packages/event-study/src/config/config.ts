import fs from "node:fs/promises"
import path from "node:path"
import z from "zod"
import { Global } from "../global"
import { validateRevision } from "../dataset/revision"
import { ConfigError, EventStudyError, errorMessage } from "../study/errors"
import { normalizeWindowList } from "../study/returns"
import { normalizeTicker } from "../study/ticker"
import { WINDOW_BASIS } from "../study/types"
import { parseJSONC } from "../util/jsonc"
import { Log } from "../util/log"

export namespace Config {
  export const ENV = {
    config: "EVENT_STUDY_CONFIG",
    logLevel: "EVENT_STUDY_LOG_LEVEL",
    token: "HF_TOKEN",
  } as const

  export const Info = z
    .object({
      $schema: z.string().optional(),
      hf_dataset_name: z.string().min(1).default("glopardo/sp500-earnings-transcripts"),
      hf_dataset_file: z.string().min(1).default("data/train.jsonl"),
      hf_dataset_revision: z.string().optional(),
      sector_filter: z.string().min(1).nullable().default(null),
      price_cache_dir: z.string().min(1).optional(),
      windows: z.array(z.number().int().positive()).min(1).default([1, 5]),
      window_basis: z.enum(WINDOW_BASIS).default("calendar_days"),
      benchmark_ticker: z.string().min(1).default("XBI"),
      anchor_search_days: z.number().int().min(0).max(30).default(5),
      range_padding_days: z.number().int().min(0).max(60).default(10),
      price_fetch_concurrency: z.number().int().min(1).max(16).default(4),
      price_fetch_attempts: z.number().int().min(1).max(5).default(2),
      price_fetch_timeout_ms: z.number().int().min(1_000).max(300_000).default(20_000),
      consensus_field: z.string().min(1).nullable().default(null),
      output_dir: z.string().min(1).default("./reports/event-study"),
    })
    .strict()
  export type Info = z.infer<typeof Info>

  export type Overrides = {
    revision?: string
    refresh_cache?: boolean
    allow_stale_cache?: boolean
    output_dir?: string
  }

  export type Run = Readonly<{
    config_path: string | null
    hf_dataset_name: string
    hf_dataset_file: string
    hf_dataset_revision: string
    hf_token: string | null
    sector_filter: string | null
    price_cache_dir: string
    windows: readonly number[]
    window_basis: Info["window_basis"]
    benchmark_ticker: string
    anchor_search_days: number
    range_padding_days: number
    price_fetch_concurrency: number
    price_fetch_attempts: number
    price_fetch_timeout_ms: number
    consensus_field: string | null
    output_dir: string
    refresh_cache: boolean
    allow_stale_cache: boolean
    log_level: Log.Level
  }>

  type Env = Record<string, string | undefined>

  async function exists(file: string) {
    return fs
      .stat(file)
      .then((stat) => stat.isFile())
      .catch(() => false)
  }

  /** Explicit path, then the environment, then the working directory, then the user config dir. */
  export async function locate(input: { explicit?: string; env: Env; cwd: string }): Promise<string | null> {
    const named = input.explicit ?? input.env[ENV.config]
    if (named) {
      const file = path.resolve(input.cwd, named)
      if (!(await exists(file))) throw new ConfigError(`Config file not found: ${file}`, { path: file })
      return file
    }
    const candidates = [
      ...Global.App.files.map((name) => path.join(input.cwd, name)),
      ...Global.App.files.map((name) => path.join(Global.Path.config, name)),
    ]
    for (const file of candidates) {
      if (await exists(file)) return file
    }
    return null
  }

  export async function read(file: string): Promise<unknown> {
    const text = await fs.readFile(file, "utf8").catch((error: unknown) => {
      throw new ConfigError(`Cannot read config file ${file}: ${errorMessage(error)}`, { path: file })
    })
    try {
      return parseJSONC(text)
    } catch (error) {
      throw new ConfigError(`Config file ${file} is not valid JSON: ${errorMessage(error)}`, { path: file })
    }
  }

  export function parse(raw: unknown, source = "config"): Info {
    const result = Info.safeParse(raw ?? {})
    if (result.success) return result.data
    const issues = result.error.issues.map((issue) => {
      const key = issue.path.join(".") || (issue.code === "unrecognized_keys" ? issue.keys.join(", ") : "(root)")
      return `${key}: ${issue.message}`
    })
    throw new ConfigError(`Invalid ${source}:\n${issues.map((line) => `  - ${line}`).join("\n")}`, { issues })
  }

  /** Turns a parsed file plus CLI overrides into the frozen value every component receives. */
  export function resolve(input: {
    info: Info
    overrides?: Overrides
    env: Env
    baseDir: string
    cwd: string
    configPath?: string | null
  }): Run {
    const info = input.info
    const overrides = input.overrides ?? {}

    const revisionInput = overrides.revision ?? info.hf_dataset_revision
    if (revisionInput === undefined) {
      throw new ConfigError("hf_dataset_revision is required (set it in the config file or pass --revision)", {
        key: "hf_dataset_revision",
      })
    }
    const revision = validateRevision(revisionInput)

    const benchmark = normalizeTicker(info.benchmark_ticker)
    if (!benchmark) {
      throw new ConfigError(`benchmark_ticker is not a valid symbol: ${info.benchmark_ticker}`, {
        key: "benchmark_ticker",
      })
    }

    let windows: number[]
    try {
      windows = normalizeWindowList(info.windows)
    } catch (error) {
      throw new ConfigError(`windows: ${errorMessage(error)}`, { key: "windows" })
    }

    const at = (value: string) => path.resolve(input.baseDir, value)

    return Object.freeze({
      config_path: input.configPath ?? null,
      hf_dataset_name: info.hf_dataset_name,
      hf_dataset_file: info.hf_dataset_file,
      hf_dataset_revision: revision,
      hf_token: input.env[ENV.token] || null,
      sector_filter: info.sector_filter,
      price_cache_dir: info.price_cache_dir ? at(info.price_cache_dir) : Global.Path.prices,
      windows: Object.freeze(windows),
      window_basis: info.window_basis,
      benchmark_ticker: benchmark,
      anchor_search_days: info.anchor_search_days,
      range_padding_days: info.range_padding_days,
      price_fetch_concurrency: info.price_fetch_concurrency,
      price_fetch_attempts: info.price_fetch_attempts,
      price_fetch_timeout_ms: info.price_fetch_timeout_ms,
      consensus_field: info.consensus_field,
      // the CLI output flag is relative to where the command runs, not to the config file
      output_dir: overrides.output_dir ? path.resolve(input.cwd, overrides.output_dir) : at(info.output_dir),
      refresh_cache: overrides.refresh_cache ?? false,
      allow_stale_cache: overrides.allow_stale_cache ?? false,
      log_level: Log.parseLevel(input.env[ENV.logLevel]),
    })
  }

  export async function load(input: {
    explicit?: string
    overrides?: Overrides
    env: Env
    cwd: string
  }): Promise<Run> {
    try {
      const file = await locate(input)
      const info = parse(file ? await read(file) : {}, file ?? "config")
      return resolve({
        info,
        overrides: input.overrides,
        env: input.env,
        baseDir: file ? path.dirname(file) : input.cwd,
        cwd: input.cwd,
        configPath: file,
      })
    } catch (error) {
      if (error instanceof EventStudyError) throw error
      throw new ConfigError(`Failed to load configuration: ${errorMessage(error)}`)
    }
  }
}
