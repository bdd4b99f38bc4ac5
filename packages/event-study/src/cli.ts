#!/usr/bin/env tsx
import { realpathSync } from "node:fs"
import path from "node:path"
import { pathToFileURL } from "node:url"
import { parseArgs } from "node:util"
import { Config } from "./config/config"
import { runEventStudy, type RunDeps } from "./run/pipeline"
import { EXIT_CODE, exitCodeFor, type ExitCode } from "./run/exit-code"
import { formatSummary } from "./run/summary"
import { ConfigError, EventStudyError } from "./study/errors"
import { Log } from "./util/log"

export const USAGE = `Usage: event-study [options]

Options:
  --config <path>       Config file (default: $EVENT_STUDY_CONFIG or ./event-study.json)
  --revision <hash>     Dataset commit hash, overrides hf_dataset_revision
  --output <dir>        Output directory, overrides output_dir
  --refresh-cache       Refetch every price series this run touches
  --allow-stale-cache   Serve a cached series that does not cover the range when a fetch fails
  --help                Show this message

Exit codes: 0 ok, 2 config error, 3 dataset error, 4 benchmark unavailable, 1 other failure`

export type CliIO = {
  env: Record<string, string | undefined>
  cwd: string
  stdout: (line: string) => void
  stderr: (line: string) => void
}

const defaultIO: CliIO = {
  env: process.env,
  cwd: process.cwd(),
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
}

function parse(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        config: { type: "string" },
        revision: { type: "string" },
        output: { type: "string" },
        "refresh-cache": { type: "boolean", default: false },
        "allow-stale-cache": { type: "boolean", default: false },
        help: { type: "boolean", default: false },
      },
    }).values
  } catch (error) {
    throw new ConfigError(error instanceof Error ? error.message : String(error))
  }
}

export async function main(argv: string[], io: Partial<CliIO> = {}, deps: RunDeps = {}): Promise<ExitCode> {
  const { env, cwd, stdout, stderr } = { ...defaultIO, ...io }
  try {
    const args = parse(argv)
    if (args.help) {
      stdout(USAGE)
      return EXIT_CODE.ok
    }

    const config = await Config.load({
      explicit: args.config,
      env,
      cwd,
      overrides: {
        revision: args.revision,
        output_dir: args.output,
        refresh_cache: args["refresh-cache"],
        allow_stale_cache: args["allow-stale-cache"],
      },
    })
    const logger = deps.logger ?? Log.create({ service: "event-study", level: config.log_level })
    const result = await runEventStudy(config, { ...deps, logger })

    stdout(formatSummary(result.summary))
    stdout(`Artifacts: ${path.relative(cwd, config.output_dir) || "."}`)
    return EXIT_CODE.ok
  } catch (error) {
    const failure = EventStudyError.wrap(error)
    stderr(`event-study: ${failure.message}`)
    if (failure.code === "CONFIG_INVALID") stderr("Run with --help for usage.")
    return exitCodeFor(error)
  }
}

// `bin` installs a symlink, so compare resolved paths
if (process.argv[1] && import.meta.url === pathToFileURL(realpathSync(process.argv[1])).href) {
  process.exitCode = await main(process.argv.slice(2))
}
