import { ConfigError, DataSourceError, PriceFetchError } from "../study/errors"

export const EXIT_CODE = {
  ok: 0,
  unexpected: 1,
  config: 2,
  dataSource: 3,
  benchmark: 4,
} as const

export type ExitCode = (typeof EXIT_CODE)[keyof typeof EXIT_CODE]

export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof ConfigError) return EXIT_CODE.config
  if (error instanceof DataSourceError) return EXIT_CODE.dataSource
  if (error instanceof PriceFetchError && error.benchmark) return EXIT_CODE.benchmark
  return EXIT_CODE.unexpected
}
