import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { afterEach, beforeEach, describe, expect, test } from "vitest"
import { Config } from "../../src/config/config"
import { ARTIFACT, runEventStudy, type RunDeps } from "../../src/run/pipeline"
import { nodeFileSystem, type CacheFileSystem } from "../../src/prices/cache"
import { PriceFetchError } from "../../src/study/errors"
import type { DatasetRow } from "../../src/dataset/parse"
import { ACME_DATES, ACME_PRICES, FakeDatasetSource, FakePriceSource, closes, recordingLogger } from "../fixture/fakes"

const ROWS: DatasetRow[] = [
  { ticker: "ACME", earnings_date: "2024-01-02", qa_sent_score: 0.8, company: "Acme Corp" },
  { ticker: "BETA", earnings_date: "2024-01-03", qa_sent_score: -0.1, company: "Beta Bio" },
  { ticker: "ACME", earnings_date: "bad", qa_sent_score: 0.2, company: "Acme Corp" },
]

let root = ""
let prices: FakePriceSource

beforeEach(async () => {
  root = await fs.mkdtemp(path.join(os.tmpdir(), "event-study-run-"))
  prices = new FakePriceSource({
    ACME: closes(ACME_DATES, ACME_PRICES),
    XBI: closes(ACME_DATES, 50),
  })
})

afterEach(async () => {
  await fs.rm(root, { recursive: true, force: true })
})

function config(overrides: Config.Overrides = {}) {
  return Config.resolve({
    info: Config.parse({ hf_dataset_revision: "abc123", price_cache_dir: "cache", output_dir: "out" }),
    overrides,
    env: {},
    baseDir: root,
    cwd: root,
  })
}

function deps(): RunDeps {
  return {
    datasetSource: new FakeDatasetSource(ROWS),
    priceSource: prices,
    logger: recordingLogger().logger,
    now: () => new Date("2024-02-01T00:00:00.000Z"),
  }
}

async function readJson(file: string): Promise<unknown> {
  return JSON.parse(await fs.readFile(file, "utf8"))
}

describe("runEventStudy", () => {
  test("computes the enriched table and writes every artifact", async () => {
    const result = await runEventStudy(config(), deps())

    expect(prices.calls[0]?.ticker).toBe("XBI")
    expect(result.rows.map((row) => [row.event.ticker, row.status])).toEqual([
      ["ACME", "ok"],
      ["BETA", "price_unavailable"],
    ])
    const five = result.rows[0]?.returns.find((item) => item.window === 5)
    expect(five?.raw_ret).toBeCloseTo(0.04, 12)
    expect(five?.benchmark_ret).toBe(0)
    expect(five?.abn_ret).toBeCloseTo(0.04, 12)

    expect(result.summary.quality.dropped_rows).toBe(1)
    expect(result.summary.quality.price_fetch_failed).toBe(1)
    expect(result.summary.rows).toEqual({ ok: 1, unresolved_anchor: 0, price_unavailable: 1 })

    const out = path.join(root, "out")
    expect((await fs.readdir(out)).toSorted()).toEqual([
      ARTIFACT.dashboard,
      ARTIFACT.csv,
      ARTIFACT.json,
      ARTIFACT.manifest,
      ARTIFACT.tickers,
    ])
    expect((await fs.readdir(path.join(out, "tickers"))).toSorted()).toEqual(["ACME.csv", "BETA.csv"])
    expect(await readJson(path.join(out, ARTIFACT.manifest))).toMatchObject({
      dataset: { name: "example/earnings-calls", revision: "abc123" },
      benchmark: "XBI",
      windows: [1, 5],
      refresh_cache: false,
    })
  })

  test("serves the second run from the cache and archives the first run's files", async () => {
    await runEventStudy(config(), deps())
    const fetchesAfterFirst = prices.callsFor("ACME") + prices.callsFor("XBI")
    const second = await runEventStudy(config(), deps())

    expect(prices.callsFor("ACME") + prices.callsFor("XBI")).toBe(fetchesAfterFirst)
    expect(second.summary.cache.hits).toBe(2)
    const history = await fs.readdir(path.join(root, "out", "history"))
    expect(history).toEqual(["2024-02-01T00-00-00-000Z"])
  })

  test("refetches every touched ticker on refresh", async () => {
    await runEventStudy(config(), deps())
    await runEventStudy(config({ refresh_cache: true }), deps())

    expect(prices.callsFor("ACME")).toBe(2)
    expect(prices.callsFor("XBI")).toBe(2)
  })

  test("degrades only the ticker whose cache entry cannot be written", async () => {
    prices.set("BETA", closes(ACME_DATES, 20))
    const fullDisk: CacheFileSystem = {
      ...nodeFileSystem,
      rename: async (from, to) => {
        if (path.basename(to) === "BETA.csv") throw new Error("no space left on device")
        await nodeFileSystem.rename(from, to)
      },
    }
    const result = await runEventStudy(config(), { ...deps(), cacheFileSystem: fullDisk })

    expect(result.rows.map((row) => [row.event.ticker, row.status])).toEqual([
      ["ACME", "ok"],
      ["BETA", "price_unavailable"],
    ])
    expect(result.summary.quality.price_fetch_failed).toBe(1)
    expect((await fs.readdir(path.join(root, "cache"))).toSorted()).toEqual(["ACME.csv", "XBI.csv"])
    await expect(fs.stat(path.join(root, "out", ARTIFACT.csv))).resolves.toBeDefined()
  })

  test("aborts before emitting rows when the benchmark is unavailable", async () => {
    prices.failing.add("XBI")
    const failure = await runEventStudy(config(), deps()).catch((error: unknown) => error)

    expect(failure).toBeInstanceOf(PriceFetchError)
    expect(failure).toMatchObject({ ticker: "XBI", benchmark: true })
    expect(prices.callsFor("ACME")).toBe(0)
    await expect(fs.stat(path.join(root, "out"))).rejects.toThrow()
  })
})
