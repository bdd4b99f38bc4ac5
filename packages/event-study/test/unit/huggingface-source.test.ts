import { describe, expect, test } from "vitest"
import { formatFromFile, parseDatasetText } from "../../src/dataset/parse"
import { HuggingFaceDatasetSource } from "../../src/dataset/source"
import { DataSourceError } from "../../src/study/errors"
import { fakeFetch } from "../fixture/fakes"

const JSONL = '{"ticker":"ACME","earnings_date":"2024-01-02","qa_sent_score":0.8}\n{"ticker":"BETA","earnings_date":"2024-01-03","qa_sent_score":-0.2}\n'

describe("HuggingFaceDatasetSource", () => {
  test("downloads the file at the pinned revision with the token", async () => {
    const http = fakeFetch(() => new Response(JSONL, { status: 200 }))
    const source = new HuggingFaceDatasetSource({
      dataset: "example/earnings-calls",
      file: "data/train.jsonl",
      token: "test-secret",
      fetch: http.fetch,
    })

    const rows = await source.fetchDataset("abc123")
    expect(http.urls).toEqual(["https://huggingface.co/datasets/example/earnings-calls/resolve/abc123/data/train.jsonl"])
    expect(http.inits[0]?.headers).toMatchObject({ Authorization: "Bearer test-secret" })
    expect(rows).toEqual([
      { ticker: "ACME", earnings_date: "2024-01-02", qa_sent_score: 0.8 },
      { ticker: "BETA", earnings_date: "2024-01-03", qa_sent_score: -0.2 },
    ])
  })

  test("maps 404 to an unknown revision", async () => {
    const http = fakeFetch(() => new Response("Not Found", { status: 404 }))
    const source = new HuggingFaceDatasetSource({ dataset: "example/earnings-calls", file: "data/train.jsonl", fetch: http.fetch })

    await expect(source.fetchDataset("abc123")).rejects.toMatchObject({ code: "DATASET_REVISION_NOT_FOUND" })
  })

  test("maps network failures to a fetch error", async () => {
    const source = new HuggingFaceDatasetSource({
      dataset: "example/earnings-calls",
      file: "data/train.jsonl",
      fetch: async () => {
        throw new TypeError("fetch failed")
      },
    })

    const failure = await source.fetchDataset("abc123").catch((error: unknown) => error)
    expect(failure).toBeInstanceOf(DataSourceError)
    expect(failure).toMatchObject({ code: "DATASET_FETCH_FAILED" })
  })
})

describe("dataset file parsing", () => {
  test("picks the format from the extension", () => {
    expect(formatFromFile("data/train.JSONL")).toBe("jsonl")
    expect(formatFromFile("rows.json")).toBe("json")
    expect(formatFromFile("rows.csv")).toBe("csv")
    expect(() => formatFromFile("rows.parquet")).toThrow(DataSourceError)
  })

  test("reads CSV with typed numbers", () => {
    const rows = parseDatasetText("ticker,earnings_date,qa_sent_score\nACME,2024-01-02,0.8\n", "csv")
    expect(rows).toEqual([{ ticker: "ACME", earnings_date: "2024-01-02", qa_sent_score: 0.8 }])
  })

  test("reads wrapped JSON lists", () => {
    expect(parseDatasetText('{"data":[{"ticker":"ACME"}]}', "json")).toEqual([{ ticker: "ACME" }])
    expect(() => parseDatasetText('{"ticker":"ACME"}', "json")).toThrow(/not a list of rows/)
  })

  test("names the broken JSONL line", () => {
    expect(() => parseDatasetText('{"ticker":"ACME"}\n{oops\n', "jsonl")).toThrow(/line 2/)
  })
})
