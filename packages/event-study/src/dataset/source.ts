import { DataSourceError, errorMessage } from "../study/errors"
import { deadline } from "../util/abort"
import { formatFromFile, parseDatasetText, type DatasetFormat, type DatasetRow } from "./parse"
import type { FetchLike } from "../util/fetch"

export interface DatasetSource {
  /** Human-readable name, logged with the revision. */
  readonly name: string
  readonly file: string
  fetchDataset(revision: string, signal?: AbortSignal): Promise<DatasetRow[]>
}

const HUB_BASE = "https://huggingface.co"

/** Downloads one file of a Hub dataset repository at an exact commit. */
export class HuggingFaceDatasetSource implements DatasetSource {
  private readonly fetcher: FetchLike
  private readonly format: DatasetFormat

  constructor(
    private readonly input: {
      dataset: string
      file: string
      token?: string
      timeoutMs?: number
      fetch?: FetchLike
      baseUrl?: string
    },
  ) {
    this.fetcher = input.fetch ?? ((url, init) => fetch(url, init))
    this.format = formatFromFile(input.file)
  }

  get name() {
    return this.input.dataset
  }

  get file() {
    return this.input.file
  }

  fileUrl(revision: string) {
    const base = this.input.baseUrl ?? HUB_BASE
    const file = this.input.file.split("/").map(encodeURIComponent).join("/")
    return `${base}/datasets/${this.input.dataset}/resolve/${encodeURIComponent(revision)}/${file}`
  }

  async fetchDataset(revision: string, signal?: AbortSignal): Promise<DatasetRow[]> {
    const url = this.fileUrl(revision)
    const headers: Record<string, string> = { Accept: "application/json, text/csv, */*" }
    if (this.input.token) headers.Authorization = `Bearer ${this.input.token}`

    const timeout = deadline(this.input.timeoutMs ?? 60_000, signal)
    let text: string
    try {
      const response = await this.fetcher(url, { headers, signal: timeout.signal })
      if (response.status === 404) {
        throw new DataSourceError(
          `Dataset ${this.input.dataset} has no file ${this.input.file} at revision ${revision}`,
          "DATASET_REVISION_NOT_FOUND",
          { dataset: this.input.dataset, file: this.input.file, revision },
        )
      }
      if (!response.ok) {
        throw new DataSourceError(
          `Dataset download failed for ${this.input.dataset}@${revision} (${response.status})`,
          "DATASET_FETCH_FAILED",
          { dataset: this.input.dataset, revision, status: response.status },
        )
      }
      text = await response.text()
    } catch (error) {
      if (error instanceof DataSourceError) throw error
      throw new DataSourceError(
        `Dataset download failed for ${this.input.dataset}@${revision}: ${errorMessage(error)}`,
        "DATASET_FETCH_FAILED",
        { dataset: this.input.dataset, revision },
      )
    } finally {
      timeout.clear()
    }

    return parseDatasetText(text, this.format)
  }
}
