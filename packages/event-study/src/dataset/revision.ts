import { ConfigError } from "../study/errors"

const REVISION_RE = /^[0-9a-f]{6,64}$/i
const MUTABLE_REFS = new Set(["latest", "main", "master", "head"])

/** Accepts only a content hash; branch names and tags can move between runs. */
export function validateRevision(input: unknown): string {
  if (typeof input !== "string" || input.trim() === "") {
    throw new ConfigError("Dataset revision is required and must be an exact commit hash", {
      key: "hf_dataset_revision",
    })
  }
  const revision = input.trim()
  if (MUTABLE_REFS.has(revision.toLowerCase())) {
    throw new ConfigError(`Dataset revision ${revision} is a mutable ref; pin an exact commit hash`, {
      key: "hf_dataset_revision",
      revision,
    })
  }
  if (!REVISION_RE.test(revision)) {
    throw new ConfigError(`Dataset revision ${revision} is not a commit hash (6 to 64 hex characters)`, {
      key: "hf_dataset_revision",
      revision,
    })
  }
  return revision.toLowerCase()
}
