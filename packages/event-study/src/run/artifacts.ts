import fs from "node:fs/promises"
import path from "node:path"
import { ArtifactWriteError, errorMessage } from "../study/errors"

function stampForPath(now: Date) {
  return now.toISOString().replace(/[:.]/g, "-")
}

async function exists(target: string) {
  return fs
    .stat(target)
    .then(() => true)
    .catch(() => false)
}

/** Moves earlier run outputs under `history/<timestamp>/` so a run never mixes with the last one. */
export async function archiveExistingArtifacts(outputRoot: string, names: readonly string[], now: Date) {
  const existing: string[] = []
  for (const name of names) {
    if (await exists(path.join(outputRoot, name))) existing.push(name)
  }
  if (existing.length === 0) return null

  const historyRoot = path.join(outputRoot, "history", stampForPath(now))
  await fs.mkdir(historyRoot, { recursive: true })
  await Promise.all(existing.map((name) => fs.rename(path.join(outputRoot, name), path.join(historyRoot, name))))
  return historyRoot
}

/**
 * Writes `files` (relative path to content) under `outputRoot` after archiving
 * the top-level entries named in `archive`. Returns absolute paths by name.
 */
export async function writeArtifacts(input: {
  outputRoot: string
  files: Record<string, string>
  archive: readonly string[]
  now: Date
}): Promise<Record<string, string>> {
  const paths = Object.fromEntries(Object.keys(input.files).map((name) => [name, path.join(input.outputRoot, name)]))

  try {
    await fs.mkdir(input.outputRoot, { recursive: true })
    await archiveExistingArtifacts(input.outputRoot, input.archive, input.now)
    await Promise.all(
      Object.entries(input.files).map(async ([name, content]) => {
        const target = path.join(input.outputRoot, name)
        await fs.mkdir(path.dirname(target), { recursive: true })
        await fs.writeFile(target, content, "utf8")
      }),
    )
  } catch (error) {
    throw new ArtifactWriteError(`Failed writing artifacts to ${input.outputRoot}: ${errorMessage(error)}`, {
      output_root: input.outputRoot,
    })
  }

  return paths
}
