export namespace Log {
  export const LEVEL = ["debug", "info", "warn", "error"] as const
  export type Level = (typeof LEVEL)[number]
  export type Fields = Record<string, unknown>

  export type Entry = {
    level: Level
    service: string
    message: string
    fields?: Fields
  }

  export type Sink = (entry: Entry) => void

  export interface Logger {
    debug(message: string, fields?: Fields): void
    info(message: string, fields?: Fields): void
    warn(message: string, fields?: Fields): void
    error(message: string, fields?: Fields): void
    child(service: string): Logger
  }

  const rank: Record<Level, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
  }

  export function format(entry: Entry) {
    const head = `[${entry.level.toUpperCase()}] ${entry.service} ${entry.message}`
    if (!entry.fields || Object.keys(entry.fields).length === 0) return head
    return `${head} ${JSON.stringify(entry.fields)}`
  }

  export const consoleSink: Sink = (entry) => {
    const line = format(entry)
    if (entry.level === "error") console.error(line)
    else if (entry.level === "warn") console.warn(line)
    else if (entry.level === "debug") console.debug(line)
    else console.log(line)
  }

  export function parseLevel(input: string | undefined, fallback: Level = "info"): Level {
    const value = input?.trim().toLowerCase()
    return LEVEL.find((item) => item === value) ?? fallback
  }

  export function create(input: { service: string; level?: Level; sink?: Sink }): Logger {
    const threshold = rank[input.level ?? "info"]
    const sink = input.sink ?? consoleSink
    const emit = (level: Level) => (message: string, fields?: Fields) => {
      if (rank[level] < threshold) return
      sink({ level, service: input.service, message, fields })
    }
    return {
      debug: emit("debug"),
      info: emit("info"),
      warn: emit("warn"),
      error: emit("error"),
      child: (service) => create({ service: `${input.service}:${service}`, level: input.level, sink }),
    }
  }

  export const silent: Logger = create({ service: "silent", sink: () => {} })
}
