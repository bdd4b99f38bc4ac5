/**
 * Turns JSONC (line and block comments, trailing commas) into plain JSON text.
 * String contents are copied verbatim.
 */
export function toStrictJSON(source: string) {
  let out = ""
  let inString = false
  let escaped = false
  // index in `out` of a comma that may turn out to be trailing
  let pendingComma = -1

  for (let i = 0; i < source.length; i++) {
    const char = source[i] ?? ""
    const next = source[i + 1]

    if (inString) {
      out += char
      if (escaped) escaped = false
      else if (char === "\\") escaped = true
      else if (char === '"') inString = false
      continue
    }

    if (char === "/" && next === "/") {
      const end = source.indexOf("\n", i)
      i = end < 0 ? source.length : end - 1
      continue
    }
    if (char === "/" && next === "*") {
      const end = source.indexOf("*/", i + 2)
      i = end < 0 ? source.length : end + 1
      continue
    }

    if (char === "}" || char === "]") {
      if (pendingComma >= 0) out = out.slice(0, pendingComma) + out.slice(pendingComma + 1)
      pendingComma = -1
      out += char
      continue
    }
    if (char === ",") {
      pendingComma = out.length
      out += char
      continue
    }
    if (!/\s/.test(char)) pendingComma = -1
    if (char === '"') inString = true
    out += char
  }

  return out
}

export function parseJSONC(source: string): unknown {
  return JSON.parse(toStrictJSON(source))
}
