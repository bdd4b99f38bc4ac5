import path from "node:path"
import os from "node:os"
import { xdgCache, xdgConfig } from "xdg-basedir"

const app = "event-study"
const files = ["event-study.jsonc", "event-study.json"] as const

const cacheRoot = xdgCache ?? path.join(os.homedir(), ".cache")
const configRoot = xdgConfig ?? path.join(os.homedir(), ".config")

export namespace Global {
  export const App = {
    name: app,
    files,
  }

  // Directories are created by whoever writes into them.
  export const Path = {
    prices: path.join(cacheRoot, app, "prices"),
    config: path.join(configRoot, app),
  }
}
