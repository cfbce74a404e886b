import "dotenv/config"
import { createApp, createServices } from "./app"
import { loadConfig } from "./config"
import { describeError } from "./lib/errors"
import { createLogger, setLogLevel } from "./lib/logger"

const log = createLogger("server")

async function main() {
  const config = loadConfig()
  setLogLevel(config.logLevel)

  const services = createServices(config)
  await services.images.ensureFolders()
  try {
    await services.store.rebuildMirror()
  } catch (error) {
    log.warn("mirror workbook not rebuilt at startup", { error: describeError(error) })
  }

  const app = createApp(config, services)
  app.listen(config.port, () => {
    log.info(`listening on http://localhost:${config.port}`, { dataDir: config.dataDir })
  })
}

main().catch((error: unknown) => {
  log.error("startup failed", { error: describeError(error) })
  process.exitCode = 1
})
