import { buildApp } from './app.ts'
import { type AppConfig, ConfigError, loadConfig, loadEnvFile } from './config/env.ts'

function readConfig(): AppConfig {
  loadEnvFile()
  try {
    return loadConfig()
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(err.message)
      process.exit(1)
    }
    throw err
  }
}

const config = readConfig()
const fastify = await buildApp(config)

fastify.listen({ port: config.port, host: config.host }, function (err) {
  if (err) {
    fastify.log.error(err)
    process.exit(1)
  }
})
