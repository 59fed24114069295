#!/usr/bin/env node
import '../env.js'
import { writeFileSync } from 'fs'
import { buildOrchestrator } from '../bootstrap.js'
import { loadConfig, resolveConfigPath } from '../config/settings.js'
import { loggers } from '../config/logger.js'
import { runCli } from './run.js'

async function main(): Promise<void> {
  const exitCode = await runCli(
    process.argv.slice(2),
    {
      stdout: line => console.log(line),
      stderr: line => console.error(line),
      writeFile: (path, content) => writeFileSync(path, content, 'utf8'),
    },
    {
      logger: loggers.cli,
      createSurface: configPath => {
        const path = resolveConfigPath(configPath)
        loggers.config.debug('Loading configuration', { path })
        return buildOrchestrator(loadConfig(path), { logger: loggers.scraper })
      },
    }
  )

  process.exit(exitCode)
}

main().catch(error => {
  loggers.cli.fatal('Unhandled CLI failure', {}, error)
  process.exit(1)
})
