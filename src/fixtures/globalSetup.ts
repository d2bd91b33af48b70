import fs from 'node:fs'
import { loadSettings } from '../config/settings'
import { assertEnvironmentReady } from '../support/health'
import { makeLogger } from '../support/logger'

/** Runs once before any worker starts. */
export default async function globalSetup(): Promise<void> {
  const settings = loadSettings()
  const logger = makeLogger({ bindings: { phase: 'global-setup' } })

  fs.mkdirSync(settings.reportDir, { recursive: true })
  fs.mkdirSync(settings.screenshotDir, { recursive: true })

  if (settings.skipHealthCheck) {
    logger.warn('SKIP_HEALTH_CHECK is set, not probing the app')
    return
  }
  await assertEnvironmentReady(settings, logger)
}
