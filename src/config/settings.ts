import fs from 'node:fs'
import { parse } from 'dotenv'
import { z } from 'zod'

export type PageName = 'login' | 'dashboard' | 'trading' | 'portfolio' | 'watchlists' | 'trades' | 'register'

export type PageUrls = Readonly<Record<PageName, string>>

export interface Settings {
  readonly baseUrl: string
  readonly apiUrl: string
  readonly headless: boolean
  readonly slowMo: number
  readonly timeout: number
  readonly viewportWidth: number
  readonly viewportHeight: number
  readonly reportDir: string
  readonly screenshotDir: string
  readonly locatorsFile: string
  readonly locatorsOverrideFile?: string
  readonly skipHealthCheck: boolean
  readonly urls: PageUrls
}

export class SettingsError extends Error {
  readonly invalid: string[]

  constructor(invalid: string[]) {
    super(`Invalid test settings: ${invalid.join('; ')}`)
    this.name = 'SettingsError'
    this.invalid = invalid
  }
}

const DEFAULT_ENV_FILE = '.env.test'

// Blank counts as unset. Only the numeric fields can fail to load.
const text = (fallback: string) =>
  z
    .string()
    .trim()
    .default(fallback)
    .transform((value) => (value === '' ? fallback : value))

const url = (fallback: string) => text(fallback).transform((value) => value.replace(/\/+$/, ''))

const integer = (name: string, fallback: number) =>
  z
    .string()
    .trim()
    .regex(/^\d+$/, `${name} must be a non-negative integer`)
    .default(String(fallback))
    .transform(Number)

const flag = (fallback: boolean) =>
  z
    .string()
    .default(String(fallback))
    .transform((value) => value.trim().toLowerCase() !== 'false')

const envSchema = z.object({
  BASE_URL: url('http://localhost:5173'),
  API_URL: url('http://localhost:5001/api'),
  HEADLESS: flag(true),
  SLOW_MO: integer('SLOW_MO', 0),
  TIMEOUT: integer('TIMEOUT', 30_000),
  VIEWPORT_WIDTH: integer('VIEWPORT_WIDTH', 1920),
  VIEWPORT_HEIGHT: integer('VIEWPORT_HEIGHT', 1080),
  REPORT_DIR: text('reports'),
  SCREENSHOT_DIR: text('reports/screenshots'),
  LOCATORS_FILE: text('config/locators.json'),
  LOCATORS_OVERRIDE: z
    .string()
    .trim()
    .optional()
    .transform((value) => (value === '' ? undefined : value)),
  // Only an explicit "true" skips the probe, unlike HEADLESS.
  SKIP_HEALTH_CHECK: z
    .string()
    .default('false')
    .transform((value) => value.trim().toLowerCase() === 'true'),
})

export function pageUrls(baseUrl: string): PageUrls {
  return Object.freeze({
    login: `${baseUrl}/login`,
    dashboard: `${baseUrl}/dashboard`,
    trading: `${baseUrl}/trading`,
    portfolio: `${baseUrl}/portfolio`,
    watchlists: `${baseUrl}/watchlists`,
    trades: `${baseUrl}/trades`,
    register: `${baseUrl}/register`,
  })
}

export interface LoadSettingsOptions {
  /** Parsed with dotenv; missing files are ignored. Defaults to `ENV_FILE` or `.env.test`. */
  envFile?: string
  env?: NodeJS.ProcessEnv
}

function readEnvFile(envFile: string): Record<string, string> {
  if (!fs.existsSync(envFile)) return {}
  return parse(fs.readFileSync(envFile))
}

/**
 * Build the suite settings from an env file and the process environment.
 * Variables already set in the environment win over the file.
 */
export function loadSettings(options: LoadSettingsOptions = {}): Settings {
  const env = options.env ?? process.env
  const merged: Record<string, string> = readEnvFile(options.envFile ?? env.ENV_FILE ?? DEFAULT_ENV_FILE)
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) merged[key] = value
  }

  const result = envSchema.safeParse(merged)
  if (!result.success) {
    throw new SettingsError(result.error.issues.map((issue) => issue.message))
  }

  const parsed = result.data
  return Object.freeze({
    baseUrl: parsed.BASE_URL,
    apiUrl: parsed.API_URL,
    headless: parsed.HEADLESS,
    slowMo: parsed.SLOW_MO,
    timeout: parsed.TIMEOUT,
    viewportWidth: parsed.VIEWPORT_WIDTH,
    viewportHeight: parsed.VIEWPORT_HEIGHT,
    reportDir: parsed.REPORT_DIR,
    screenshotDir: parsed.SCREENSHOT_DIR,
    locatorsFile: parsed.LOCATORS_FILE,
    locatorsOverrideFile: parsed.LOCATORS_OVERRIDE,
    skipHealthCheck: parsed.SKIP_HEALTH_CHECK,
    urls: pageUrls(parsed.BASE_URL),
  })
}
