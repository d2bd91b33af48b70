import axios from 'axios'
import type { Logger } from 'pino'
import type { Settings } from '../config/settings'

export interface ProbeTarget {
  name: string
  url: string
  hint: string
}

export type ProbeResult =
  | { target: ProbeTarget; reachable: true; status: number }
  | { target: ProbeTarget; reachable: false; reason: string }

export type UnreachableResult = Extract<ProbeResult, { reachable: false }>

export type HttpGet = (
  url: string,
  config: { timeout: number; validateStatus: (status: number) => boolean }
) => Promise<{ status: number }>

const axiosGet: HttpGet = (url, config) => axios.get(url, config)

export class EnvironmentNotReadyError extends Error {
  readonly failures: UnreachableResult[]

  constructor(failures: UnreachableResult[]) {
    super(
      failures
        .map(({ target, reason }) => `${target.name} is not reachable at ${target.url} (${reason}). ${target.hint}`)
        .join('\n')
    )
    this.name = 'EnvironmentNotReadyError'
    this.failures = failures
  }
}

export function probeTargets(settings: Settings): ProbeTarget[] {
  return [
    { name: 'API', url: `${settings.apiUrl}/health`, hint: 'Start the backend before running the suite.' },
    { name: 'Frontend', url: settings.baseUrl, hint: 'Start the frontend dev server before running the suite.' },
  ]
}

/** Any HTTP response counts as reachable; only transport failures do not. */
export async function probe(target: ProbeTarget, timeout: number, get: HttpGet = axiosGet): Promise<ProbeResult> {
  try {
    const response = await get(target.url, { timeout, validateStatus: () => true })
    return { target, reachable: true, status: response.status }
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    return { target, reachable: false, reason }
  }
}

export async function assertEnvironmentReady(
  settings: Settings,
  logger: Logger,
  get: HttpGet = axiosGet
): Promise<ProbeResult[]> {
  const timeout = Math.min(settings.timeout, 10_000)
  const results = await Promise.all(probeTargets(settings).map((target) => probe(target, timeout, get)))

  for (const result of results) {
    if (result.reachable) {
      logger.info({ target: result.target.name, url: result.target.url, status: result.status }, 'target reachable')
    } else {
      logger.error({ target: result.target.name, url: result.target.url, reason: result.reason }, 'target unreachable')
    }
  }

  const failures = results.filter((result): result is UnreachableResult => !result.reachable)
  if (failures.length > 0) throw new EnvironmentNotReadyError(failures)
  return results
}
