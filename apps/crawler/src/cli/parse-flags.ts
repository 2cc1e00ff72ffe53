import type { CrawlMode } from '../crawl/types.js'
import type { DeviceMode } from '../render/playwright-session.js'

export type Flags = Record<string, string | boolean>

/**
 * `--key value` pairs. A value may span several tokens (profile paths with
 * spaces); a flag with no value is `true`; positional tokens are skipped.
 */
export function parseFlags(argv: string[]): Flags {
  const flags: Flags = {}

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i]
    if (!token.startsWith('--')) {
      continue
    }

    const key = token.slice(2)
    const valueTokens: string[] = []
    let j = i + 1
    while (j < argv.length && !argv[j].startsWith('--')) {
      valueTokens.push(argv[j])
      j++
    }

    if (valueTokens.length > 0) {
      flags[key] = valueTokens.join(' ')
      i = j - 1
    } else {
      flags[key] = true
    }
  }

  return flags
}

/**
 * Bad command-line input. The entry point exits with `exitCode`.
 */
export class UsageError extends Error {
  readonly exitCode = 2

  constructor(message: string) {
    super(message)
    this.name = 'UsageError'
  }
}

export interface CrawlerFlags {
  workerId: string
  device: DeviceMode
  profileDir: string | undefined
  maxItems: number
  maxTargets: number
  mode: CrawlMode
  loginOnly: boolean
}

const WORKER_ID_PATTERN = /^[A-Za-z0-9_-]+$/

function asString(value: string | boolean | undefined): string {
  return typeof value === 'string' ? value : ''
}

function asPositiveInt(flags: Flags, key: string, fallback: number): number {
  const value = flags[key]
  if (value === undefined) {
    return fallback
  }
  if (typeof value !== 'string' || !/^\d+$/.test(value) || Number.parseInt(value, 10) < 1) {
    throw new UsageError(`--${key} must be a positive integer`)
  }
  return Number.parseInt(value, 10)
}

function asChoice<T extends string>(flags: Flags, key: string, choices: readonly T[], fallback: T): T {
  const value = flags[key]
  if (value === undefined) {
    return fallback
  }
  const match = choices.find((choice) => choice === value)
  if (!match) {
    throw new UsageError(`--${key} must be one of: ${choices.join(', ')}`)
  }
  return match
}

export function readCrawlerFlags(flags: Flags): CrawlerFlags {
  const workerId = asString(flags.worker)
  if (!workerId) {
    throw new UsageError('Missing --worker <id>')
  }
  if (!WORKER_ID_PATTERN.test(workerId)) {
    throw new UsageError('--worker must match /^[A-Za-z0-9_-]+$/')
  }
  if (flags['profile-dir'] === true) {
    throw new UsageError('Missing value for --profile-dir')
  }

  return {
    workerId,
    device: asChoice(flags, 'device', ['pc', 'vps'] as const, 'pc'),
    profileDir: asString(flags['profile-dir']) || undefined,
    maxItems: asPositiveInt(flags, 'max-items', 100),
    maxTargets: asPositiveInt(flags, 'max-targets', 50),
    mode: asChoice(flags, 'mode', ['light', 'full'] as const, 'full'),
    loginOnly: flags['login-only'] === true,
  }
}
