import { CrawlError } from '../crawl/errors.js'

/**
 * Settle with work, or reject when ms elapse (NavigationTimeout) or signal
 * aborts (DeadlineExceeded), whichever comes first. ms <= 0 means no timer.
 *
 * The work itself is not cancelled. Callers sharing a session with it go
 * through SessionSteps so nothing new starts until it has settled.
 */
export function withTimeout<T>(work: Promise<T>, ms: number, label: string, signal?: AbortSignal): Promise<T> {
  if (signal?.aborted) {
    return Promise.reject(new CrawlError('DeadlineExceeded', `Deadline reached before ${label}`))
  }

  return new Promise<T>((resolve, reject) => {
    let timer: NodeJS.Timeout | undefined

    const onAbort = () => {
      cleanup()
      reject(new CrawlError('DeadlineExceeded', `Deadline reached during ${label}`))
    }

    const cleanup = () => {
      if (timer) clearTimeout(timer)
      signal?.removeEventListener('abort', onAbort)
    }

    if (ms > 0) {
      timer = setTimeout(() => {
        cleanup()
        reject(new CrawlError('NavigationTimeout', `${label} timed out after ${ms}ms`))
      }, ms)
    }
    signal?.addEventListener('abort', onAbort, { once: true })

    work.then(
      (value) => {
        cleanup()
        resolve(value)
      },
      (error: unknown) => {
        cleanup()
        reject(error)
      }
    )
  })
}

/**
 * One signal that aborts when any input aborts or after ms (if > 0).
 * dispose() clears the timer and detaches from the inputs.
 */
export function linkedDeadline(
  ms: number,
  ...signals: Array<AbortSignal | undefined>
): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController()
  const abort = () => controller.abort()
  const inputs = signals.filter((signal): signal is AbortSignal => signal !== undefined)

  for (const input of inputs) {
    if (input.aborted) {
      controller.abort()
      break
    }
    input.addEventListener('abort', abort, { once: true })
  }

  const timer = ms > 0 ? setTimeout(abort, ms) : undefined

  return {
    signal: controller.signal,
    dispose: () => {
      if (timer) clearTimeout(timer)
      for (const input of inputs) input.removeEventListener('abort', abort)
    },
  }
}

export interface SessionStepsOptions {
  timeoutMs: number
  signal?: AbortSignal
}

function isTimeUp(error: unknown): boolean {
  return error instanceof CrawlError && (error.kind === 'NavigationTimeout' || error.kind === 'DeadlineExceeded')
}

/**
 * Runs the steps of one target against its rendering session, one at a time.
 *
 * A step that times out keeps running inside the browser. The next step
 * waits for it to settle (up to timeoutMs again); if it never does the
 * session is treated as lost.
 */
export class SessionSteps {
  private abandoned: Promise<void> | null = null

  constructor(private readonly options: SessionStepsOptions) {}

  async run<T>(label: string, work: () => Promise<T>): Promise<T> {
    await this.settleAbandoned(label)

    const started = work()
    try {
      return await withTimeout(started, this.options.timeoutMs, label, this.options.signal)
    } catch (error) {
      if (isTimeUp(error)) {
        this.abandoned = started.then(
          () => undefined,
          () => undefined
        )
      }
      throw error
    }
  }

  private async settleAbandoned(label: string): Promise<void> {
    if (!this.abandoned) return

    try {
      await withTimeout(this.abandoned, this.options.timeoutMs, `settling before ${label}`, this.options.signal)
    } catch (error) {
      if (error instanceof CrawlError && error.kind === 'NavigationTimeout') {
        throw new CrawlError('SessionLost', `Session still busy with a timed-out step before ${label}`, { cause: error })
      }
      throw error
    }
    this.abandoned = null
  }
}
