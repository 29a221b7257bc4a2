import cron, { type ScheduledTask } from 'node-cron'
import type { Logger } from 'pino'
import type { OtpLifecycleManager } from './otpLifecycleManager'

export const DEFAULT_CLEANUP_SCHEDULE = '*/5 * * * *'

export interface OtpCleanupSchedulerOptions {
  manager: Pick<OtpLifecycleManager, 'cleanupExpired'>
  logger: Logger
  /** Cron expression; defaults to every five minutes. */
  schedule?: string
}

/**
 * Periodic expired-record sweep. A failed pass is logged and simply retried
 * on the next tick; nothing here throws into the host.
 */
export class OtpCleanupScheduler {
  private task: ScheduledTask | null = null
  private sweeping = false
  private readonly schedule: string

  constructor(private readonly options: OtpCleanupSchedulerOptions) {
    this.schedule = options.schedule ?? DEFAULT_CLEANUP_SCHEDULE
    if (!cron.validate(this.schedule)) {
      throw new Error(`Invalid cleanup schedule: ${this.schedule}`)
    }
  }

  get isRunning(): boolean {
    return this.task !== null
  }

  start(): void {
    if (this.task) {
      this.options.logger.warn('OTP cleanup is already scheduled')
      return
    }

    this.task = cron.schedule(this.schedule, () => {
      void this.runOnce()
    })
    this.options.logger.info({ schedule: this.schedule }, 'OTP cleanup scheduled')
  }

  stop(): void {
    if (!this.task) return
    this.task.stop()
    this.task = null
    this.options.logger.info('OTP cleanup stopped')
  }

  /** Runs one sweep; resolves the number of records removed (0 when skipped or failed). */
  async runOnce(): Promise<number> {
    if (this.sweeping) {
      this.options.logger.debug('Previous OTP cleanup still running, skipping tick')
      return 0
    }

    this.sweeping = true
    try {
      const result = await this.options.manager.cleanupExpired()
      if (!result.success) {
        this.options.logger.error({ error: result.error.code }, 'OTP cleanup failed, retrying next tick')
        return 0
      }

      if (result.data > 0) {
        this.options.logger.info({ removed: result.data }, 'Removed expired OTP records')
      }
      return result.data
    } catch (error) {
      this.options.logger.error({ err: error }, 'Unexpected error during OTP cleanup')
      return 0
    } finally {
      this.sweeping = false
    }
  }
}
