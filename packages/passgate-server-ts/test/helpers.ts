import pino from 'pino'
import type { OtpAuditEvent, OtpAuditEventType, OtpAuditSink } from '../src/audit/auditSink'
import type { SignupIdentityResolver } from '../src/otp/identityResolver'
import type { AccountRef } from '../src/otp/types'

export const silentLogger = pino({ level: 'silent' })

export class MemoryAuditSink implements OtpAuditSink {
  readonly events: OtpAuditEvent[] = []

  emit(event: OtpAuditEvent): void {
    this.events.push(event)
  }

  ofType<T extends OtpAuditEventType>(type: T): Extract<OtpAuditEvent, { type: T }>[] {
    return this.events.filter((event): event is Extract<OtpAuditEvent, { type: T }> => event.type === type)
  }
}

/** Resolver over a fixed set of inactive accounts keyed by `userClass:email`. */
export const staticResolver = (accounts: Record<string, AccountRef> = {}): SignupIdentityResolver => ({
  resolve: async (email, userClass) => {
    const account = accounts[`${userClass}:${email}`]
    return account ? { status: 'inactive_account', account } : { status: 'no_account' }
  },
})

/** Deterministic generator that hands out the given codes in order. */
export const sequenceGenerator = (...codes: string[]) => {
  let next = 0
  return {
    generate: (length: number): string => {
      const code = codes[next++ % codes.length] ?? ''
      return code.padStart(length, '0')
    },
  }
}
