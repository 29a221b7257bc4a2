import type { OtpKind, UserClass } from '@passgate/shared-types'

export interface DeliveryContext {
  /** Kind of the issued record: a signup code or an account activation/reset code. */
  purpose: OtpKind
  userClass: UserClass
  expiresAt: number
}

export type DeliveryResult = { success: true } | { success: false; error: { code: 'DELIVERY_FAILED'; message: string } }

/**
 * Outbound channel for codes. Runs after issuance; a failed send leaves the
 * stored code untouched.
 */
export interface OtpDeliveryGateway {
  send(recipient: string, code: string, context: DeliveryContext): Promise<DeliveryResult>
}
