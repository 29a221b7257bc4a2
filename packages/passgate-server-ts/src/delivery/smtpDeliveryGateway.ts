import nodemailer, { type SendMailOptions } from 'nodemailer'
import type { Logger } from 'pino'
import type { PassgateSmtpConfig } from '@passgate/shared-types'
import { systemClock, type Clock } from '../otp/clock'
import type { DeliveryContext, DeliveryResult, OtpDeliveryGateway } from './types'

export type MailTransport = {
  sendMail: (mail: SendMailOptions) => Promise<unknown>
}

export interface SmtpDeliveryGatewayOptions {
  transport: MailTransport
  from: string
  logger: Logger
  appName?: string
  clock?: Clock
}

const SUBJECTS: Record<DeliveryContext['purpose'], string> = {
  signup: 'Your signup verification code',
  account: 'Your account verification code',
}

const minutesUntil = (expiresAt: number, now: number): number => Math.max(1, Math.ceil((expiresAt - now) / 60_000))

export class SmtpDeliveryGateway implements OtpDeliveryGateway {
  private readonly clock: Clock
  private readonly appName: string

  constructor(private readonly options: SmtpDeliveryGatewayOptions) {
    this.clock = options.clock ?? systemClock
    this.appName = options.appName ?? 'passgate'
  }

  static fromConfig(config: PassgateSmtpConfig, logger: Logger): SmtpDeliveryGateway {
    const transport = nodemailer.createTransport({
      host: config.host,
      port: config.port,
      secure: config.secure ?? config.port === 465,
      auth: config.username ? { user: config.username, pass: config.password } : undefined,
      connectionTimeout: 10000,
      greetingTimeout: 10000,
      socketTimeout: 10000,
    })

    return new SmtpDeliveryGateway({ transport, from: config.from, logger })
  }

  async send(recipient: string, code: string, context: DeliveryContext): Promise<DeliveryResult> {
    const minutes = minutesUntil(context.expiresAt, this.clock.now())
    const mail: SendMailOptions = {
      from: this.options.from,
      to: recipient,
      subject: `${this.appName} - ${SUBJECTS[context.purpose]}`,
      text:
        `Your verification code is: ${code}\n\n` +
        `This code expires in ${minutes} minute${minutes === 1 ? '' : 's'} and can be used once.\n\n` +
        `If you did not request it, you can ignore this email.\n`,
    }

    try {
      await this.options.transport.sendMail(mail)
    } catch (error) {
      this.options.logger.warn(
        { err: error, purpose: context.purpose, userClass: context.userClass },
        'OTP email delivery failed'
      )
      return { success: false, error: { code: 'DELIVERY_FAILED', message: 'Could not send the verification email.' } }
    }

    this.options.logger.info({ purpose: context.purpose, userClass: context.userClass }, 'OTP email sent')
    return { success: true }
  }
}
