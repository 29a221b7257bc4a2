import fastify from 'fastify'
import { z } from 'zod'

import {
  createAccountLookupResolver,
  createPassgate,
  loadServerConfigFromEnv,
} from '../../packages/passgate-server-ts/src'
import {
  createOtpVerifySchema,
  OtpRequestSchema,
  type OtpRequestError,
  type OtpRequestResponse,
  type OtpVerifyError,
  type OtpVerifyResponse,
} from '../../packages/shared-types/src'

const config = loadServerConfigFromEnv()

// Replace with a query against your own accounts table: return the account
// when it exists and is still awaiting activation, null otherwise.
const resolver = createAccountLookupResolver(async () => null)

const passgate = createPassgate(config, { resolver })
const { manager, delivery, logger } = passgate

const isProduction = config.env === 'production'
const shouldLogOtp =
  !isProduction && (process.env.PASSGATE_LOG_OTP === 'true' || process.env.PASSGATE_LOG_OTP === '1')

const OtpVerifySchema = createOtpVerifySchema(config.otp?.codeLength)

export const app = fastify({ loggerInstance: logger })

app.setErrorHandler((error, request, reply) => {
  request.log.error({ err: error }, 'Unhandled error')
  return reply.status(500).send({ error: 'INTERNAL_ERROR', message: 'Internal server error', requestId: request.id })
})

app.post('/otp/request', async (request, reply) => {
  const parsed = OtpRequestSchema.safeParse(request.body)
  if (!parsed.success) {
    return reply.status(400).send({
      error: 'VALIDATION_ERROR',
      message: 'Invalid request body',
      details: z.treeifyError(parsed.error),
    } satisfies OtpRequestError)
  }

  const { email, userClass } = parsed.data
  const issued = await manager.issueOtp(email, userClass)
  if (!issued.success) {
    const status = issued.error.code === 'STORE_UNAVAILABLE' ? 503 : 400
    return reply.status(status).send({ error: issued.error.code, message: issued.error.message } satisfies OtpRequestError)
  }

  // DO NOT USE IN PRODUCTION:
  // Logging OTPs makes it easy to copy/paste into a real server and leak codes into logs.
  if (shouldLogOtp) {
    request.log.info({ email, code: issued.data.code }, 'OTP issued (dev only)')
  }

  if (delivery) {
    const sent = await delivery.send(email, issued.data.code, {
      purpose: issued.data.kind,
      userClass,
      expiresAt: issued.data.expiresAt,
    })
    if (!sent.success) {
      // The code stays valid; requesting again replaces it.
      return reply.status(502).send({ error: sent.error.code, message: sent.error.message } satisfies OtpRequestError)
    }
  } else {
    request.log.warn('No SMTP configured; OTP was issued but not delivered')
  }

  return { success: true, expiresAt: issued.data.expiresAt, message: 'Verification code sent.' } satisfies OtpRequestResponse
})

app.post('/otp/verify', async (request, reply) => {
  const parsed = OtpVerifySchema.safeParse(request.body)
  if (!parsed.success) {
    return reply.status(400).send({
      error: 'VALIDATION_ERROR',
      message: 'Invalid request body',
      details: z.treeifyError(parsed.error),
    } satisfies OtpVerifyError)
  }

  const { email, userClass, code } = parsed.data
  const verified = await manager.verifyOtp(email, userClass, code)
  if (!verified.success) {
    const status = verified.error.code === 'STORE_UNAVAILABLE' ? 503 : 400
    return reply.status(status).send({ error: verified.error.code, message: verified.error.message } satisfies OtpVerifyError)
  }

  return { success: true, ...verified.data } satisfies OtpVerifyResponse
})

app.addHook('onClose', async () => {
  await passgate.close()
})

const port = Number(process.env.PORT ?? 3005)

const start = async (): Promise<void> => {
  await app.listen({ port, host: '0.0.0.0' })
  passgate.cleanup?.start()
}

start().catch((error: unknown) => {
  logger.fatal({ err: error }, 'passgate example server failed to start')
  process.exit(1)
})
