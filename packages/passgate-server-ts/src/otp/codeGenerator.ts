import { randomInt } from 'node:crypto'

export const MAX_CODE_LENGTH = 12

export type CodeGenerator = {
  generate: (length: number) => string
}

/**
 * Uniform numeric code from the CSPRNG, one digit at a time so there is no
 * modulo bias and leading zeros are as likely as any other digit.
 */
export const generateNumericCode = (length: number): string => {
  if (!Number.isInteger(length) || length < 1 || length > MAX_CODE_LENGTH) {
    throw new RangeError(`Code length must be an integer between 1 and ${MAX_CODE_LENGTH}, got ${length}`)
  }

  let code = ''
  for (let i = 0; i < length; i++) {
    code += randomInt(10).toString()
  }
  return code
}

export const cryptoCodeGenerator: CodeGenerator = {
  generate: generateNumericCode,
}
