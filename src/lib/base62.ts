// ---------------------------------------------------------------------------
// Base62 codec for public identifiers
// ---------------------------------------------------------------------------
// Every id and token secret leaves the API as a base62 string. Values are
// non-negative integers that fit a signed 64-bit database column.
// ---------------------------------------------------------------------------

const ALPHABET = '0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz'
const BASE = 62n

/** Largest value an int8 column can hold. */
export const MAX_ID = (1n << 63n) - 1n

const DIGITS = new Map<string, bigint>([...ALPHABET].map((char, index) => [char, BigInt(index)]))

/** Thrown when a client-supplied id or token is not valid base62. */
export class MalformedTokenError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'MalformedTokenError'
  }
}

/**
 * Encode a non-negative integer as base62.
 *
 * @throws RangeError if the value is negative or above {@link MAX_ID}
 */
export function toBase62(value: bigint): string {
  if (value < 0n || value > MAX_ID) {
    throw new RangeError(`Value out of base62 id range: ${value.toString()}`)
  }
  if (value === 0n) {
    return '0'
  }

  let remaining = value
  let out = ''
  while (remaining > 0n) {
    out = ALPHABET.charAt(Number(remaining % BASE)) + out
    remaining /= BASE
  }
  return out
}

/**
 * Decode a base62 string.
 *
 * @throws MalformedTokenError on an empty string, a character outside the
 *   alphabet, or a value that overflows {@link MAX_ID}
 */
export function parseBase62(input: string): bigint {
  if (input.length === 0) {
    throw new MalformedTokenError('Empty base62 string')
  }

  let value = 0n
  for (const char of input) {
    const digit = DIGITS.get(char)
    if (digit === undefined) {
      throw new MalformedTokenError(`Invalid base62 character: ${JSON.stringify(char)}`)
    }
    value = value * BASE + digit
    if (value > MAX_ID) {
      throw new MalformedTokenError('Base62 value overflows a 64-bit id')
    }
  }
  return value
}

/** Like {@link parseBase62}, but returns undefined instead of throwing. */
export function tryParseBase62(input: string): bigint | undefined {
  try {
    return parseBase62(input)
  } catch (err: unknown) {
    if (err instanceof MalformedTokenError) {
      return undefined
    }
    throw err
  }
}
