import { z } from 'zod';
import { EventDecodeError } from '../core/errors.js';
import type { DecodedMessage } from '../core/types.js';

const MAX_UINT64 = (1n << 64n) - 1n;

/**
 * Request ids and flags are unsigned 64-bit. JSON numbers only carry them
 * exactly up to 2^53, so larger values arrive as decimal strings; an unsafe
 * number is rejected rather than rounded.
 */
const uint64 = z
  .union([z.number(), z.string()], { required_error: 'Required' })
  .transform((value, ctx): bigint => {
    if (typeof value === 'number') {
      if (Number.isSafeInteger(value) && value >= 0) {
        return BigInt(value);
      }
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Expected a non-negative safe integer; send larger values as a decimal string',
      });
      return z.NEVER;
    }
    if (/^\d+$/.test(value)) {
      const parsed = BigInt(value);
      if (parsed <= MAX_UINT64) {
        return parsed;
      }
    }
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Expected an unsigned 64-bit decimal string' });
    return z.NEVER;
  });

export const DecodedEventSchema = z.object({
  reqid: uint64,
  op: z.string().min(1).nullable().optional(),
  result: z.string().min(1).nullable().optional(),
  key: z.string().nullable().optional(),
  flags: uint64.default(0),
  exptime: z.number().int().nonnegative().max(0xffffffff).default(0),
  value: z.string().nullable().optional(),
  encoding: z.enum(['utf8', 'base64']).default('utf8'),
});

/**
 * Parses one channel line. Returns null for a blank line.
 */
export function decodeEventLine(line: string): DecodedMessage | null {
  const trimmed = line.trim();
  if (!trimmed) {
    return null;
  }

  let payload: unknown;
  try {
    payload = JSON.parse(trimmed);
  } catch (error) {
    throw new EventDecodeError(`not valid JSON (${error instanceof Error ? error.message : String(error)})`);
  }

  const parsed = DecodedEventSchema.safeParse(payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.length ? `${issue.path.join('.')}: ` : '';
    throw new EventDecodeError(`${where}${issue?.message ?? 'invalid event'}`);
  }

  const event = parsed.data;
  return {
    operation: event.op ?? null,
    result: event.result ?? null,
    key: toBytes(event.key, event.encoding),
    requestId: event.reqid,
    flags: event.flags,
    expiration: event.exptime,
    value: toBytes(event.value, event.encoding),
  };
}

function toBytes(text: string | null | undefined, encoding: 'utf8' | 'base64'): Uint8Array | null {
  if (text === null || text === undefined) {
    return null;
  }
  return new Uint8Array(Buffer.from(text, encoding));
}
