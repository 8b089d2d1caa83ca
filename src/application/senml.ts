import { z } from 'zod';
import { EncodingError } from '../domain/index.js';

/**
 * Zod schema for a single SenML record (RFC 8428, JSON labels).
 *
 * Every field is optional on the wire; the agent itself only ever
 * produces `bn`, `n` and `vs`.
 */
export const senmlRecordSchema = z.object({
  bn: z.string().optional(),
  bt: z.number().optional(),
  bu: z.string().optional(),
  bver: z.number().int().optional(),
  n: z.string().optional(),
  u: z.string().optional(),
  v: z.number().optional(),
  vs: z.string().optional(),
  vb: z.boolean().optional(),
  vd: z.string().optional(),
  s: z.number().optional(),
  t: z.number().optional(),
  ut: z.number().optional(),
});

export type SenMLRecord = z.infer<typeof senmlRecordSchema>;

export const senmlPackSchema = z.array(senmlRecordSchema).min(1, 'Pack must contain at least one record');

/**
 * Encodes a response as a one-record SenML pack:
 * `[{"bn":"<bn>","n":"<n>","vs":"<vs>"}]`.
 *
 * The control plane matches on this exact shape, so no other field is set.
 */
export function encodeSenML(bn: string, n: string, vs: string): string {
  const pack: SenMLRecord[] = [{ bn, n, vs }];
  try {
    return JSON.stringify(pack);
  } catch (err: unknown) {
    throw new EncodingError('failed to encode SenML pack', { cause: err });
  }
}

/** Parses and validates a SenML JSON pack. */
export function decodeSenML(text: string): SenMLRecord[] {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err: unknown) {
    throw new EncodingError('SenML pack is not valid JSON', { cause: err });
  }

  const parsed = senmlPackSchema.safeParse(raw);
  if (!parsed.success) {
    throw new EncodingError(`invalid SenML pack: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}
