import { z } from 'zod';
import { DecodingError } from '../errors.js';
import { failure, success, type LookupOutcome } from '../types.js';

const lookupRecordSchema = z
  .object({
    version: z.string(),
    bundleId: z.string(),
    trackId: z.number().int(),
  })
  .transform(({ version, bundleId, trackId }) => ({
    version,
    bundleId,
    appId: String(trackId),
  }));

export const lookupResponseSchema = z.object({
  resultCount: z.number().int(),
  results: z.array(lookupRecordSchema),
});

export type LookupRecord = z.output<typeof lookupRecordSchema>;
export type LookupResponse = z.output<typeof lookupResponseSchema>;

export function decodeLookupResponse(
  body: string,
): LookupOutcome<LookupResponse> {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (error) {
    return failure(new DecodingError(error));
  }

  const parsed = lookupResponseSchema.safeParse(json);
  if (!parsed.success) {
    return failure(new DecodingError(parsed.error));
  }
  return success(parsed.data);
}
