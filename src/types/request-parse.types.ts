import { z } from 'zod';

// Zod schema for the model's structured reading of a free-text request.
// The result is still an untrusted candidate: it goes through the guardrail.
export const ParsedRequestResponseSchema = z.object({
  port: z.string().nullable(),
  grossTonnage: z.number().nullable(),
  arrivalDate: z.string().nullable(),
  departureDate: z.string().nullable(),
  flags: z.record(z.union([z.boolean(), z.string()])).default({})
});

export type ParsedRequestResponse = z.infer<typeof ParsedRequestResponseSchema>;

/** Candidate request in the shape the guardrail validates. */
export type CandidateRequest = Record<string, unknown>;

/** Drops the fields the reader could not find, so the guardrail reports them as missing. */
export function toCandidateRequest(parsed: ParsedRequestResponse): CandidateRequest {
  const candidate: CandidateRequest = {};
  if (parsed.port !== null) candidate.port = parsed.port;
  if (parsed.grossTonnage !== null) candidate.grossTonnage = parsed.grossTonnage;
  if (parsed.arrivalDate !== null) candidate.arrivalDate = parsed.arrivalDate;
  if (parsed.departureDate !== null) candidate.departureDate = parsed.departureDate;
  if (Object.keys(parsed.flags).length > 0) candidate.flags = parsed.flags;
  return candidate;
}
