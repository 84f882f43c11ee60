import { z, ZodError } from 'zod';

export const NO_RESPONSE_FALLBACK = 'No response from Gemini.';
export const EXTRACTION_ERROR_PREFIX = 'Error Processing message : ';

const candidateSchema = z.object({
  content: z.object({
    parts: z.array(z.object({ text: z.string() })).nonempty(),
  }),
});

export type GeminiCandidate = z.infer<typeof candidateSchema>;

function readCandidates(root: unknown): unknown[] | null {
  if (typeof root !== 'object' || root === null || !('candidates' in root)) return null;
  const { candidates } = root;
  return Array.isArray(candidates) && candidates.length > 0 ? candidates : null;
}

function describe(err: unknown): string {
  if (err instanceof ZodError) {
    const issue = err.issues[0];
    if (!issue) return err.message;
    return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
  }
  return err instanceof Error ? err.message : String(err);
}

/**
 * Pulls `candidates[0].content.parts[0].text` out of a raw generateContent response.
 * Never throws: anomalies come back as fallback text.
 */
export function extractReply(raw: string): string {
  try {
    const candidates = readCandidates(JSON.parse(raw));
    if (!candidates) return NO_RESPONSE_FALLBACK;
    const first: GeminiCandidate = candidateSchema.parse(candidates[0]);
    return first.content.parts[0].text;
  } catch (err) {
    return EXTRACTION_ERROR_PREFIX + describe(err);
  }
}
