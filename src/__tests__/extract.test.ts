import { describe, expect, it } from 'vitest';
import { EXTRACTION_ERROR_PREFIX, NO_RESPONSE_FALLBACK, extractReply } from '../utils/extract.js';

function candidateResponse(text: string) {
  return JSON.stringify({ candidates: [{ content: { parts: [{ text }], role: 'model' }, finishReason: 'STOP' }] });
}

describe('extractReply', () => {
  it('returns the first candidate text', () => {
    expect(extractReply(candidateResponse('X'))).toBe('X');
  });

  it('uses only the first candidate and first part', () => {
    const raw = JSON.stringify({
      candidates: [
        { content: { parts: [{ text: 'first' }, { text: 'second part' }] } },
        { content: { parts: [{ text: 'other candidate' }] } },
      ],
    });
    expect(extractReply(raw)).toBe('first');
  });

  it('falls back when candidates is empty', () => {
    expect(extractReply('{"candidates":[]}')).toBe('No response from Gemini.');
  });

  it('falls back when candidates is missing or not an array', () => {
    expect(extractReply('{"promptFeedback":{"blockReason":"SAFETY"}}')).toBe(NO_RESPONSE_FALLBACK);
    expect(extractReply('{"candidates":"none"}')).toBe(NO_RESPONSE_FALLBACK);
    expect(extractReply('null')).toBe(NO_RESPONSE_FALLBACK);
  });

  it('reports malformed JSON instead of throwing', () => {
    const out = extractReply('{"candidates": [');
    expect(out.startsWith('Error Processing message : ')).toBe(true);
    expect(out.length).toBeGreaterThan(EXTRACTION_ERROR_PREFIX.length);
  });

  it('reports a missing nested field', () => {
    expect(extractReply('{"candidates":[{"content":{}}]}')).toBe('Error Processing message : content.parts: Required');
  });

  it('reports a text field of the wrong type', () => {
    expect(extractReply('{"candidates":[{"content":{"parts":[{"text":42}]}}]}')).toBe(
      'Error Processing message : content.parts.0.text: Expected string, received number',
    );
  });

  it('reports a candidate that is not an object without a path', () => {
    expect(extractReply('{"candidates":[null]}')).toBe('Error Processing message : Expected object, received null');
  });

  it('reports an empty parts array', () => {
    expect(extractReply('{"candidates":[{"content":{"parts":[]}}]}').startsWith(EXTRACTION_ERROR_PREFIX)).toBe(true);
  });
});
