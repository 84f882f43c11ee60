import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { z } from 'zod';
import type { GeminiConfig } from './config.js';
import { ProviderError, TransportError } from './errors.js';

export interface GenerationClient {
  send(prompt: string): Promise<string>;
}

const providerErrorSchema = z.object({
  error: z.object({ message: z.string().min(1) }),
});

function providerMessage(status: number, body: unknown): string {
  const fallback = `Gemini API error: status ${status}`;
  if (typeof body !== 'string') return fallback;
  try {
    const parsed = providerErrorSchema.safeParse(JSON.parse(body));
    return parsed.success ? `Gemini API error: ${parsed.data.error.message}` : fallback;
  } catch {
    return fallback;
  }
}

export function maskKey(key: string): string {
  if (!key) return '';
  if (key.length <= 8) return key[0] + '***' + key[key.length - 1];
  return key.slice(0, 4) + '***' + key.slice(-4);
}

/**
 * Single-shot client for the Gemini generateContent endpoint.
 * One instance (and its axios instance) is shared by every request the server handles.
 */
export class GeminiClient implements GenerationClient {
  private readonly config: GeminiConfig;
  private readonly http: AxiosInstance;

  constructor(config: GeminiConfig, http: AxiosInstance = axios.create()) {
    this.config = config;
    this.http = http;
  }

  async send(prompt: string): Promise<string> {
    const body = { contents: [{ parts: [{ text: prompt }] }] };
    let res: AxiosResponse<string>;
    try {
      res = await this.http.post<string>(this.config.apiUrl, body, {
        headers: {
          'Content-Type': 'application/json',
          'X-goog-api-key': this.config.apiKey,
        },
        timeout: this.config.timeoutMs,
        responseType: 'text',
        validateStatus: () => true,
      });
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e);
      throw new TransportError(`Gemini request failed: ${reason}`, { cause: e });
    }
    if (res.status < 200 || res.status >= 300) {
      throw new ProviderError(res.status, providerMessage(res.status, res.data));
    }
    return res.data;
  }
}
