import type { EmailRequest } from '../models/EmailRequest.js';
import type { GenerationClient } from '../utils/gemini.js';
import { buildPrompt } from '../utils/prompt.js';
import { extractReply } from '../utils/extract.js';

export class EmailGeneratorService {
  private client: GenerationClient;

  constructor(client: GenerationClient) { this.client = client; }

  // Client failures are not caught here: they are the only fatal path.
  async generateReply(request: EmailRequest): Promise<string> {
    const prompt = buildPrompt(request.emailContent, request.tone);
    const raw = await this.client.send(prompt);
    return extractReply(raw);
  }
}
