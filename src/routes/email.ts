import express, { Request, Response } from 'express';
import { emailRequestSchema } from '../models/EmailRequest.js';
import type { EmailGeneratorService } from '../services/emailGeneratorService.js';
import { GenerationError, ProviderError } from '../utils/errors.js';

export default function createEmailRouter(service: EmailGeneratorService) {
  const router = express.Router();

  router.post('/email/generate', async (req: Request, res: Response) => {
    const parsed = emailRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: 'invalid_request', details: parsed.error.flatten().fieldErrors });
    }
    try {
      const reply = await service.generateReply(parsed.data);
      return res.status(200).type('text/plain').send(reply);
    } catch (e) {
      if (e instanceof GenerationError) {
        const status = e instanceof ProviderError ? e.status : undefined;
        console.error('[email] generation failed', { name: e.name, status, message: e.message });
        return res.status(502).json({ error: e.message });
      }
      console.error('[email] generate error', e);
      return res.status(500).json({ error: 'server_error' });
    }
  });

  return router;
}
