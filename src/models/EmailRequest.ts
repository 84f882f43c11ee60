import { z } from 'zod';

export const TONES = ['formal', 'casual', 'friendly', 'professional', 'persuasive'] as const;

export type Tone = (typeof TONES)[number];

// An empty tone is accepted and means "no tone clause".
export const emailRequestSchema = z.object({
  emailContent: z.string().min(1, 'emailContent required'),
  tone: z.union([z.enum(TONES), z.literal('')]).optional(),
});

export type EmailRequest = Readonly<z.infer<typeof emailRequestSchema>>;
