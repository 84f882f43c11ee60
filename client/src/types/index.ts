// Shared client types for the email generator UI.

export const TONES = ['formal', 'casual', 'friendly', 'professional', 'persuasive'] as const;

export type Tone = (typeof TONES)[number];

export interface GenerateEmailRequest {
    emailContent: string;
    tone: Tone;
}

/** Exactly one variant is active; transitions drive rendering. */
export type InteractionState =
    | { status: 'idle' }
    | { status: 'loading' }
    | { status: 'success'; text: string }
    | { status: 'error'; message: string };

export type CopyStatus = 'idle' | 'copied';
