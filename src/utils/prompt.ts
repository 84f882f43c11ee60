const BASE_INSTRUCTION =
  "Generate a professional email reply for the following email content. Don't include a subject, just keep the body.";

export function buildPrompt(emailContent: string, tone?: string): string {
  let prompt = BASE_INSTRUCTION;
  if (tone) prompt += ` Keep the tone ${tone} to write the email.`;
  prompt += '\nOriginal Email:\n';
  prompt += emailContent;
  return prompt;
}
