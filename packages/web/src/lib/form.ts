export const EMAIL_REQUIRED = 'Por favor escreve um email';
export const INTENT_REQUIRED = 'Escolhe pelo menos um tipo de resposta';

/** Notices for every field the agent still has to fill in before generating. */
export function missingReplyFields(form: { email: string; intents: string[] }): string[] {
  const notices: string[] = [];
  if (!form.email.trim()) notices.push(EMAIL_REQUIRED);
  if (form.intents.length === 0) notices.push(INTENT_REQUIRED);
  return notices;
}
