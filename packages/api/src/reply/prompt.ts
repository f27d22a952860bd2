import type { ReplyGenerateRequest } from '@replydesk/contracts';

import { PromptInputError } from '../errors.js';
import type { ReplyCatalog } from './catalog.js';

export type CompletionPrompt = {
  system: string;
  user: string;
  temperature: number;
  maxTokens: number;
};

function pickById<T extends { id: string }>(options: T[], id: string, field: string): T {
  const found = options.find((o) => o.id === id);
  if (!found) throw new PromptInputError(field, `Unknown ${field}: ${id}`);
  return found;
}

export function buildPrompt(req: ReplyGenerateRequest, catalog: ReplyCatalog, opts: { temperature: number }): CompletionPrompt {
  const email = req.email.trim();
  if (!email) throw new PromptInputError('email', 'Por favor escreve um email');
  if (req.intents.length === 0) throw new PromptInputError('intents', 'Escolhe pelo menos um tipo de resposta');

  const intents = [...new Set(req.intents)].map((id) => pickById(catalog.intents, id, 'intent'));
  const tone = pickById(catalog.tones, req.tone || catalog.defaults.tone, 'tone');
  const length = pickById(catalog.lengths, req.length || catalog.defaults.length, 'length');
  const notes = req.managerNotes?.trim() ?? '';

  const lines: string[] = [
    catalog.persona,
    '',
    'The reply email should convey the following message:',
    ...intents.map((i) => `- ${i.message}`),
    '',
    'Avoid the following list of expressions/words, without changing the intent of the message:',
    ...catalog.avoid.map((w) => `- "${w}"`),
    '',
    tone.instruction,
    length.instruction,
  ];
  if (notes) lines.push('', `Manager's special instruction: ${notes}`);
  lines.push('', catalog.language);

  return {
    system: lines.join('\n'),
    user: email,
    temperature: opts.temperature,
    maxTokens: length.maxTokens,
  };
}
