import { describe, expect, it, vi } from 'vitest';

import { GenerationFailedError } from '../src/errors.js';
import { OpenAICompletionClient } from '../src/reply/completion.js';
import type { ChatCreate } from '../src/reply/completion.js';

const prompt = { system: 'Be polite.', user: 'Onde está a encomenda?', temperature: 0.4, maxTokens: 300 };

describe('OpenAICompletionClient', () => {
  it('sends the system prompt and the email as chat messages', async () => {
    const create = vi.fn<ChatCreate>(async () => ({
      model: 'gpt-4o-mini-2024-07-18',
      choices: [{ message: { content: '  Caro cliente, a encomenda segue amanhã.  ' } }],
      usage: { prompt_tokens: 42, completion_tokens: 12 },
    }));
    const client = new OpenAICompletionClient({ model: 'gpt-4o-mini', create });

    const out = await client.complete(prompt);

    expect(create).toHaveBeenCalledWith({
      model: 'gpt-4o-mini',
      messages: [
        { role: 'system', content: 'Be polite.' },
        { role: 'user', content: 'Onde está a encomenda?' },
      ],
      temperature: 0.4,
      max_tokens: 300,
    });
    expect(out).toEqual({
      text: 'Caro cliente, a encomenda segue amanhã.',
      model: 'gpt-4o-mini-2024-07-18',
      usage: { promptTokens: 42, completionTokens: 12 },
    });
  });

  it('wraps upstream failures', async () => {
    const upstream = new Error('429 quota exceeded');
    const client = new OpenAICompletionClient({
      model: 'gpt-4o-mini',
      create: async () => {
        throw upstream;
      },
    });

    const err = await client.complete(prompt).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(GenerationFailedError);
    expect(err).toMatchObject({ message: 'Completion request failed: 429 quota exceeded', cause: upstream });
  });

  it('treats an empty reply as a failure', async () => {
    const client = new OpenAICompletionClient({
      model: 'gpt-4o-mini',
      create: async () => ({ model: 'gpt-4o-mini', choices: [{ message: { content: null } }] }),
    });
    await expect(client.complete(prompt)).rejects.toThrow('Completion returned no text');
  });
});
