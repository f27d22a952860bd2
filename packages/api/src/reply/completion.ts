import OpenAI from 'openai';
import type { ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';

import { GenerationFailedError } from '../errors.js';
import type { CompletionPrompt } from './prompt.js';

export type Completion = {
  text: string;
  model: string;
  usage?: { promptTokens: number; completionTokens: number };
};

export interface CompletionClient {
  readonly model: string;
  complete(prompt: CompletionPrompt): Promise<Completion>;
}

// The slice of a chat completion this client reads.
type ChatResponse = {
  model: string;
  choices: Array<{ message: { content: string | null } }>;
  usage?: { prompt_tokens: number; completion_tokens: number } | null;
};

export type ChatCreate = (body: ChatCompletionCreateParamsNonStreaming) => Promise<ChatResponse>;

export class OpenAICompletionClient implements CompletionClient {
  readonly model: string;
  private readonly create: ChatCreate;

  constructor(opts: { model: string; apiKey?: string; baseUrl?: string; create?: ChatCreate }) {
    this.model = opts.model;
    if (opts.create) {
      this.create = opts.create;
    } else {
      const client = new OpenAI({ apiKey: opts.apiKey, baseURL: opts.baseUrl });
      this.create = (body) => client.chat.completions.create(body);
    }
  }

  async complete(prompt: CompletionPrompt): Promise<Completion> {
    let res: ChatResponse;
    try {
      res = await this.create({
        model: this.model,
        messages: [
          { role: 'system', content: prompt.system },
          { role: 'user', content: prompt.user },
        ],
        temperature: prompt.temperature,
        max_tokens: prompt.maxTokens,
      });
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new GenerationFailedError(`Completion request failed: ${reason}`, { cause: err });
    }

    const text = res.choices[0]?.message.content?.trim() ?? '';
    if (!text) throw new GenerationFailedError('Completion returned no text');

    return {
      text,
      model: res.model || this.model,
      usage: res.usage ? { promptTokens: res.usage.prompt_tokens, completionTokens: res.usage.completion_tokens } : undefined,
    };
  }
}
