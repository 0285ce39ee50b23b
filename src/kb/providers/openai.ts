/**
 * OpenAI backend (or any OpenAI-compatible endpoint via OPENAI_BASE_URL)
 */

import { z } from 'zod';
import { ProviderError } from '../errors.js';
import { postJson } from './http.js';
import type { BackendFactory } from './types.js';

const embedResponse = z.object({
  data: z.array(z.object({ embedding: z.array(z.number()).min(1) })).min(1),
});

const chatResponse = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }),
      }),
    )
    .min(1),
});

export const createOpenAIBackend: BackendFactory = (settings, logger) => {
  const { apiKey, baseUrl, model, embedModel } = settings.openai;
  const log = logger.child('openai');

  const common = () => {
    if (!apiKey) {
      throw new ProviderError('openai', 'auth_error', 'OPENAI_API_KEY is not configured');
    }
    return {
      provider: 'openai',
      headers: { Authorization: `Bearer ${apiKey}` },
      timeoutMs: settings.timeoutMs,
      retryDelaysMs: settings.retryDelaysMs,
      logger: log,
    };
  };

  return {
    name: 'openai',

    async embed(text, signal) {
      const data = await postJson({
        ...common(),
        url: `${baseUrl}/embeddings`,
        body: { input: text, model: embedModel },
        schema: embedResponse,
        signal,
      });
      return data.data[0].embedding;
    },

    async generate(prompt, maxTokens, signal) {
      const data = await postJson({
        ...common(),
        url: `${baseUrl}/chat/completions`,
        body: {
          model,
          messages: [{ role: 'user', content: prompt }],
          max_tokens: maxTokens,
          temperature: 0.7,
        },
        schema: chatResponse,
        signal,
      });

      const text = (data.choices[0].message.content ?? '').trim();
      if (!text) {
        throw new ProviderError('openai', 'malformed', 'empty completion');
      }
      return text;
    },
  };
};
