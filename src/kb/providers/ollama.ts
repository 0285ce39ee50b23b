/**
 * Local Ollama backend
 */

import { z } from 'zod';
import { ProviderError } from '../errors.js';
import { postJson } from './http.js';
import type { BackendFactory } from './types.js';

const embedResponse = z.object({
  embedding: z.array(z.number()).min(1),
});

const generateResponse = z.object({
  response: z.string(),
});

export const createOllamaBackend: BackendFactory = (settings, logger) => {
  const { url, model, embedModel } = settings.ollama;
  const common = {
    provider: 'ollama',
    timeoutMs: settings.timeoutMs,
    retryDelaysMs: settings.retryDelaysMs,
    logger: logger.child('ollama'),
  };

  return {
    name: 'ollama',

    async embed(text, signal) {
      const data = await postJson({
        ...common,
        url: `${url}/api/embeddings`,
        body: { model: embedModel, prompt: text },
        schema: embedResponse,
        signal,
      });
      return data.embedding;
    },

    async generate(prompt, maxTokens, signal) {
      const data = await postJson({
        ...common,
        url: `${url}/api/generate`,
        body: {
          model,
          prompt,
          stream: false,
          options: { num_predict: maxTokens, temperature: 0.7 },
        },
        schema: generateResponse,
        signal,
      });

      const text = data.response.trim();
      if (!text) {
        throw new ProviderError('ollama', 'malformed', 'empty completion');
      }
      return text;
    },
  };
};
