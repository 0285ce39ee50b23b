/**
 * Google Gemini backend (Generative Language REST API)
 */

import { z } from 'zod';
import { ProviderError } from '../errors.js';
import { postJson } from './http.js';
import type { BackendFactory } from './types.js';

const GEMINI_API = 'https://generativelanguage.googleapis.com/v1beta';

const embedResponse = z.object({
  embedding: z.object({ values: z.array(z.number()).min(1) }),
});

const generateResponse = z.object({
  candidates: z
    .array(
      z.object({
        content: z.object({
          parts: z.array(z.object({ text: z.string().optional() })),
        }),
      }),
    )
    .min(1),
});

export const createGeminiBackend: BackendFactory = (settings, logger) => {
  const { apiKey, model, embedModel } = settings.gemini;
  const log = logger.child('gemini');

  const common = () => {
    if (!apiKey) {
      throw new ProviderError('gemini', 'auth_error', 'GEMINI_API_KEY is not configured');
    }
    return {
      provider: 'gemini',
      headers: { 'x-goog-api-key': apiKey },
      timeoutMs: settings.timeoutMs,
      retryDelaysMs: settings.retryDelaysMs,
      logger: log,
    };
  };

  return {
    name: 'gemini',

    async embed(text, signal) {
      const data = await postJson({
        ...common(),
        url: `${GEMINI_API}/models/${embedModel}:embedContent`,
        body: {
          model: `models/${embedModel}`,
          content: { parts: [{ text }] },
        },
        schema: embedResponse,
        signal,
      });
      return data.embedding.values;
    },

    async generate(prompt, maxTokens, signal) {
      const data = await postJson({
        ...common(),
        url: `${GEMINI_API}/models/${model}:generateContent`,
        body: {
          contents: [{ parts: [{ text: prompt }] }],
          generationConfig: { maxOutputTokens: maxTokens, temperature: 0.7 },
        },
        schema: generateResponse,
        signal,
      });

      const text = data.candidates[0].content.parts
        .map((part) => part.text ?? '')
        .join('')
        .trim();
      if (!text) {
        throw new ProviderError('gemini', 'malformed', 'empty completion');
      }
      return text;
    },
  };
};
