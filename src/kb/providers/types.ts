import type { ProviderName, ProviderSettings } from '../../config.js';
import type { Logger } from '../../logger.js';

/**
 * One model backend. Failures are thrown as ProviderError.
 */
export interface ModelBackend {
  readonly name: ProviderName;
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
  generate(prompt: string, maxTokens: number, signal?: AbortSignal): Promise<string>;
}

export type BackendFactory = (settings: ProviderSettings, logger: Logger) => ModelBackend;
