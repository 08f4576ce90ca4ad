import type { ToolwrightConfig } from '../config.js';
import { Logger } from '../logger.js';
import type { ChatTransport } from '../types.js';
import { DEFAULT_OLLAMA_BASE_URL, OllamaChatTransport } from './ollama.js';
import { OpenAIChatTransport } from './openai.js';

/**
 * Builds the chat transport for the configured provider.
 */
export const createTransport = (
  config: Pick<ToolwrightConfig, 'provider' | 'baseUrl' | 'apiKey'>,
): ChatTransport => {
  Logger.debug('transport', `Using ${config.provider} transport`, { baseUrl: config.baseUrl });

  switch (config.provider) {
    case 'openai':
      return new OpenAIChatTransport({ apiKey: config.apiKey ?? '', baseURL: config.baseUrl });
    case 'ollama':
      return new OllamaChatTransport(config.baseUrl ?? DEFAULT_OLLAMA_BASE_URL);
  }
};
