// Provider Registry
// Central registry for the configured inference providers

import { env, isProviderConfigured } from '../env.js';
import { OpenAICompatibleProvider } from './openai-compatible.js';
import type { Provider } from './types.js';

// Provider instances (lazy initialization)
const providers: Map<string, Provider> = new Map();

function createProvider(name: string): Provider | null {
  switch (name) {
    case 'deepseek':
      return new OpenAICompatibleProvider({
        name,
        baseUrl: env.DEEPSEEK_BASE_URL,
        apiKey: env.DEEPSEEK_API_KEY,
        defaultModel: 'deepseek-chat',
      });
    case 'moonshot':
      return new OpenAICompatibleProvider({
        name,
        baseUrl: env.MOONSHOT_BASE_URL,
        apiKey: env.MOONSHOT_API_KEY,
        defaultModel: 'moonshot-v1-32k',
      });
    case 'openai':
      return new OpenAICompatibleProvider({
        name,
        baseUrl: env.OPENAI_BASE_URL,
        apiKey: env.OPENAI_API_KEY,
        defaultModel: 'gpt-4o-mini',
      });
    default:
      return null;
  }
}

function getOrCreateProvider(name: string): Provider | null {
  const cached = providers.get(name);
  if (cached) return cached;

  if (!isProviderConfigured(name)) {
    return null;
  }

  const provider = createProvider(name);
  if (provider) {
    providers.set(name, provider);
  }
  return provider;
}

export function getProvider(name: string): Provider {
  const provider = getOrCreateProvider(name);

  if (!provider) {
    throw new Error(`Provider "${name}" is not available or not configured`);
  }

  return provider;
}

export { OpenAICompatibleProvider } from './openai-compatible.js';
export { ProviderInferenceBackend } from './inference-backend.js';
export type { Provider, ProviderMessage, ProviderOptions, ProviderResponse, ProviderTool, ProviderToolCall } from './types.js';
