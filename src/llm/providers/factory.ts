/**
 * LLM provider factory - creates and resolves provider instances.
 */
import type { CompletionProvider, LLMProvider, LLMConfig } from '../types.js';
import { DEFAULT_CONFIGS } from '../types.js';
import type { LLMSettings, LLMProviderConfig } from '../../core/config/schema.js';
import { resolveApiKey, type Credentials } from '../../utils/credentials.js';
import { OpenAIProvider } from './openai.js';
import { AnthropicProvider } from './anthropic.js';

/**
 * Convert config file settings to LLMConfig format.
 * Resolves the API key from config.yaml, then .qaconfig, then the environment.
 */
function toProviderConfig(
  providerConfig: LLMProviderConfig | undefined,
  provider: LLMProvider,
  settings: LLMSettings,
  credentials?: Credentials
): Partial<LLMConfig> {
  return {
    provider,
    model: providerConfig?.model,
    apiKey: providerConfig?.api_key || resolveApiKey(credentials ?? {}, provider),
    baseUrl: providerConfig?.base_url,
    maxTokens: providerConfig?.max_tokens,
    temperature: providerConfig?.temperature,
    timeoutMs: settings.timeout_ms,
  };
}

/**
 * Create an LLM provider instance.
 */
export function createProvider(
  provider: LLMProvider,
  config: Partial<LLMConfig> = {}
): CompletionProvider {
  switch (provider) {
    case 'openai':
      return new OpenAIProvider(config);
    case 'anthropic':
      return new AnthropicProvider(config);
  }
}

/**
 * Create an LLM provider from config file settings.
 * @param provider - The provider type
 * @param settings - LLM settings from config.yaml
 * @param credentials - Credentials from .qaconfig
 */
export function createProviderFromSettings(
  provider: LLMProvider,
  settings?: LLMSettings,
  credentials?: Credentials
): CompletionProvider {
  if (!settings) {
    return createProvider(provider);
  }

  const providerConfig = settings.providers[provider];
  return createProvider(provider, toProviderConfig(providerConfig, provider, settings, credentials));
}

/**
 * Get the first available provider (has API key configured).
 * When none is available the preferred provider is returned anyway; its
 * calls fail with EXTERNAL_UNAVAILABLE.
 */
export function getAvailableProvider(
  preferred: LLMProvider = 'openai',
  settings?: LLMSettings,
  credentials?: Credentials
): CompletionProvider {
  const first = createProviderFromSettings(preferred, settings, credentials);
  if (first.isAvailable()) {
    return first;
  }

  const fallbackName: LLMProvider = preferred === 'openai' ? 'anthropic' : 'openai';
  const fallback = createProviderFromSettings(fallbackName, settings, credentials);
  return fallback.isAvailable() ? fallback : first;
}

export interface ProviderStatus {
  name: LLMProvider;
  /** An API key is configured */
  available: boolean;
  model: string;
  baseUrl: string;
}

/**
 * List all providers with their configuration.
 */
export function listProviders(
  settings?: LLMSettings,
  credentials?: Credentials
): ProviderStatus[] {
  const names: LLMProvider[] = ['openai', 'anthropic'];
  return names.map(name => {
    const providerConfig = settings?.providers[name];
    return {
      name,
      available: createProviderFromSettings(name, settings, credentials).isAvailable(),
      model: providerConfig?.model || DEFAULT_CONFIGS[name].model,
      baseUrl: providerConfig?.base_url || DEFAULT_CONFIGS[name].baseUrl,
    };
  });
}
