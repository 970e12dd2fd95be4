/**
 * Tests for the LLM provider factory.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  createProvider,
  createProviderFromSettings,
  getAvailableProvider,
  listProviders,
} from '../../../../src/llm/providers/factory.js';
import { OpenAIProvider } from '../../../../src/llm/providers/openai.js';
import { AnthropicProvider } from '../../../../src/llm/providers/anthropic.js';
import { LLMSettingsSchema } from '../../../../src/core/config/schema.js';

describe('LLM provider factory', () => {
  beforeEach(() => {
    vi.stubEnv('OPENAI_API_KEY', '');
    vi.stubEnv('ANTHROPIC_API_KEY', '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  describe('createProvider', () => {
    it('should create each provider type', () => {
      expect(createProvider('openai')).toBeInstanceOf(OpenAIProvider);
      expect(createProvider('anthropic')).toBeInstanceOf(AnthropicProvider);
    });
  });

  describe('createProviderFromSettings', () => {
    it('should apply provider settings', () => {
      const settings = LLMSettingsSchema.parse({
        providers: { openai: { model: 'gpt-4o', api_key: 'test-key' } },
      });

      const provider = createProviderFromSettings('openai', settings);

      expect(provider).toBeInstanceOf(OpenAIProvider);
      expect(provider.isAvailable()).toBe(true);
      expect(provider instanceof OpenAIProvider ? provider.model : '').toBe('gpt-4o');
    });

    it('should take the key from credentials', () => {
      const settings = LLMSettingsSchema.parse({});
      const provider = createProviderFromSettings('anthropic', settings, {
        anthropic_api_key: 'test-key',
      });
      expect(provider.isAvailable()).toBe(true);
    });

    it('should create a provider without settings', () => {
      expect(createProviderFromSettings('openai').isAvailable()).toBe(false);
    });
  });

  describe('getAvailableProvider', () => {
    it('should prefer the requested provider when it has a key', () => {
      const provider = getAvailableProvider('anthropic', LLMSettingsSchema.parse({}), {
        openai_api_key: 'test-key',
        anthropic_api_key: 'test-key',
      });
      expect(provider.name).toBe('anthropic');
    });

    it('should fall back to the other provider', () => {
      const provider = getAvailableProvider('openai', LLMSettingsSchema.parse({}), {
        anthropic_api_key: 'test-key',
      });
      expect(provider.name).toBe('anthropic');
      expect(provider.isAvailable()).toBe(true);
    });

    it('should return the preferred provider when none is available', () => {
      const provider = getAvailableProvider('openai');
      expect(provider.name).toBe('openai');
      expect(provider.isAvailable()).toBe(false);
    });
  });

  describe('listProviders', () => {
    it('should list both providers with their availability', () => {
      const settings = LLMSettingsSchema.parse({
        providers: { anthropic: { model: 'claude-test', base_url: 'http://localhost:9000' } },
      });

      expect(listProviders(settings, { openai_api_key: 'test-key' })).toEqual([
        { name: 'openai', available: true, model: 'gpt-4o-mini', baseUrl: 'https://api.openai.com/v1' },
        { name: 'anthropic', available: false, model: 'claude-test', baseUrl: 'http://localhost:9000' },
      ]);
    });
  });
});
