import { describe, it, expect } from 'vitest';
import { listAvailableModels, parseModelSelection } from '../src/models/providers.js';
import { ApiError, ErrorType } from '../src/utils/errors.js';

describe('Model providers', () => {
  describe('parseModelSelection', () => {
    it('should return undefined when nothing is requested', () => {
      expect(parseModelSelection()).toBeUndefined();
      expect(parseModelSelection('  ', '')).toBeUndefined();
    });

    it('should use the provider default when no model is named', () => {
      expect(parseModelSelection('OpenAI')).toEqual({ provider: 'openai', model: 'gpt-4o-mini' });
      expect(parseModelSelection('anthropic')).toEqual({ provider: 'anthropic', model: 'claude-3-haiku-20240307' });
    });

    it('should match models case-insensitively', () => {
      expect(parseModelSelection('google', 'Gemini-Pro')).toEqual({ provider: 'google', model: 'gemini-pro' });
    });

    it('should reject unknown providers', () => {
      expect(() => parseModelSelection('mistral')).toThrow('Unsupported model provider: mistral');
    });

    it('should reject a model from another provider', () => {
      let caught: unknown;
      try {
        parseModelSelection('openai', 'gemini-pro');
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ApiError);
      expect(caught).toMatchObject({
        type: ErrorType.BAD_REQUEST,
        message: 'Unsupported model for openai: gemini-pro',
      });
    });

    it('should reject a model without a provider', () => {
      expect(() => parseModelSelection(undefined, 'gpt-4o')).toThrow('model_name requires model_provider');
    });
  });

  describe('listAvailableModels', () => {
    it('should report which providers have an API key', () => {
      const providers = listAvailableModels({ OPENAI_API_KEY: 'test-secret' });

      expect(providers.openai).toMatchObject({ available: true, api_key_configured: true, default_model: 'gpt-4o-mini' });
      expect(providers.google.available).toBe(false);
      expect(providers.anthropic.models.map((model) => model.id)).toEqual([
        'claude-3-opus-20240229',
        'claude-3-sonnet-20240229',
        'claude-3-haiku-20240307',
      ]);
    });
  });
});
