/**
 * Model Provider Catalog
 *
 * The LLM providers and models the generator can be asked to use. Requests
 * name them as free strings; `parseModelSelection` turns those into a
 * `ModelSelection`, a tagged union whose `model` field is checked against the
 * provider it belongs to.
 */

import { ApiError, ErrorType } from '../utils/errors.js';

export interface ModelInfo<M extends string = string> {
  id: M;
  name: string;
  description: string;
}

interface ProviderCatalog<M extends string> {
  /** Environment variable holding the provider's API key */
  apiKeyEnv: string;
  defaultModel: M;
  models: readonly ModelInfo<M>[];
}

const OPENAI_CATALOG = {
  apiKeyEnv: 'OPENAI_API_KEY',
  defaultModel: 'gpt-4o-mini',
  models: [
    { id: 'gpt-4', name: 'GPT-4', description: 'Most capable OpenAI model' },
    { id: 'gpt-4o', name: 'GPT-4o', description: 'Optimized GPT-4 model' },
    { id: 'gpt-4o-mini', name: 'GPT-4o Mini', description: 'Fast and cost-effective' },
    { id: 'gpt-3.5-turbo', name: 'GPT-3.5 Turbo', description: 'Fast and economical' },
  ],
} as const satisfies ProviderCatalog<string>;

const GOOGLE_CATALOG = {
  apiKeyEnv: 'GOOGLE_API_KEY',
  defaultModel: 'gemini-1.5-flash',
  models: [
    { id: 'gemini-pro', name: 'Gemini Pro', description: 'Advanced Gemini model' },
    { id: 'gemini-1.5-pro', name: 'Gemini 1.5 Pro', description: 'Latest Gemini model' },
    { id: 'gemini-1.5-flash', name: 'Gemini 1.5 Flash', description: 'Fast Gemini model' },
  ],
} as const satisfies ProviderCatalog<string>;

const ANTHROPIC_CATALOG = {
  apiKeyEnv: 'ANTHROPIC_API_KEY',
  defaultModel: 'claude-3-haiku-20240307',
  models: [
    { id: 'claude-3-opus-20240229', name: 'Claude 3 Opus', description: 'Most capable Claude 3 model' },
    { id: 'claude-3-sonnet-20240229', name: 'Claude 3 Sonnet', description: 'Balanced performance' },
    { id: 'claude-3-haiku-20240307', name: 'Claude 3 Haiku', description: 'Fast and compact' },
  ],
} as const satisfies ProviderCatalog<string>;

export type OpenAIModel = (typeof OPENAI_CATALOG.models)[number]['id'];
export type GoogleModel = (typeof GOOGLE_CATALOG.models)[number]['id'];
export type AnthropicModel = (typeof ANTHROPIC_CATALOG.models)[number]['id'];

export type ModelSelection =
  | { provider: 'openai'; model: OpenAIModel }
  | { provider: 'google'; model: GoogleModel }
  | { provider: 'anthropic'; model: AnthropicModel };

export type ModelProvider = ModelSelection['provider'];

export const MODEL_PROVIDERS: readonly ModelProvider[] = ['openai', 'google', 'anthropic'];

const CATALOGS: Record<ModelProvider, ProviderCatalog<string>> = {
  openai: OPENAI_CATALOG,
  google: GOOGLE_CATALOG,
  anthropic: ANTHROPIC_CATALOG,
};

export function isModelProvider(value: string): value is ModelProvider {
  return MODEL_PROVIDERS.some((provider) => provider === value);
}

function resolveModel<M extends string>(
  provider: ModelProvider,
  catalog: ProviderCatalog<M>,
  requested: string | undefined
): M {
  const wanted = requested?.trim().toLowerCase();
  if (!wanted) {
    return catalog.defaultModel;
  }

  const match = catalog.models.find((model) => model.id.toLowerCase() === wanted);
  if (!match) {
    throw new ApiError(ErrorType.BAD_REQUEST, `Unsupported model for ${provider}: ${requested}`, [
      { field: 'model_name', message: `Expected one of: ${catalog.models.map((m) => m.id).join(', ')}` },
    ]);
  }
  return match.id;
}

/**
 * Validate a provider/model pair given as strings
 *
 * @returns The selection, or undefined when neither is given (the request
 *   then uses the generator's default model)
 * @throws {ApiError} BAD_REQUEST for unknown providers or models, or a model
 *   without a provider
 *
 * @example
 * ```ts
 * parseModelSelection('OpenAI', undefined); // { provider: 'openai', model: 'gpt-4o-mini' }
 * parseModelSelection('google', 'gemini-pro'); // { provider: 'google', model: 'gemini-pro' }
 * ```
 */
export function parseModelSelection(provider?: string, model?: string): ModelSelection | undefined {
  const providerName = provider?.trim().toLowerCase();

  if (!providerName) {
    if (model?.trim()) {
      throw new ApiError(ErrorType.BAD_REQUEST, 'model_name requires model_provider', [
        { field: 'model_provider', message: 'Required when model_name is set' },
      ]);
    }
    return undefined;
  }

  if (!isModelProvider(providerName)) {
    throw new ApiError(ErrorType.BAD_REQUEST, `Unsupported model provider: ${provider}`, [
      { field: 'model_provider', message: `Expected one of: ${MODEL_PROVIDERS.join(', ')}` },
    ]);
  }

  switch (providerName) {
    case 'openai':
      return { provider: 'openai', model: resolveModel<OpenAIModel>('openai', OPENAI_CATALOG, model) };
    case 'google':
      return { provider: 'google', model: resolveModel<GoogleModel>('google', GOOGLE_CATALOG, model) };
    case 'anthropic':
      return { provider: 'anthropic', model: resolveModel<AnthropicModel>('anthropic', ANTHROPIC_CATALOG, model) };
  }
}

export interface ProviderAvailability {
  available: boolean;
  api_key_configured: boolean;
  default_model: string;
  models: ModelInfo[];
}

/**
 * List every provider with its models and whether its API key is configured
 */
export function listAvailableModels(
  env: Record<string, string | undefined> = process.env
): Record<ModelProvider, ProviderAvailability> {
  const describe = (provider: ModelProvider): ProviderAvailability => {
    const catalog = CATALOGS[provider];
    const configured = Boolean(env[catalog.apiKeyEnv]);
    return {
      available: configured,
      api_key_configured: configured,
      default_model: catalog.defaultModel,
      models: catalog.models.map((model) => ({ ...model })),
    };
  };

  return {
    openai: describe('openai'),
    google: describe('google'),
    anthropic: describe('anthropic'),
  };
}
