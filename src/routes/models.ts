import { Hono } from 'hono';
import { isModelProvider, listAvailableModels, type ModelSelection } from '../models/providers.js';
import { notFoundError } from '../utils/errors.js';

export interface ModelRouteOptions {
  /** Environment consulted for provider API keys (default: process.env) */
  env?: Record<string, string | undefined>;
  /** Model the generator is configured to use when a request names none */
  defaultModel?: ModelSelection;
}

export function createModelRoutes(options: ModelRouteOptions = {}) {
  const models = new Hono();
  const env = options.env ?? process.env;
  const defaultModel = options.defaultModel
    ? { provider: options.defaultModel.provider, model_name: options.defaultModel.model }
    : null;

  /**
   * GET /models
   * Providers, their models, whether each provider's API key is configured,
   * and the configured default (null when the generator picks its own)
   */
  models.get('/', (c) => {
    return c.json({ providers: listAvailableModels(env), default: defaultModel });
  });

  models.get('/:provider', (c) => {
    const provider = c.req.param('provider');
    const name = provider.toLowerCase();
    if (!isModelProvider(name)) {
      return notFoundError(c, 'Provider', provider);
    }
    return c.json(listAvailableModels(env)[name]);
  });

  return models;
}
