/**
 * Static allowlist of all valid model provider modules.
 *
 * This is the ONLY place that maps provider names to modules. Adding a new
 * provider requires adding a line here. No dynamic path construction from
 * config values is permitted anywhere in the codebase.
 *
 * The keys are the `provider:` values accepted in fmgw.yaml.
 */

import type { ProviderModule } from '../providers/model/types.js';

export const MODEL_PROVIDER_NAMES = ['apple', 'openai', 'mock'] as const;

/** Valid names for the `provider:` config key. */
export type ModelProviderName = typeof MODEL_PROVIDER_NAMES[number];

const _PROVIDER_MAP: Record<ModelProviderName, () => Promise<ProviderModule>> = {
  apple:  () => import('../providers/model/apple.js'),
  openai: () => import('../providers/model/openai.js'),
  mock:   () => import('../providers/model/mock.js'),
};

export function isModelProviderName(name: string): name is ModelProviderName {
  return MODEL_PROVIDER_NAMES.some(n => n === name);
}

/**
 * Returns the module loader for a provider name.
 * Throws if the name is not in the allowlist.
 */
export function resolveProviderModule(name: string): () => Promise<ProviderModule> {
  if (!isModelProviderName(name)) {
    throw new Error(
      `Unknown model provider: "${name}". ` +
      `Valid model providers: ${MODEL_PROVIDER_NAMES.join(', ')}`,
    );
  }
  return _PROVIDER_MAP[name];
}
