import { resolveProviderModule } from './provider-map.js';
import type { ModelProvider } from '../providers/model/types.js';
import type { Config } from '../types.js';

export async function loadModelProvider(config: Config): Promise<ModelProvider> {
  const load = resolveProviderModule(config.provider);
  const mod = await load();

  if (typeof mod.create !== 'function') {
    throw new Error(`Model provider ${config.provider} does not export a create() function`);
  }

  return mod.create(config);
}
