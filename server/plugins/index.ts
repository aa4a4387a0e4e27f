import { ValidationError } from '../errors';
import { PluginRegistry } from './registry';
import { createRestaurantsPlugin } from './restaurants';
import { createSalonsPlugin } from './salons';
import type { Plugin } from './types';

export const BUILTIN_PLUGINS: ReadonlyMap<string, () => Plugin> = new Map<
  string,
  () => Plugin
>([
  ['salons', createSalonsPlugin],
  ['restaurants', createRestaurantsPlugin],
]);

export function createDefaultRegistry(names: string[]): PluginRegistry {
  const unknown = names.filter((name) => !BUILTIN_PLUGINS.has(name));
  if (unknown.length) {
    throw new ValidationError(`Unknown plugins: ${unknown.join(', ')}`, [
      `available: ${[...BUILTIN_PLUGINS.keys()].join(', ')}`,
    ]);
  }
  const registry = new PluginRegistry();
  for (const name of names) {
    const factory = BUILTIN_PLUGINS.get(name);
    if (factory) {
      registry.register(factory());
    }
  }
  return registry;
}

export { PluginRegistry } from './registry';
export type { Plugin, IntentResult, Entities, RouteResult } from './types';
