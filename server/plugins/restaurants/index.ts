import { createRulePlugin, loadPluginData } from '../definition';
import type { Plugin } from '../types';

export const RESTAURANT_INTENTS = [
  'reservation',
  'menu',
  'prices',
  'hours',
  'location',
  'delivery',
  'complaint',
] as const;

export type RestaurantIntent = (typeof RESTAURANT_INTENTS)[number];

export function createRestaurantsPlugin(): Plugin<RestaurantIntent> {
  return createRulePlugin(
    RESTAURANT_INTENTS,
    loadPluginData(
      new URL('./rules.json', import.meta.url),
      new URL('./templates.json', import.meta.url),
    ),
  );
}
