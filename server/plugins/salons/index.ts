import { createRulePlugin, loadPluginData } from '../definition';
import type { Plugin } from '../types';

export const SALON_INTENTS = [
  'booking',
  'prices',
  'location',
  'hours',
  'services',
  'reschedule',
  'cancellation',
  'complaint',
  'confirmation',
  'upsell',
] as const;

export type SalonIntent = (typeof SALON_INTENTS)[number];

export function createSalonsPlugin(): Plugin<SalonIntent> {
  return createRulePlugin(
    SALON_INTENTS,
    loadPluginData(
      new URL('./rules.json', import.meta.url),
      new URL('./templates.json', import.meta.url),
    ),
  );
}
