import type { TrackerConfig } from '../../config';
import type { FoodLookup } from '../../tracker/lookups';
import { ProviderFoodLookup } from './foodLookup';
import OpenFoodFactsProvider from './openFoodFactsProvider';

export const createFoodLookup = (config: Pick<TrackerConfig, 'foodTimeoutMs' | 'foodLanguageCode'>): FoodLookup =>
    new ProviderFoodLookup(new OpenFoodFactsProvider({ timeoutMs: config.foodTimeoutMs }), config.foodLanguageCode);

export * from './types';
