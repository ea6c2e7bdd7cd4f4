import type { FoodLookup, FoodMatch } from '../../tracker/lookups';
import type { FoodDataProvider, NormalizedFoodItem } from './types';

type ItemWithCalories = NormalizedFoodItem & { caloriesPer100g: number };

const hasCalories = (item: NormalizedFoodItem): item is ItemWithCalories => item.caloriesPer100g !== undefined;

/**
 * Adapts a food data provider to the tracker's lookup contract: the best-ranked item that
 * reports energy wins.
 */
export class ProviderFoodLookup implements FoodLookup {
    constructor(
        private readonly provider: FoodDataProvider,
        private readonly languageCode?: string
    ) {}

    async findFood(description: string): Promise<FoodMatch | null> {
        const { items } = await this.provider.searchFoods({
            query: description,
            pageSize: 10,
            languageCode: this.languageCode
        });

        const best = items.find(hasCalories);
        return best ? { name: best.description, kcal_per_100g: best.caloriesPer100g } : null;
    }
}
