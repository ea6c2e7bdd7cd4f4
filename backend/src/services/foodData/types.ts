export type FoodDataSource = 'openFoodFacts';

export interface NormalizedFoodItem {
    id: string;
    source: FoodDataSource;
    description: string;
    brand?: string;
    locale?: string;
    /** Missing when the upstream record has no usable energy value. */
    caloriesPer100g?: number;
}

export interface FoodSearchRequest {
    query: string;
    pageSize?: number;
    languageCode?: string;
}

export interface FoodSearchResult {
    items: NormalizedFoodItem[];
}

export interface FoodDataProvider {
    name: FoodDataSource;
    searchFoods(request: FoodSearchRequest): Promise<FoodSearchResult>;
}
