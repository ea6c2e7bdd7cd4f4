import { z } from 'zod';
import type { FoodDataProvider, FoodSearchRequest, FoodSearchResult, NormalizedFoodItem } from './types';
import { extractCaloriesPer100g, normalizeText, queryTokens } from './utils';

const productSchema = z.object({
    code: z.union([z.string(), z.number()]).optional(),
    product_name: z.string().optional(),
    brands: z.string().optional(),
    nutriments: z.record(z.unknown()).optional(),
    lc: z.string().optional()
});

type OpenFoodFactsProduct = z.infer<typeof productSchema>;

const searchResponseSchema = z.object({
    products: z.array(z.unknown()).optional()
});

export type OpenFoodFactsOptions = {
    baseUrl?: string;
    timeoutMs?: number;
    userAgent?: string;
};

class OpenFoodFactsProvider implements FoodDataProvider {
    public name = 'openFoodFacts' as const;
    private baseUrl: string;
    private requestTimeoutMs: number;
    private userAgent: string;
    private searchFields = 'product_name,brands,code,nutriments,lc';

    constructor(options: OpenFoodFactsOptions = {}) {
        this.baseUrl = options.baseUrl ?? 'https://world.openfoodfacts.org';
        this.requestTimeoutMs = options.timeoutMs ?? 8000;
        this.userAgent = options.userAgent ?? 'hydration-calorie-tracker/food-search';
    }

    /**
     * Search the v2 endpoint first and fall back to the legacy full-text search when v2 fails or
     * returns nothing that matches the query.
     */
    async searchFoods(request: FoodSearchRequest): Promise<FoodSearchResult> {
        const query = request.query.trim();
        if (!query) {
            return { items: [] };
        }
        const pageSize = Math.min(request.pageSize ?? 10, 50);

        let v2Items: NormalizedFoodItem[] = [];
        let v2Failure: string | null = null;
        try {
            const response = await this.fetchWithTimeout(this.buildV2Url(query, pageSize, request.languageCode));
            if (response.ok) {
                v2Items = this.filterItemsByQuery(await this.parseItems(response), query);
            } else {
                v2Failure = await this.describeSearchFailure('v2', response);
            }
        } catch (error) {
            v2Failure = await this.describeSearchFailure('v2', null, error);
        }

        if (v2Items.length > 0) {
            return { items: this.rankItems(v2Items, query, request.languageCode) };
        }

        const legacyResponse = await this.fetchWithTimeout(this.buildLegacyUrl(query, pageSize, request.languageCode));
        if (!legacyResponse.ok) {
            const legacyFailure = await this.describeSearchFailure('legacy', legacyResponse);
            throw new Error(`Open Food Facts search failed. ${[v2Failure, legacyFailure].filter(Boolean).join('; ')}`);
        }

        const legacyItems = this.filterItemsByQuery(await this.parseItems(legacyResponse), query);
        return { items: this.rankItems(legacyItems, query, request.languageCode) };
    }

    private async parseItems(response: Response): Promise<NormalizedFoodItem[]> {
        const parsed = searchResponseSchema.safeParse(await response.json());
        if (!parsed.success || !parsed.data.products) {
            return [];
        }

        return parsed.data.products
            .map((raw) => productSchema.safeParse(raw))
            .flatMap((result) => (result.success ? [this.normalizeProduct(result.data)] : []));
    }

    /**
     * Cap request time so one slow upstream call does not hold the user's queue.
     */
    private async fetchWithTimeout(url: string): Promise<Response> {
        const headers = { 'User-Agent': this.userAgent };
        if (!this.requestTimeoutMs) {
            return fetch(url, { headers });
        }

        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), this.requestTimeoutMs);
        try {
            return await fetch(url, { headers, signal: controller.signal });
        } finally {
            clearTimeout(timeoutId);
        }
    }

    private buildV2Url(query: string, pageSize: number, languageCode?: string): string {
        const params = new URLSearchParams({
            search_terms: query,
            page_size: String(pageSize),
            fields: this.searchFields,
            sort_by: 'unique_scans_n'
        });
        if (languageCode) {
            params.set('lc', languageCode);
        }
        return `${this.baseUrl}/api/v2/search?${params.toString()}`;
    }

    private buildLegacyUrl(query: string, pageSize: number, languageCode?: string): string {
        const params = new URLSearchParams({
            search_terms: query,
            search_simple: '1',
            json: '1',
            action: 'process',
            page_size: String(pageSize),
            fields: this.searchFields
        });
        if (languageCode) {
            params.set('lc', languageCode);
        }
        return `${this.baseUrl}/cgi/search.pl?${params.toString()}`;
    }

    private async describeSearchFailure(label: string, response: Response | null, error?: unknown): Promise<string> {
        if (response) {
            const message = await response.text();
            return `${label} ${response.status} ${message}`.trim();
        }
        if (error instanceof Error) {
            if (error.name === 'AbortError') {
                return `${label} request timed out after ${this.requestTimeoutMs}ms`;
            }
            return `${label} ${error.message}`;
        }
        return `${label} request failed`;
    }

    private normalizeProduct(product: OpenFoodFactsProduct): NormalizedFoodItem {
        const code = product.code !== undefined ? String(product.code) : undefined;
        return {
            id: code || product.product_name || 'openfoodfacts-item',
            source: 'openFoodFacts',
            description: product.product_name || 'Unknown food',
            brand: product.brands,
            locale: product.lc,
            caloriesPer100g: extractCaloriesPer100g(product.nutriments ?? {})
        };
    }

    /**
     * Remove items that do not include any query tokens in name or brand.
     */
    private filterItemsByQuery(items: NormalizedFoodItem[], query: string): NormalizedFoodItem[] {
        const tokens = queryTokens(query);
        if (tokens.length === 0) {
            return items;
        }

        return items.filter((item) => {
            const haystack = `${normalizeText(item.description)} ${normalizeText(item.brand)}`.trim();
            return tokens.some((token) => haystack.includes(token));
        });
    }

    /**
     * Name matches first, then items with known calories, then upstream order.
     */
    private rankItems(items: NormalizedFoodItem[], query: string, languageCode?: string): NormalizedFoodItem[] {
        const normalizedQuery = normalizeText(query);
        const tokens = queryTokens(query);

        const scored = items.map((item, index) => {
            const description = normalizeText(item.description);
            let score = 0;

            if (description === normalizedQuery) {
                score += 120;
            } else if (description.startsWith(normalizedQuery)) {
                score += 100;
            } else if (description.includes(normalizedQuery)) {
                score += 80;
            }

            const tokenMatches = tokens.filter((token) => description.includes(token)).length;
            if (tokens.length > 0 && tokenMatches === tokens.length) {
                score += 45;
            } else if (tokenMatches > 0) {
                score += 15;
            }

            if (languageCode && item.locale === languageCode) {
                score += 10;
            }
            if (item.caloriesPer100g !== undefined) {
                score += 5;
            }
            return { item, score, index };
        });

        scored.sort((a, b) => b.score - a.score || a.index - b.index);
        return scored.map(({ item }) => item);
    }
}

export default OpenFoodFactsProvider;
