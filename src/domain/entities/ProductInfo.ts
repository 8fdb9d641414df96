/**
 * ProductInfo Entity
 *
 * Descriptive record for one product page, either scraped or supplied
 * manually. Consumed by the prompt builder; never mutated after creation.
 */

export const FALLBACK_PRODUCT_TITLE = 'Hotmart Product';

export interface ProductInfo {
    /** Page the product was read from */
    readonly url: string;
    readonly title: string;
    readonly description: string;
    /** Raw matched price text, e.g. "R$ 197,00" (no currency normalization) */
    readonly price: string;
    /** Always empty: no extraction logic exists for benefits yet */
    readonly benefits: readonly string[];
}

/**
 * Fields accepted when a product is entered by hand instead of scraped.
 */
export interface ManualProductInput {
    url?: string;
    title?: string;
    description?: string;
    price?: string;
}

export function createProductInfo(fields: {
    url: string;
    title?: string;
    description?: string;
    price?: string;
}): ProductInfo {
    return Object.freeze({
        url: fields.url,
        title: fields.title ?? '',
        description: fields.description ?? '',
        price: fields.price ?? '',
        benefits: Object.freeze([]),
    });
}

/**
 * Placeholder used whenever a page cannot be fetched or parsed.
 */
export function createFallbackProductInfo(url: string): ProductInfo {
    return createProductInfo({ url, title: FALLBACK_PRODUCT_TITLE });
}
