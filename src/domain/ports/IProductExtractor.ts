import { ProductInfo } from '../entities/ProductInfo';

/**
 * Port for reading product metadata from a product page.
 */
export interface IProductExtractor {
    /**
     * Fetches and parses a product page.
     * Resolves to a placeholder product when the page cannot be read; never rejects.
     */
    extract(url: string): Promise<ProductInfo>;
}
