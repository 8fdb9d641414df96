import { ProductInfo } from './ProductInfo';
import { GeneratedPosts } from './GenerationResult';

/**
 * JSON document written when the user asks to save a generation.
 * Keys are snake_case to match the on-disk format.
 */
export interface ExportBundle {
    product_info: ProductInfo;
    posts: GeneratedPosts;
    language: string;
    generated_at?: string;
}
