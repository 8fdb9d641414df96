import { ProductInfo } from './ProductInfo';

/**
 * Outcome of a single completion call.
 * Only the completion client and the orchestrator see this shape; callers of
 * the orchestrator receive plain strings for both cases.
 */
export type CompletionResult =
    | { ok: true; text: string }
    | { ok: false; error: string };

export type PostStatus = 'generated' | 'failed';

/** Post text keyed by lower-cased platform name, in request order */
export type GeneratedPosts = Record<string, string>;

export interface GenerationOutcome {
    /** Product actually used (scraped or manually supplied) */
    productInfo: ProductInfo;
    /** Post body per platform; failed platforms hold the error text */
    posts: GeneratedPosts;
    /** Whether each entry in `posts` is generated copy or an error message */
    statuses: Record<string, PostStatus>;
    language: string;
}

export const POST_ERROR_PREFIX = 'Error generating post: ';

/**
 * Collapses a completion result into the text handed to callers.
 */
export function toPostText(result: CompletionResult): string {
    return result.ok ? result.text : `${POST_ERROR_PREFIX}${result.error}`;
}
