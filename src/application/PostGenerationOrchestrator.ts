/**
 * Post Generation Orchestrator
 *
 * Extracts the product once, then generates one post per requested platform,
 * sequentially and in request order. A failed platform still gets an entry.
 */

import { IProductExtractor } from '../domain/ports/IProductExtractor';
import { ICompletionClient } from '../domain/ports/ICompletionClient';
import {
    ProductInfo,
    ManualProductInput,
    createProductInfo,
} from '../domain/entities/ProductInfo';
import { specFor, normalizePlatformName } from '../domain/entities/PlatformSpec';
import {
    GenerationOutcome,
    PostStatus,
    toPostText,
} from '../domain/entities/GenerationResult';
import { buildPrompt, DEFAULT_SYSTEM_PROMPT } from '../domain/services/PromptBuilder';
import { PreconditionError } from './PreconditionError';
import { GenerationSession } from './GenerationSession';

export interface OrchestratorDependencies {
    extractor: IProductExtractor;
    completionClient: ICompletionClient;
    systemPrompt?: string;
}

/**
 * Where the product comes from: a URL to scrape, or a manual entry that
 * skips scraping entirely.
 */
export type ProductSource =
    | { url: string; product?: undefined }
    | { url?: string; product: ManualProductInput };

export interface GenerateOptions {
    session?: GenerationSession;
    /** Called after each platform finishes, in request order */
    onPost?: (platform: string, post: string, status: PostStatus) => void;
}

export class PostGenerationOrchestrator {
    private readonly extractor: IProductExtractor;
    private readonly completionClient: ICompletionClient;
    private readonly systemPrompt: string;

    constructor(deps: OrchestratorDependencies) {
        this.extractor = deps.extractor;
        this.completionClient = deps.completionClient;
        this.systemPrompt = deps.systemPrompt ?? DEFAULT_SYSTEM_PROMPT;
    }

    async generateAll(
        source: ProductSource,
        languageCode: string,
        platforms: readonly string[],
        options: GenerateOptions = {}
    ): Promise<GenerationOutcome> {
        const requested = this.checkPreconditions(source, platforms);

        const productInfo = await this.resolveProduct(source);
        console.log(`[Orchestrator] Generating ${requested.length} post(s) for "${productInfo.title}" (${languageCode})`);

        // Maps keep names such as "__proto__" as ordinary keys
        const posts = new Map<string, string>();
        const statuses = new Map<string, PostStatus>();

        for (const platform of requested) {
            const prompt = buildPrompt(productInfo, specFor(platform), languageCode, platform);
            const result = await this.completionClient.completeWithResult(prompt, this.systemPrompt);
            const status: PostStatus = result.ok ? 'generated' : 'failed';
            const text = toPostText(result);

            posts.set(platform, text);
            statuses.set(platform, status);
            options.onPost?.(platform, text, status);
        }

        const failed = [...statuses.values()].filter((status) => status === 'failed').length;
        if (failed > 0) {
            console.warn(`[Orchestrator] ${failed}/${requested.length} platform(s) returned an error instead of a post`);
        }

        const outcome: GenerationOutcome = {
            productInfo,
            posts: Object.fromEntries(posts),
            statuses: Object.fromEntries(statuses),
            language: languageCode,
        };
        options.session?.recordOutcome(outcome);
        return outcome;
    }

    private checkPreconditions(source: ProductSource, platforms: readonly string[]): string[] {
        if (source.product) {
            if (!source.product.title?.trim()) {
                throw new PreconditionError('Product title is required when entering product details manually');
            }
        } else if (!source.url?.trim()) {
            throw new PreconditionError('Product URL is required');
        }

        const requested = platforms.map(normalizePlatformName).filter((name) => name.length > 0);
        if (requested.length === 0) {
            throw new PreconditionError('Select at least one platform');
        }
        return requested;
    }

    private async resolveProduct(source: ProductSource): Promise<ProductInfo> {
        if (source.product) {
            const { title, description, price } = source.product;
            return createProductInfo({
                url: source.product.url ?? source.url ?? '',
                title: title?.trim(),
                description,
                price,
            });
        }
        return this.extractor.extract((source.url ?? '').trim());
    }
}
