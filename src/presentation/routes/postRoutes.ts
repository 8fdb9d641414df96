import { Router, Request, Response } from 'express';
import { Config } from '../../config';
import { IProductExtractor } from '../../domain/ports/IProductExtractor';
import { ICompletionClient } from '../../domain/ports/ICompletionClient';
import { IExportWriter } from '../../domain/ports/IExportWriter';
import { ALL_PLATFORMS, specFor } from '../../domain/entities/PlatformSpec';
import { SUPPORTED_LANGUAGES } from '../../domain/entities/Language';
import { ManualProductInput, createProductInfo } from '../../domain/entities/ProductInfo';
import { GeneratedPosts } from '../../domain/entities/GenerationResult';
import { PostGenerationOrchestrator, ProductSource } from '../../application/PostGenerationOrchestrator';
import {
    buildExportBundle,
    exportFileName,
    serializeExportBundle,
} from '../../infrastructure/export/JsonExportWriter';
import { asyncHandler, BadRequestError } from '../middleware/errorHandler';

export interface PostRouteDependencies {
    config: Config;
    extractor: IProductExtractor;
    /** Builds a completion client for the key supplied with the request */
    createCompletionClient: (apiKey: string) => ICompletionClient;
    exportWriter: IExportWriter;
}

function optionalString(body: Record<string, unknown>, field: string): string | undefined {
    const value = body[field];
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'string') {
        throw new BadRequestError(`${field} must be a string`);
    }
    return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseManualProduct(value: unknown): ManualProductInput | undefined {
    if (value === undefined || value === null) return undefined;
    if (!isRecord(value)) {
        throw new BadRequestError('productInfo must be an object');
    }
    return {
        url: optionalString(value, 'url'),
        title: optionalString(value, 'title'),
        description: optionalString(value, 'description'),
        price: optionalString(value, 'price'),
    };
}

function parsePlatforms(value: unknown, defaults: readonly string[]): string[] {
    if (value === undefined || value === null) return [...defaults];
    if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
        throw new BadRequestError('platforms must be an array of strings');
    }
    return value;
}

function parsePosts(value: unknown): GeneratedPosts {
    if (!isRecord(value)) {
        throw new BadRequestError('posts must be an object mapping platform to text');
    }
    const posts = new Map<string, string>();
    for (const [platform, text] of Object.entries(value)) {
        if (typeof text !== 'string') {
            throw new BadRequestError(`posts.${platform} must be a string`);
        }
        posts.set(platform, text);
    }
    return Object.fromEntries(posts);
}

/**
 * Creates the post generation routes.
 */
export function createPostRoutes(deps: PostRouteDependencies): Router {
    const { config } = deps;
    const router = Router();

    /**
     * GET /platforms
     *
     * Lists the platforms and languages a client can offer.
     */
    router.get('/platforms', (req: Request, res: Response) => {
        res.json({
            platforms: ALL_PLATFORMS.map((name) => ({ name, ...specFor(name) })),
            enabledPlatforms: config.enabledPlatforms,
            languages: SUPPORTED_LANGUAGES,
            defaultLanguage: config.defaultLanguage,
        });
    });

    /**
     * POST /posts/generate
     *
     * Scrapes the product (unless entered manually) and generates one post per platform.
     * The API key comes from the body, the x-api-key header, or the server configuration.
     */
    router.post(
        '/posts/generate',
        asyncHandler(async (req: Request, res: Response) => {
            const body: Record<string, unknown> = isRecord(req.body) ? req.body : {};

            const apiKey = optionalString(body, 'apiKey') || req.get('x-api-key') || config.llmApiKey;
            if (!apiKey) {
                throw new BadRequestError('API key is required');
            }

            const url = optionalString(body, 'url')?.trim();
            const product = parseManualProduct(body.productInfo);
            const language = optionalString(body, 'language') || config.defaultLanguage;
            const platforms = parsePlatforms(body.platforms, config.enabledPlatforms);

            if (url) {
                try {
                    new URL(url);
                } catch {
                    throw new BadRequestError('url must be a valid URL');
                }
            }

            const source: ProductSource = product ? { url, product } : { url: url ?? '' };
            const orchestrator = new PostGenerationOrchestrator({
                extractor: deps.extractor,
                completionClient: deps.createCompletionClient(apiKey),
                systemPrompt: config.systemPrompt,
            });

            const outcome = await orchestrator.generateAll(source, language, platforms);

            let savedTo: string | undefined;
            if (config.autoSave) {
                savedTo = await deps.exportWriter.write(
                    buildExportBundle(outcome),
                    exportFileName(outcome.productInfo.title)
                );
            }

            res.json(savedTo ? { ...outcome, savedTo } : outcome);
        })
    );

    /**
     * POST /posts/export
     *
     * Returns a generation as a downloadable JSON document.
     */
    router.post('/posts/export', (req: Request, res: Response) => {
        const body: Record<string, unknown> = isRecord(req.body) ? req.body : {};
        const product = parseManualProduct(body.productInfo);
        if (!product?.title) {
            throw new BadRequestError('productInfo.title is required');
        }

        const productInfo = createProductInfo({ ...product, url: product.url ?? '' });
        const bundle = buildExportBundle({
            productInfo,
            posts: parsePosts(body.posts),
            language: optionalString(body, 'language') || config.defaultLanguage,
        });

        res.attachment(exportFileName(productInfo.title));
        res.type('application/json').send(serializeExportBundle(bundle));
    });

    return router;
}
