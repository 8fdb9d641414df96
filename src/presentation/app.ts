import express, { Application, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import { Config } from '../config';
import { ProductPageScraper } from '../infrastructure/scraper/ProductPageScraper';
import { ChatCompletionClient } from '../infrastructure/llm/ChatCompletionClient';
import { JsonExportWriter } from '../infrastructure/export/JsonExportWriter';
import { createPostRoutes, PostRouteDependencies } from './routes/postRoutes';
import { errorHandler, NotFoundError } from './middleware/errorHandler';

/**
 * Creates and configures the Express application.
 * Dependencies can be overridden, which the route tests use to stub HTTP calls.
 */
export function createApp(config: Config, overrides: Partial<PostRouteDependencies> = {}): Application {
    const app = express();

    app.use(cors());
    app.use(express.json());

    app.get('/health', (req: Request, res: Response) => {
        res.json({
            status: 'ok',
            timestamp: new Date().toISOString(),
            version: '1.0.0',
        });
    });

    app.use('/api', createPostRoutes({ ...createDependencies(config), ...overrides }));

    app.use((req: Request, res: Response, next: NextFunction) => {
        next(new NotFoundError(`No route for ${req.method} ${req.path}`));
    });

    // Error handler (must be last)
    app.use(errorHandler);

    return app;
}

/**
 * Wires the production adapters from configuration.
 */
export function createDependencies(config: Config): PostRouteDependencies {
    return {
        config,
        extractor: new ProductPageScraper({
            timeout: config.requestTimeoutMs,
            userAgent: config.userAgent,
        }),
        createCompletionClient: (apiKey: string) => new ChatCompletionClient(apiKey, {
            model: config.llmModel,
            baseUrl: config.llmBaseUrl,
            temperature: config.llmTemperature,
            maxTokens: config.llmMaxTokens,
            timeout: config.llmTimeoutMs,
        }),
        exportWriter: new JsonExportWriter(config.outputDirectory),
    };
}
