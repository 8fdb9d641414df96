#!/usr/bin/env node
import { Command } from 'commander';
import * as readline from 'readline/promises';
import { loadConfig, validateConfig, Config } from './config';
import { ProductPageScraper } from './infrastructure/scraper/ProductPageScraper';
import { ChatCompletionClient } from './infrastructure/llm/ChatCompletionClient';
import {
    JsonExportWriter,
    buildExportBundle,
    exportFileName,
} from './infrastructure/export/JsonExportWriter';
import { PostGenerationOrchestrator, ProductSource } from './application/PostGenerationOrchestrator';
import { IExportWriter } from './domain/ports/IExportWriter';
import { GenerationSession } from './application/GenerationSession';
import { PreconditionError } from './application/PreconditionError';
import { SUPPORTED_LANGUAGES } from './domain/entities/Language';

const RULE = '='.repeat(60);

export interface CliOptions {
    url?: string;
    language?: string;
    platforms?: string;
    title?: string;
    description?: string;
    price?: string;
    save?: boolean;
    output?: string;
}

/**
 * Splits a comma-separated platform list, falling back to the configured set.
 */
export function parsePlatformList(value: string | undefined, defaults: readonly string[]): string[] {
    if (!value) return [...defaults];
    return value
        .split(',')
        .map((item) => item.trim().toLowerCase())
        .filter((item) => item.length > 0);
}

/**
 * Line-based question/answer channel; readline in production.
 */
export interface Prompter {
    ask(question: string): Promise<string>;
    close(): void;
}

export interface CliDependencies {
    prompter: Prompter;
    createOrchestrator: (apiKey: string) => PostGenerationOrchestrator;
    createExportWriter: (outputDirectory: string) => IExportWriter;
}

function createReadlinePrompter(): Prompter {
    const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
    return {
        ask: async (question) => (await rl.question(question)).trim(),
        close: () => rl.close(),
    };
}

function createOrchestratorFor(config: Config): (apiKey: string) => PostGenerationOrchestrator {
    return (apiKey) => new PostGenerationOrchestrator({
        extractor: new ProductPageScraper({ timeout: config.requestTimeoutMs, userAgent: config.userAgent }),
        completionClient: new ChatCompletionClient(apiKey, {
            model: config.llmModel,
            baseUrl: config.llmBaseUrl,
            temperature: config.llmTemperature,
            maxTokens: config.llmMaxTokens,
            timeout: config.llmTimeoutMs,
        }),
        systemPrompt: config.systemPrompt,
    });
}

/**
 * Interactive flow: key, URL and language prompts, generation, optional save.
 */
export async function run(
    options: CliOptions,
    config: Config,
    overrides: Partial<CliDependencies> = {}
): Promise<void> {
    const prompter = overrides.prompter ?? createReadlinePrompter();
    const createOrchestrator = overrides.createOrchestrator ?? createOrchestratorFor(config);
    const createExportWriter = overrides.createExportWriter
        ?? ((outputDirectory: string) => new JsonExportWriter(outputDirectory));

    try {
        console.log(RULE);
        console.log('🚀 Social Media Posts Generator');
        console.log(RULE);

        const apiKey = config.llmApiKey || await prompter.ask('🔑 Enter your Groq API key: ');
        if (!apiKey) {
            console.error('❌ Please provide a valid API key');
            process.exitCode = 1;
            return;
        }

        const manual = options.title !== undefined;
        const url = options.url ?? (manual ? '' : await prompter.ask('\n🔗 Enter product URL: '));
        if (!manual && !url) {
            console.error('❌ Please provide a valid URL');
            process.exitCode = 1;
            return;
        }

        const language = options.language
            ?? (await prompter.ask(`\n🌍 Language (${SUPPORTED_LANGUAGES.join('/')}) [default: ${config.defaultLanguage}]: `)
                || config.defaultLanguage);

        const session = new GenerationSession(
            parsePlatformList(options.platforms, config.enabledPlatforms),
            language
        );

        const orchestrator = createOrchestrator(apiKey);

        const source: ProductSource = manual
            ? { url, product: { url, title: options.title, description: options.description, price: options.price } }
            : { url };

        console.log(`\n${RULE}`);
        console.log(manual ? '📝 Using manually entered product...' : '🔍 Extracting product information...');

        const outcome = await orchestrator.generateAll(source, session.language, session.selectedPlatforms, {
            session,
            onPost: (platform, post) => {
                console.log(`\n${RULE}`);
                console.log(`📌 ${platform.toUpperCase()}`);
                console.log(RULE);
                console.log(post);
            },
        });

        console.log(`\n✅ Product: ${outcome.productInfo.title}`);

        const save = options.save || config.autoSave
            || (await prompter.ask('\n💾 Save results to JSON file? (y/n): ')).toLowerCase() === 'y';

        if (save && session.lastGeneration) {
            const writer = createExportWriter(options.output ?? config.outputDirectory);
            const filePath = await writer.write(
                buildExportBundle(session.lastGeneration),
                exportFileName(session.lastGeneration.productInfo.title)
            );
            console.log(`✅ Saved to: ${filePath}`);
        }

        console.log('\n🎉 Done!');
    } catch (error) {
        if (error instanceof PreconditionError) {
            console.error(`❌ ${error.message}`);
            process.exitCode = 1;
            return;
        }
        throw error;
    } finally {
        prompter.close();
    }
}

export function createProgram(config: Config, overrides: Partial<CliDependencies> = {}): Command {
    const program = new Command();

    program
        .name('social-post-generator')
        .description('Generate platform-tailored social media posts from a product page')
        .version('1.0.0')
        .option('-u, --url <url>', 'Product page URL')
        .option('-l, --language <code>', `Output language (${SUPPORTED_LANGUAGES.join(', ')})`)
        .option('-p, --platforms <list>', 'Comma-separated platforms', config.enabledPlatforms.join(','))
        .option('--title <title>', 'Enter the product manually instead of scraping')
        .option('--description <text>', 'Manual product description')
        .option('--price <price>', 'Manual product price')
        .option('-s, --save', 'Save results to JSON without asking')
        .option('-o, --output <dir>', 'Output directory for saved results')
        .action(async (options: CliOptions) => {
            await run(options, config, overrides);
        });

    return program;
}

if (require.main === module) {
    const config = loadConfig();
    const configErrors = validateConfig(config);
    if (configErrors.length > 0) {
        configErrors.forEach((error) => console.error(`❌ ${error}`));
        process.exit(1);
    }

    createProgram(config)
        .parseAsync(process.argv)
        .catch((error) => {
            console.error('💥 Fatal error:', error);
            process.exit(1);
        });
}
