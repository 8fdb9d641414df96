import dotenv from 'dotenv';
import { ALL_PLATFORMS, isKnownPlatform, normalizePlatformName } from '../domain/entities/PlatformSpec';
import { isSupportedLanguage } from '../domain/entities/Language';
import { DEFAULT_SYSTEM_PROMPT } from '../domain/services/PromptBuilder';

// Load environment variables
dotenv.config();

/**
 * Application configuration loaded from environment variables.
 */
export interface Config {
    // Server
    port: number;
    environment: string;

    // Chat completion (OpenAI-compatible endpoint)
    llmApiKey: string; // May be empty: callers can pass their own key
    llmModel: string;
    llmBaseUrl: string;
    llmTemperature: number;
    llmMaxTokens: number;
    llmTimeoutMs: number;
    systemPrompt: string;

    // Product page scraping
    requestTimeoutMs: number;
    userAgent: string;

    // Generation
    defaultLanguage: string;
    enabledPlatforms: string[];

    // Export
    outputDirectory: string;
    autoSave: boolean;
}

export const DEFAULT_USER_AGENT = 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36';

function getEnvVar(key: string, defaultValue?: string): string {
    let value = process.env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new Error(`Missing required environment variable: ${key}`);
    }

    value = value.trim();
    if (value.startsWith('"') && value.endsWith('"')) {
        value = value.substring(1, value.length - 1);
    } else if (value.startsWith("'") && value.endsWith("'")) {
        value = value.substring(1, value.length - 1);
    }

    return value;
}

function getEnvVarNumber(key: string, defaultValue?: number): number {
    const value = getEnvVar(key, defaultValue?.toString());
    const parsed = parseFloat(value);
    if (isNaN(parsed)) {
        throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
    }
    return parsed;
}

function getEnvVarBoolean(key: string, defaultValue?: boolean): boolean {
    const value = process.env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new Error(`Missing required environment variable: ${key}`);
    }
    return value.trim().toLowerCase() === 'true';
}

function getEnvVarList(key: string, defaultValue: readonly string[]): string[] {
    const value = getEnvVar(key, defaultValue.join(','));
    return value
        .split(',')
        .map(normalizePlatformName)
        .filter((item) => item.length > 0);
}

/**
 * Loads configuration from environment variables.
 */
export function loadConfig(): Config {
    return {
        // Server
        port: getEnvVarNumber('PORT', 3000),
        environment: getEnvVar('NODE_ENV', 'development'),

        // Chat completion
        llmApiKey: getEnvVar('GROQ_API_KEY', ''),
        llmModel: getEnvVar('GROQ_MODEL', 'llama-3.3-70b-versatile'),
        llmBaseUrl: getEnvVar('GROQ_BASE_URL', 'https://api.groq.com/openai'),
        llmTemperature: getEnvVarNumber('GROQ_TEMPERATURE', 0.8),
        llmMaxTokens: getEnvVarNumber('GROQ_MAX_TOKENS', 1500),
        llmTimeoutMs: getEnvVarNumber('GROQ_TIMEOUT_MS', 60000),
        systemPrompt: getEnvVar('SYSTEM_PROMPT', DEFAULT_SYSTEM_PROMPT),

        // Product page scraping
        requestTimeoutMs: getEnvVarNumber('REQUEST_TIMEOUT_MS', 10000),
        userAgent: getEnvVar('SCRAPER_USER_AGENT', DEFAULT_USER_AGENT),

        // Generation
        defaultLanguage: getEnvVar('DEFAULT_LANGUAGE', 'en'),
        enabledPlatforms: getEnvVarList('ENABLED_PLATFORMS', ALL_PLATFORMS),

        // Export
        outputDirectory: getEnvVar('OUTPUT_DIRECTORY', 'outputs'),
        autoSave: getEnvVarBoolean('AUTO_SAVE', false),
    };
}

/**
 * Validates configuration values that would otherwise fail later at generation time.
 * The API key is not checked here: it can also be supplied per request.
 */
export function validateConfig(config: Config): string[] {
    const errors: string[] = [];

    if (!isSupportedLanguage(config.defaultLanguage)) {
        errors.push(`DEFAULT_LANGUAGE "${config.defaultLanguage}" is not supported`);
    }
    if (config.enabledPlatforms.length === 0) {
        errors.push('ENABLED_PLATFORMS must name at least one platform');
    }
    for (const platform of config.enabledPlatforms) {
        if (!isKnownPlatform(platform)) {
            errors.push(`ENABLED_PLATFORMS contains unknown platform "${platform}"`);
        }
    }
    if (config.llmTemperature < 0 || config.llmTemperature > 2) {
        errors.push('GROQ_TEMPERATURE must be between 0 and 2');
    }
    if (config.llmMaxTokens <= 0) {
        errors.push('GROQ_MAX_TOKENS must be positive');
    }
    if (config.llmTimeoutMs <= 0) {
        errors.push('GROQ_TIMEOUT_MS must be positive');
    }
    if (config.requestTimeoutMs <= 0) {
        errors.push('REQUEST_TIMEOUT_MS must be positive');
    }

    return errors;
}

// Singleton config instance (lazy loaded)
let cachedConfig: Config | null = null;

export function getConfig(): Config {
    if (!cachedConfig) {
        cachedConfig = loadConfig();
    }
    return cachedConfig;
}

export function resetConfig(): void {
    cachedConfig = null;
}
