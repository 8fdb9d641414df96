import axios from 'axios';
import * as cheerio from 'cheerio';
import { IProductExtractor } from '../../domain/ports/IProductExtractor';
import {
    ProductInfo,
    createProductInfo,
    createFallbackProductInfo,
} from '../../domain/entities/ProductInfo';
import { DEFAULT_USER_AGENT } from '../../config';

type FieldSelector =
    | { kind: 'meta'; selector: string }
    | { kind: 'text'; selector: string };

const TITLE_SELECTORS: readonly FieldSelector[] = [
    { kind: 'text', selector: 'h1' },
    { kind: 'meta', selector: 'meta[property="og:title"]' },
    { kind: 'text', selector: 'title' },
];

const DESCRIPTION_SELECTORS: readonly FieldSelector[] = [
    { kind: 'meta', selector: 'meta[property="og:description"]' },
    { kind: 'meta', selector: 'meta[name="description"]' },
    { kind: 'text', selector: '.description' },
    { kind: 'text', selector: '.product-description' },
];

/** Checked in order; the first pattern with a match wins. */
const PRICE_PATTERNS: readonly RegExp[] = [
    /R\$\s*[\d,.]+/,
    /\$\s*[\d,.]+/,
    /USD\s*[\d,.]+/,
    /EUR\s*[\d,.]+/,
];

/**
 * Product page scraper using axios + cheerio.
 * Any fetch or parse failure yields the placeholder product instead of an error.
 */
export class ProductPageScraper implements IProductExtractor {
    private readonly timeout: number;
    private readonly userAgent: string;

    constructor(options?: { timeout?: number; userAgent?: string }) {
        this.timeout = options?.timeout ?? 10000;
        this.userAgent = options?.userAgent ?? DEFAULT_USER_AGENT;
    }

    async extract(url: string): Promise<ProductInfo> {
        try {
            const response = await axios.get<string>(url, {
                headers: { 'User-Agent': this.userAgent },
                timeout: this.timeout,
                responseType: 'text',
            });

            if (typeof response.data !== 'string') {
                throw new Error('Response body is not HTML text');
            }

            return parseProductHtml(response.data, url);
        } catch (error) {
            console.warn(`[ProductScraper] Extraction failed for ${url}, using placeholder: ${describeError(error)}`);
            return createFallbackProductInfo(url);
        }
    }
}

/**
 * Pulls title, description and price out of a product page.
 */
export function parseProductHtml(html: string, url: string): ProductInfo {
    const $ = cheerio.load(html);

    return createProductInfo({
        url,
        title: selectFirst($, TITLE_SELECTORS),
        description: selectFirst($, DESCRIPTION_SELECTORS),
        price: extractPrice($.root().text()),
    });
}

/**
 * Returns the verbatim text of the first currency pattern that matches.
 */
export function extractPrice(pageText: string): string {
    for (const pattern of PRICE_PATTERNS) {
        const match = pattern.exec(pageText);
        if (match) {
            return match[0];
        }
    }
    return '';
}

function selectFirst($: cheerio.CheerioAPI, selectors: readonly FieldSelector[]): string {
    for (const { kind, selector } of selectors) {
        const element = $(selector).first();
        if (element.length === 0) continue;

        const value = kind === 'meta'
            ? (element.attr('content') ?? '').trim()
            : element.text().replace(/\s+/g, ' ').trim();

        if (value) {
            return value;
        }
    }
    return '';
}

function describeError(error: unknown): string {
    if (axios.isAxiosError(error)) {
        if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') return 'request timed out';
        if (error.response) return `HTTP ${error.response.status}`;
        return error.message;
    }
    return error instanceof Error ? error.message : String(error);
}
