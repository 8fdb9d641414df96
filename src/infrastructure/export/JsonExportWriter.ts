import fs from 'fs/promises';
import path from 'path';
import { IExportWriter } from '../../domain/ports/IExportWriter';
import { ExportBundle } from '../../domain/entities/ExportBundle';
import { GenerationOutcome } from '../../domain/entities/GenerationResult';

const FILE_PREFIX = 'social_posts_';
const MAX_TITLE_CHARS = 30;

/**
 * Writes export bundles as indented UTF-8 JSON into an output directory.
 */
export class JsonExportWriter implements IExportWriter {
    constructor(private readonly outputDirectory: string) { }

    async write(bundle: ExportBundle, fileName: string): Promise<string> {
        await fs.mkdir(this.outputDirectory, { recursive: true });

        const filePath = path.join(this.outputDirectory, path.basename(fileName));
        await fs.writeFile(filePath, serializeExportBundle(bundle), 'utf-8');

        console.log(`[Export] Saved posts to ${filePath}`);
        return filePath;
    }
}

export function buildExportBundle(
    outcome: Pick<GenerationOutcome, 'productInfo' | 'posts' | 'language'>,
    now: Date = new Date()
): ExportBundle {
    return {
        product_info: outcome.productInfo,
        posts: outcome.posts,
        language: outcome.language,
        generated_at: now.toISOString(),
    };
}

/**
 * Two-space indented JSON; non-ASCII characters are written as-is.
 */
export function serializeExportBundle(bundle: ExportBundle): string {
    return JSON.stringify(bundle, null, 2);
}

/**
 * Derives the export file name from the product title, or from the time when
 * nothing usable is left of the title.
 */
export function exportFileName(title: string, now: Date = new Date()): string {
    const slug = title
        .slice(0, MAX_TITLE_CHARS)
        .replace(/ /g, '_')
        .replace(/[^\p{L}\p{N}_-]/gu, '');

    return /[\p{L}\p{N}]/u.test(slug) ? `${FILE_PREFIX}${slug}.json` : `${FILE_PREFIX}${formatTimestamp(now)}.json`;
}

function formatTimestamp(date: Date): string {
    const pad = (value: number) => value.toString().padStart(2, '0');
    return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`
        + `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}
