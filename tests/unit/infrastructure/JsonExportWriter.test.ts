import fs from 'fs';
import os from 'os';
import path from 'path';
import {
    JsonExportWriter,
    buildExportBundle,
    exportFileName,
    serializeExportBundle,
} from '../../../src/infrastructure/export/JsonExportWriter';
import { createProductInfo } from '../../../src/domain/entities/ProductInfo';

describe('JsonExportWriter', () => {
    const productInfo = createProductInfo({
        url: 'https://shop.example.com/p',
        title: 'Promoção de Verão',
        price: 'R$ 97,00',
    });
    const outcome = {
        productInfo,
        posts: { twitter: 'Não perca! ☀️', linkedin: 'Professional copy' },
        language: 'pt',
    };

    let tempDir: string;

    beforeEach(() => {
        tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'posts-export-'));
        jest.spyOn(console, 'log').mockImplementation(() => { });
    });

    afterEach(() => {
        fs.rmSync(tempDir, { recursive: true, force: true });
        jest.restoreAllMocks();
    });

    describe('buildExportBundle()', () => {
        it('should use snake_case keys and an ISO timestamp', () => {
            const bundle = buildExportBundle(outcome, new Date('2024-03-01T12:00:00.000Z'));

            expect(Object.keys(bundle)).toEqual(['product_info', 'posts', 'language', 'generated_at']);
            expect(bundle.generated_at).toBe('2024-03-01T12:00:00.000Z');
            expect(bundle.product_info.title).toBe('Promoção de Verão');
        });
    });

    describe('serializeExportBundle()', () => {
        it('should indent with two spaces and keep non-ASCII characters', () => {
            const json = serializeExportBundle(buildExportBundle(outcome, new Date(0)));

            expect(json).toContain('\n  "language": "pt"');
            expect(json).toContain('"title": "Promoção de Verão"');
            expect(json).toContain('"twitter": "Não perca! ☀️"');
            expect(json).not.toContain('\\u');
        });
    });

    describe('exportFileName()', () => {
        it('should truncate the title to 30 characters and replace spaces', () => {
            expect(exportFileName('Curso de Marketing Digital Completo 2024'))
                .toBe('social_posts_Curso_de_Marketing_Digital_Com.json');
        });

        it('should strip non-word characters but keep accented letters', () => {
            expect(exportFileName('Café & Bolo!')).toBe('social_posts_Café__Bolo.json');
        });

        it('should fall back to a timestamp when nothing of the title remains', () => {
            const now = new Date(2024, 0, 5, 9, 3, 7);
            expect(exportFileName('!!! ???', now)).toBe('social_posts_20240105_090307.json');
            expect(exportFileName('', now)).toBe('social_posts_20240105_090307.json');
        });
    });

    describe('write()', () => {
        it('should create the output directory and write UTF-8 JSON', async () => {
            const outputDir = path.join(tempDir, 'nested', 'outputs');
            const writer = new JsonExportWriter(outputDir);
            const bundle = buildExportBundle(outcome, new Date('2024-03-01T12:00:00.000Z'));

            const filePath = await writer.write(bundle, 'social_posts_Promo.json');

            expect(filePath).toBe(path.join(outputDir, 'social_posts_Promo.json'));
            const written = fs.readFileSync(filePath, 'utf-8');
            expect(written).toBe(serializeExportBundle(bundle));
            expect(JSON.parse(written).posts.twitter).toBe('Não perca! ☀️');
        });

        it('should not write outside the output directory', async () => {
            const writer = new JsonExportWriter(tempDir);

            const filePath = await writer.write(buildExportBundle(outcome), '../escape.json');

            expect(filePath).toBe(path.join(tempDir, 'escape.json'));
        });
    });
});
