import axios from 'axios';
import nock from 'nock';
import {
    ProductPageScraper,
    parseProductHtml,
    extractPrice,
} from '../../../src/infrastructure/scraper/ProductPageScraper';

describe('ProductPageScraper', () => {
    let scraper: ProductPageScraper;

    beforeAll(() => {
        nock.disableNetConnect();
    });

    afterAll(() => {
        nock.enableNetConnect();
    });

    beforeEach(() => {
        scraper = new ProductPageScraper({ timeout: 5000, userAgent: 'test-agent/1.0' });
        nock.cleanAll();
        jest.spyOn(console, 'warn').mockImplementation(() => { });
    });

    afterEach(() => {
        nock.abortPendingRequests();
        nock.cleanAll();
        jest.restoreAllMocks();
    });

    describe('extract()', () => {
        it('should read title, description and price from the page', async () => {
            nock('https://shop.example.com')
                .get('/product/curso')
                .matchHeader('User-Agent', 'test-agent/1.0')
                .reply(200, `
                    <html>
                        <head>
                            <title>Curso de Fotografia | Shop</title>
                            <meta property="og:description" content="Fotografe como um profissional">
                        </head>
                        <body>
                            <h1>Curso de Fotografia</h1>
                            <p>Apenas R$ 197,00 hoje</p>
                        </body>
                    </html>
                `);

            const result = await scraper.extract('https://shop.example.com/product/curso');

            expect(result).toEqual({
                url: 'https://shop.example.com/product/curso',
                title: 'Curso de Fotografia',
                description: 'Fotografe como um profissional',
                price: 'R$ 197,00',
                benefits: [],
            });
        });

        it('should return the placeholder product on a 404', async () => {
            nock('https://shop.example.com').get('/missing').reply(404, 'Not found');

            const result = await scraper.extract('https://shop.example.com/missing');

            expect(result).toEqual({
                url: 'https://shop.example.com/missing',
                title: 'Hotmart Product',
                description: '',
                price: '',
                benefits: [],
            });
        });

        it('should return the placeholder product when the connection fails', async () => {
            nock('https://down.example.com').get('/').replyWithError('connect ECONNREFUSED');

            const result = await scraper.extract('https://down.example.com/');

            expect(result.title).toBe('Hotmart Product');
            expect(result.url).toBe('https://down.example.com/');
            expect(console.warn).toHaveBeenCalledTimes(1);
        });

        it('should return the placeholder product when the page is too slow', async () => {
            nock('https://slow.example.com').get('/').delayConnection(500).reply(200, '<h1>Late</h1>');
            const slowScraper = new ProductPageScraper({ timeout: 50 });

            const result = await slowScraper.extract('https://slow.example.com/');

            expect(result.title).toBe('Hotmart Product');
            expect(console.warn).toHaveBeenCalledWith(
                '[ProductScraper] Extraction failed for https://slow.example.com/, using placeholder: request timed out'
            );
        });

        it('should default to a 10 second timeout', async () => {
            const getSpy = jest.spyOn(axios, 'get').mockRejectedValue(new Error('offline'));

            const result = await new ProductPageScraper().extract('https://shop.example.com/');

            expect(result.title).toBe('Hotmart Product');
            expect(getSpy).toHaveBeenCalledWith(
                'https://shop.example.com/',
                expect.objectContaining({ timeout: 10000 })
            );
        });
    });

    describe('parseProductHtml()', () => {
        const url = 'https://shop.example.com/p';

        it('should prefer the h1 over og:title and the title tag', () => {
            const html = `
                <html><head>
                    <title>Title Tag</title>
                    <meta property="og:title" content="OG Title">
                </head><body><h1>Heading Title</h1></body></html>`;

            expect(parseProductHtml(html, url).title).toBe('Heading Title');
        });

        it('should use og:title when there is no h1', () => {
            const html = `
                <html><head>
                    <title>Title Tag</title>
                    <meta property="og:title" content="OG Title">
                </head><body><p>No heading</p></body></html>`;

            expect(parseProductHtml(html, url).title).toBe('OG Title');
        });

        it('should skip an empty h1', () => {
            const html = `
                <html><head><meta property="og:title" content="OG Title"></head>
                <body><h1>   </h1></body></html>`;

            expect(parseProductHtml(html, url).title).toBe('OG Title');
        });

        it('should fall back to the title tag', () => {
            const html = '<html><head><title>Only The Title</title></head><body></body></html>';

            expect(parseProductHtml(html, url).title).toBe('Only The Title');
        });

        it('should collapse whitespace inside the heading', () => {
            const html = '<html><body><h1>\n   Curso\n   Completo   </h1></body></html>';

            expect(parseProductHtml(html, url).title).toBe('Curso Completo');
        });

        it('should prefer og:description over the description meta tag', () => {
            const html = `
                <html><head>
                    <meta name="description" content="Plain description">
                    <meta property="og:description" content="OG description">
                </head></html>`;

            expect(parseProductHtml(html, url).description).toBe('OG description');
        });

        it('should use the description meta tag when og:description is missing', () => {
            const html = '<html><head><meta name="description" content="Plain description"></head></html>';

            expect(parseProductHtml(html, url).description).toBe('Plain description');
        });

        it('should read .description and then .product-description elements', () => {
            const withClass = '<html><body><div class="description">From the div</div></body></html>';
            const withProductClass = '<html><body><div class="product-description">Product div</div></body></html>';

            expect(parseProductHtml(withClass, url).description).toBe('From the div');
            expect(parseProductHtml(withProductClass, url).description).toBe('Product div');
        });

        it('should leave fields empty when nothing matches', () => {
            const result = parseProductHtml('<html><body><p>Hello</p></body></html>', url);

            expect(result.title).toBe('');
            expect(result.description).toBe('');
            expect(result.price).toBe('');
            expect(result.benefits).toEqual([]);
        });

        it('should return a frozen product', () => {
            const result = parseProductHtml('<html><body><h1>Frozen</h1></body></html>', url);
            expect(Object.isFrozen(result)).toBe(true);
        });
    });

    describe('extractPrice()', () => {
        it('should keep the BRL price verbatim', () => {
            expect(extractPrice('Oferta especial: R$ 197,00 por tempo limitado')).toBe('R$ 197,00');
        });

        it('should prefer BRL over other currencies', () => {
            expect(extractPrice('Was $99.00, now R$ 49,90 and EUR 20')).toBe('R$ 49,90');
        });

        it('should match dollar prices', () => {
            expect(extractPrice('Only $49.90 today')).toBe('$49.90');
        });

        it('should match USD and EUR prefixes', () => {
            expect(extractPrice('Price: USD 120')).toBe('USD 120');
            expect(extractPrice('Price: EUR 59')).toBe('EUR 59');
        });

        it('should return an empty string when no price is present', () => {
            expect(extractPrice('Free for everyone')).toBe('');
        });
    });
});
