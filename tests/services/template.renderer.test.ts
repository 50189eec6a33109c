import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { describe, it, expect } from 'vitest';
import { NunjucksPreviewTemplate } from '../../src/services/template.renderer.js';
import { ConfigurationError, TemplateError } from '../../src/errors/index.js';
import { createTestTemplate } from '../mocks/index.js';

const BUNDLED_TEMPLATE = fileURLToPath(new URL('../../templates/viewer_template.html', import.meta.url));

describe('NunjucksPreviewTemplate', () => {
    it('should render id, pages and link', () => {
        const html = createTestTemplate().render({
            id: 'doc-1',
            pages: [
                { pageNum: 2, text: '<p>Two</p>', image: 'aW1n' },
                { pageNum: 1, text: '<p>One</p>', image: 'aW1n' },
            ],
            link: 'https://storage.test/a.pdf',
        });

        expect(html).toBe('doc-1|[2:aW1n:<p>Two</p>][1:aW1n:<p>One</p>]|https://storage.test/a.pdf');
    });

    it('should render a null link as empty', () => {
        expect(createTestTemplate().render({ id: 'doc-1', pages: [], link: null })).toBe('doc-1||');
    });

    it('should escape values not marked safe', () => {
        const html = createTestTemplate().render({
            id: '<b>x</b>',
            pages: [],
            link: 'https://storage.test/a.pdf?X-Amz-Expires=1&X-Amz-Signature=abc',
        });

        expect(html).toBe('&lt;b&gt;x&lt;/b&gt;||https://storage.test/a.pdf?X-Amz-Expires=1&amp;X-Amz-Signature=abc');
    });

    it('should raise TemplateError on a syntax error', () => {
        expect(() => NunjucksPreviewTemplate.fromString('{% for page in pages %}')).toThrow(TemplateError);
    });

    it('should raise ConfigurationError for an unreadable file', async () => {
        const missing = path.join(os.tmpdir(), 'docpreview-no-such-template.html');
        await expect(NunjucksPreviewTemplate.load(missing)).rejects.toThrow(ConfigurationError);
    });

    it('should load from a file', async () => {
        const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'docpreview-test-'));
        const file = path.join(dir, 'viewer.html');
        await fs.writeFile(file, '<h1>{{ id }}</h1>');

        try {
            const template = await NunjucksPreviewTemplate.load(file);
            expect(template.render({ id: 'doc-9', pages: [], link: null })).toBe('<h1>doc-9</h1>');
        } finally {
            await fs.rm(dir, { recursive: true, force: true });
        }
    });

    describe('bundled viewer template', () => {
        it('should embed page images and text', async () => {
            const template = await NunjucksPreviewTemplate.load(BUNDLED_TEMPLATE);
            const html = template.render({
                id: 'doc-1',
                pages: [{ pageNum: 3, text: '<p>Body &amp; more</p>', image: 'aW1n' }],
                link: 'https://storage.test/a.pdf',
            });

            expect(html).toContain('<title>doc-1</title>');
            expect(html).toContain('<img src="data:image/webp;base64,aW1n" alt="Page 3">');
            expect(html).toContain('<p>Body &amp; more</p>');
            expect(html).toContain('<a href="https://storage.test/a.pdf" target="_blank" rel="noopener">Open source PDF</a>');
        });

        it('should omit the link when there is none', async () => {
            const template = await NunjucksPreviewTemplate.load(BUNDLED_TEMPLATE);
            const html = template.render({ id: 'doc-1', pages: [], link: null });

            expect(html).not.toContain('Open source PDF');
            expect(html).not.toContain('class="page"');
        });
    });
});
