import { describe, it, expect } from 'vitest';
import { MarkdownTextRenderer } from '../../src/services/text.renderer.js';

describe('MarkdownTextRenderer', () => {
    const renderer = new MarkdownTextRenderer();

    it('should render plain text as a paragraph', () => {
        expect(renderer.toHtml('Hello')).toBe('<p>Hello</p>\n');
    });

    it('should escape markup characters', () => {
        expect(renderer.toHtml('a <b> & c')).toBe('<p>a &lt;b&gt; &amp; c</p>\n');
    });

    it('should not let script tags through', () => {
        expect(renderer.toHtml('<script>alert(1)</script>')).toBe('<p>&lt;script&gt;alert(1)&lt;/script&gt;</p>\n');
    });

    it('should escape attributes injected through raw HTML', () => {
        expect(renderer.toHtml('<img src=x onerror=alert(1)>')).toBe('<p>&lt;img src=x onerror=alert(1)&gt;</p>\n');
    });

    it('should restore line breaks', () => {
        expect(renderer.toHtml('line one<br>line two')).toBe('<p>line one<br>line two</p>\n');
    });

    it('should only restore the exact break marker', () => {
        expect(renderer.toHtml('a<br/>b')).toBe('<p>a&lt;br/&gt;b</p>\n');
    });

    it('should render Markdown tables', () => {
        const html = renderer.toHtml('| Name | Qty |\n| --- | --- |\n| bolt | 4 |');

        expect(html).toContain('<table>');
        expect(html).toContain('<th>Name</th>');
        expect(html).toContain('<td>bolt</td>');
        expect(html).toContain('<td>4</td>');
    });

    it('should render a table that follows a line break on its own line', () => {
        const html = renderer.toHtml('<br>\n| A | B |\n| --- | --- |\n| 1 | 2 |');

        expect(html.startsWith('<p><br></p>\n<table>')).toBe(true);
        expect(html).toContain('<th>A</th>');
        expect(html).toContain('<td>1</td>');
        expect(html).toContain('<td>2</td>');
    });

    it('should escape markup inside table cells', () => {
        const html = renderer.toHtml('| A | B |\n| --- | --- |\n| x < y | z |');
        expect(html).toContain('<td>x &lt; y</td>');
    });

    it('should render emphasis', () => {
        expect(renderer.toHtml('**bold**')).toBe('<p><strong>bold</strong></p>\n');
    });

    it('should render an empty slice as nothing', () => {
        expect(renderer.toHtml('')).toBe('');
    });
});
