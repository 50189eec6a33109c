import MarkdownIt from 'markdown-it';
import type { ITextRenderer } from '../types/render.types.js';

const ESCAPED_BREAK = '&lt;br&gt;';

/**
 * Text path of the page renderer.
 *
 * The order matters: the slice is escaped first, then `<br>` is the only
 * tag restored, then Markdown (with tables) is rendered. Inline HTML is
 * enabled in markdown-it so the restored `<br>` passes through; nothing
 * else can reach it unescaped. Block HTML stays off: a `<br>` alone on a
 * line must not swallow the Markdown that follows it.
 */
export class MarkdownTextRenderer implements ITextRenderer {
    private readonly md: MarkdownIt;

    constructor() {
        this.md = new MarkdownIt({ html: true, linkify: false, typographer: false }).disable('html_block');
    }

    toHtml(text: string): string {
        const escaped = this.md.utils.escapeHtml(text).replaceAll(ESCAPED_BREAK, '<br>');
        return this.md.render(escaped);
    }
}
