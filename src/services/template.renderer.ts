import * as fs from 'fs/promises';
import nunjucks from 'nunjucks';
import type { Template } from 'nunjucks';
import type { IPreviewTemplate, PreviewContext } from '../types/render.types.js';
import { ConfigurationError, TemplateError, wrapError } from '../errors/index.js';

/**
 * Output template on nunjucks (Jinja-compatible syntax).
 *
 * Compiled once and shared by every record task. Autoescaping is on,
 * so templates mark the pre-rendered page HTML with `| safe`.
 */
export class NunjucksPreviewTemplate implements IPreviewTemplate {
    private constructor(private readonly template: Template) { }

    static fromString(source: string, name?: string): NunjucksPreviewTemplate {
        const env = new nunjucks.Environment(null, { autoescape: true });
        try {
            return new NunjucksPreviewTemplate(new nunjucks.Template(source, env, name, true));
        } catch (error) {
            throw wrapError(error, TemplateError, 'compile');
        }
    }

    static async load(templatePath: string): Promise<NunjucksPreviewTemplate> {
        let source: string;
        try {
            source = await fs.readFile(templatePath, 'utf-8');
        } catch (error) {
            const cause = error instanceof Error ? error : new Error(String(error));
            throw new ConfigurationError(
                `Template not readable: ${templatePath}`,
                { templatePath },
                { cause, operation: 'loadTemplate' }
            );
        }
        return NunjucksPreviewTemplate.fromString(source, templatePath);
    }

    render(context: PreviewContext): string {
        try {
            return this.template.render(context);
        } catch (error) {
            throw wrapError(error, TemplateError, 'render');
        }
    }
}
