import Handlebars from 'handlebars';
import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';

// ES module compatibility
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export const TEMPLATE_DIRECTORY = path.join(__dirname, '../../templates');

/**
 * Lazy-loaded compiled templates cache
 */
const templateCache = new Map<string, HandlebarsTemplateDelegate>();

Handlebars.registerHelper('humanize', (value: unknown) => String(value ?? '').replace(/_/g, ' '));

/**
 * Load and compile a Handlebars template from the templates directory
 */
export function loadTemplate(templateName: string): HandlebarsTemplateDelegate {
    const cached = templateCache.get(templateName);
    if (cached) {
        return cached;
    }

    const templatePath = path.join(TEMPLATE_DIRECTORY, `${templateName}.hbs`);
    const templateContent = fs.readFileSync(templatePath, 'utf-8');
    const compiledTemplate = Handlebars.compile(templateContent);

    templateCache.set(templateName, compiledTemplate);
    return compiledTemplate;
}

export function renderTemplate(templateName: string, data: object): string {
    return loadTemplate(templateName)(data);
}
