import Handlebars from 'handlebars';
import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { InstallFailureEntry, InstallStatus, PackageUpdate } from '../interfaces/index.js';

// ES module compatibility
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/**
 * Lazy-loaded compiled templates cache
 */
const templateCache = new Map<string, HandlebarsTemplateDelegate>();

/**
 * Load and compile a Handlebars template. Output is plain text, so nothing is HTML-escaped.
 */
function loadTemplate(templateName: string): HandlebarsTemplateDelegate {
    const cached = templateCache.get(templateName);
    if (cached) return cached;

    const templatePath = path.join(__dirname, '../templates', `${templateName}.hbs`);
    const templateContent = fs.readFileSync(templatePath, 'utf-8');
    const compiledTemplate = Handlebars.compile(templateContent, { noEscape: true });

    templateCache.set(templateName, compiledTemplate);
    return compiledTemplate;
}

function render(templateName: string, data: object): string {
    return loadTemplate(templateName)(data).trim();
}

export function createInstallStartedMessage(update: PackageUpdate, index: number, total: number): string {
    return render('install-started', {
        name: update.name,
        id: update.id,
        version: update.isUnknownVersion ? undefined : update.availableVersion,
        index,
        total,
    });
}

export function createInstallSucceededMessage(update: PackageUpdate): string {
    return render('install-succeeded', { name: update.name });
}

export function createInstallFailedMessage(update: PackageUpdate, error: string): string {
    return render('install-failed', { name: update.name, error });
}

export interface SummaryMessageData {
    total: number;
    attempted: number;
    succeeded: number;
    failures: InstallFailureEntry[];
    /** Only for aborted runs */
    error?: string;
}

export function createSummaryMessage(status: InstallStatus, data: SummaryMessageData): string {
    return render(`summary-${status}`, data);
}
