import * as fs from 'fs';
import * as path from 'path';

// shared/prompts at the repository root
export const PROMPTS_DIR = path.resolve(__dirname, '../../../shared/prompts');

const VERSION_HEADER = /^Prompt-Version:\s*(.+)\r?\n/;

/**
 * Read a prompt template. A leading `Prompt-Version: x` line is metadata
 * and is not part of the returned content.
 */
export function loadPrompt(templatePath: string, dir: string = PROMPTS_DIR): { content: string, version: string } {
    const raw = fs.readFileSync(path.join(dir, templatePath), 'utf-8');

    const versionMatch = raw.match(VERSION_HEADER);
    if (!versionMatch) {
        return { content: raw, version: 'unknown' };
    }
    return { content: raw.slice(versionMatch[0].length), version: versionMatch[1].trim() };
}

/** Replace `{{name}}` placeholders; values are inserted literally. */
export function fillTemplate(template: string, variables: Record<string, string>): string {
    return template.replace(/{{(\w+)}}/g, (placeholder, key: string) => {
        return Object.prototype.hasOwnProperty.call(variables, key) ? variables[key] : placeholder;
    });
}
