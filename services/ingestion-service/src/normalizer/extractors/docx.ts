import type { CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { Extractor, ExtractionResult } from './base';
import { DocumentFormat } from '../formats';
import { loadXml, openPackage, readPart } from './ooxml';

const KIND = 'Word document';

// w:t carries text; tabs and breaks are empty marker elements
const RUN_CONTENT = 'w\\:t, w\\:tab, w\\:br, w\\:cr';

export const paragraphText = ($: CheerioAPI, paragraph: Element): string => {
    let text = '';
    $(paragraph).find(RUN_CONTENT).each((_, node) => {
        const $node = $(node);
        if ($node.is('w\\:t')) text += $node.text();
        else if ($node.is('w\\:tab')) text += '\t';
        else text += '\n';
    });
    return text;
};

/**
 * Body-level paragraphs of `word/document.xml`, in order. Table cells,
 * headers and footers are not part of the body paragraph list.
 */
export class DocxExtractor implements Extractor {
    formats: DocumentFormat[] = ['docx'];

    async extract(buffer: Buffer): Promise<ExtractionResult> {
        const zip = await openPackage(buffer, KIND);
        const $ = loadXml(await readPart(zip, 'word/document.xml', KIND));

        const paragraphs = $('w\\:body').children('w\\:p').toArray().map(p => paragraphText($, p));
        const text = paragraphs.filter(p => p.trim() !== '').join('\n');

        return { text, structuralCount: paragraphs.length, unit: 'paragraphs' };
    }
}
