import { errorMessage } from '@docqa/service-template';
import { Extractor, ExtractionResult } from './base';
import { DocumentFormat } from '../formats';
import { CorruptDocument, EmptyDocument } from '../../errors';

export interface PdfTextItem {
    str: string;
    /** PDF.js transform matrix; index 5 is the baseline's y. */
    transform: number[];
}

export interface PdfPage {
    getTextContent(options?: { normalizeWhitespace?: boolean; disableCombineTextItems?: boolean }): Promise<{ items: PdfTextItem[] }>;
}

export interface PdfParseOptions {
    // pdf-parse awaits this once per page, in page order
    pagerender?: (page: PdfPage) => string | Promise<string>;
}

export interface PdfParser {
    parse(buffer: Buffer, options: PdfParseOptions): Promise<{ numpages: number; text: string }>;
}

// pdf-parse pulls in its bundled PDF.js build; load it on first use only
const loadPdfParse = async (): Promise<PdfParser> => ({ parse: (await import('pdf-parse')).default });

/** One page's text: items on the same baseline run together, a new baseline starts a new line. */
export const renderPageText = async (page: PdfPage): Promise<string> => {
    const content = await page.getTextContent({ normalizeWhitespace: false, disableCombineTextItems: false });

    let text = '';
    let lastY: number | undefined;
    for (const item of content.items) {
        const y = item.transform[5];
        text += lastY === undefined || lastY === y ? item.str : `\n${item.str}`;
        lastY = y;
    }
    return text;
};

export class PDFExtractor implements Extractor {
    formats: DocumentFormat[] = ['pdf'];
    private parser?: PdfParser;

    constructor(parser?: PdfParser) {
        this.parser = parser;
    }

    async extract(buffer: Buffer): Promise<ExtractionResult> {
        if (buffer.length === 0) {
            throw new EmptyDocument('PDF file is empty');
        }

        if (!this.parser) {
            this.parser = await loadPdfParse();
        }

        const pages: string[] = [];
        let numpages: number;
        try {
            const data = await this.parser.parse(buffer, {
                pagerender: async page => {
                    const text = await renderPageText(page);
                    pages.push(text);
                    return text;
                }
            });
            numpages = data.numpages;
        } catch (err) {
            throw new CorruptDocument(`Error reading PDF file: ${errorMessage(err)}`, { cause: err });
        }

        return { text: pages.join('\n'), structuralCount: numpages, unit: 'pages' };
    }
}
