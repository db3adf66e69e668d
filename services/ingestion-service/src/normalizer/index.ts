import { Extractor, ExtractionResult } from './extractors/base';
import { PDFExtractor, PdfParser } from './extractors/pdf';
import { DocxExtractor } from './extractors/docx';
import { PptxExtractor } from './extractors/pptx';
import { PlainTextExtractor } from './extractors/text';
import { DocumentFormat } from './formats';
import { UnsupportedFormat, UnsupportedLegacyFormat } from '../errors';

export * from './formats';
export type { Extractor, ExtractionResult, StructuralUnit } from './extractors/base';

const LEGACY_REPLACEMENTS: Partial<Record<DocumentFormat, string>> = {
    doc: '.docx',
    ppt: '.pptx'
};

/** Turns document bytes into plain text, one extractor per format. */
export class Normalizer {
    private extractors: Extractor[];

    constructor(options: { pdfParser?: PdfParser } = {}) {
        this.extractors = [
            new PDFExtractor(options.pdfParser),
            new DocxExtractor(),
            new PptxExtractor(),
            new PlainTextExtractor()
        ];
    }

    async extract(content: Buffer, format: DocumentFormat): Promise<ExtractionResult> {
        const replacement = LEGACY_REPLACEMENTS[format];
        if (replacement) {
            throw new UnsupportedLegacyFormat(
                `Legacy .${format} files are not supported. Please convert to ${replacement} format.`
            );
        }

        const extractor = this.extractors.find(e => e.formats.includes(format));
        if (!extractor) {
            throw new UnsupportedFormat(`Unsupported file format: .${format}`);
        }
        return extractor.extract(content);
    }
}
