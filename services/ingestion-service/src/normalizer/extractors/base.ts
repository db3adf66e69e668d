import { DocumentFormat } from '../formats';

export type StructuralUnit = 'pages' | 'slides' | 'paragraphs' | 'lines';

export interface ExtractionResult {
    text: string;
    /** Pages, slides, paragraphs or non-blank lines, depending on the format. */
    structuralCount: number;
    unit: StructuralUnit;
}

export interface Extractor {
    formats: DocumentFormat[];
    extract(buffer: Buffer): Promise<ExtractionResult>;
}
