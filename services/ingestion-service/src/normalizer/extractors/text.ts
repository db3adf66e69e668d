import { Extractor, ExtractionResult } from './base';
import { DocumentFormat } from '../formats';

export class PlainTextExtractor implements Extractor {
    formats: DocumentFormat[] = ['txt'];

    async extract(buffer: Buffer): Promise<ExtractionResult> {
        // Invalid UTF-8 sequences decode to U+FFFD
        const text = buffer.toString('utf-8');
        const lines = text.split('\n').filter(line => line.trim() !== '');
        return { text, structuralCount: lines.length, unit: 'lines' };
    }
}
