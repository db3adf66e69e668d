import path from 'path';
import { UnsupportedFormat } from '../errors';

export type DocumentFormat = 'pdf' | 'docx' | 'doc' | 'pptx' | 'ppt' | 'txt';

export const DOCUMENT_FORMATS: readonly DocumentFormat[] = ['pdf', 'docx', 'doc', 'pptx', 'ppt', 'txt'];

export const FORMAT_LABELS: Record<DocumentFormat, string> = {
    pdf: 'PDF',
    docx: 'Word Document',
    doc: 'Word Document',
    pptx: 'PowerPoint Presentation',
    ppt: 'PowerPoint Presentation',
    txt: 'Text File'
};

/** Content-Type → file extension, as servers commonly label documents. */
export const CONTENT_TYPE_EXTENSIONS: Record<string, string> = {
    'application/pdf': '.pdf',
    'application/vnd.openxmlformats-officedocument.wordprocessingml.document': '.docx',
    'application/msword': '.doc',
    'application/vnd.openxmlformats-officedocument.presentationml.presentation': '.pptx',
    'application/vnd.ms-powerpoint': '.ppt',
    'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet': '.xlsx',
    'text/plain': '.txt'
};

const isDocumentFormat = (value: string): value is DocumentFormat => {
    return DOCUMENT_FORMATS.some(format => format === value);
};

/** `.PDF` or `pdf` → `'pdf'`; anything unknown is rejected. */
export const formatFromExtension = (extension: string): DocumentFormat => {
    const tag = extension.toLowerCase().replace(/^\./, '');
    if (!isDocumentFormat(tag)) {
        throw new UnsupportedFormat(`Unsupported file format: ${extension || '(none)'}`);
    }
    return tag;
};

export const detectFormat = (filename: string): DocumentFormat => {
    return formatFromExtension(path.extname(filename));
};
