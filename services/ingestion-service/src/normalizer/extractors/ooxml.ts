import JSZip from 'jszip';
import * as cheerio from 'cheerio';
import { errorMessage } from '@docqa/service-template';
import { CorruptDocument, EmptyDocument } from '../../errors';

/** Local file header every ZIP archive starts with. */
export const ZIP_SIGNATURE = Buffer.from([0x50, 0x4b, 0x03, 0x04]);

export const hasZipSignature = (buffer: Buffer): boolean => {
    return buffer.length >= ZIP_SIGNATURE.length && buffer.subarray(0, ZIP_SIGNATURE.length).equals(ZIP_SIGNATURE);
};

/**
 * Office Open XML files are ZIP packages of XML parts. Validate the
 * container before any parsing so a truncated download or an HTML login
 * page fails with a clear error instead of a parser stack trace.
 */
export const openPackage = async (buffer: Buffer, kind: string): Promise<JSZip> => {
    if (buffer.length === 0) {
        throw new EmptyDocument(`${kind} is empty or corrupted`);
    }
    if (!hasZipSignature(buffer)) {
        throw new CorruptDocument(
            `Invalid ${kind}: the file is not a ZIP package. It may be corrupted, incomplete, or not a ${kind} at all.`
        );
    }

    try {
        return await JSZip.loadAsync(buffer);
    } catch (err) {
        throw new CorruptDocument(`Invalid ${kind}: ${errorMessage(err)}`, { cause: err });
    }
};

export const readPart = async (zip: JSZip, partName: string, kind: string): Promise<string> => {
    const part = zip.file(partName);
    if (!part) {
        throw new CorruptDocument(`Invalid ${kind}: missing ${partName}`);
    }

    try {
        return await part.async('string');
    } catch (err) {
        throw new CorruptDocument(`Invalid ${kind}: cannot read ${partName}: ${errorMessage(err)}`, { cause: err });
    }
};

export const loadXml = (xml: string): cheerio.CheerioAPI => cheerio.load(xml, { xml: true });
