import path from 'path';
import JSZip from 'jszip';
import type { CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { Extractor, ExtractionResult } from './base';
import { DocumentFormat } from '../formats';
import { loadXml, openPackage, readPart } from './ooxml';

const KIND = 'PowerPoint file';
const SLIDE_PART = /^ppt\/slides\/slide(\d+)\.xml$/;

const textBodyText = ($: CheerioAPI, body: Element): string => {
    return $(body).children('a\\:p').toArray().map(p => {
        let text = '';
        $(p).find('a\\:t, a\\:br').each((_, node) => {
            text += $(node).is('a\\:t') ? $(node).text() : '\n';
        });
        return text;
    }).join('\n');
};

/** Slide part names in presentation order. */
const slideParts = async (zip: JSZip): Promise<string[]> => {
    const presentation = zip.file('ppt/presentation.xml');
    const rels = zip.file('ppt/_rels/presentation.xml.rels');

    if (presentation && rels) {
        const $rels = loadXml(await rels.async('string'));
        const targets = new Map<string, string>();
        $rels('Relationship').each((_, rel) => {
            const id = $rels(rel).attr('Id');
            const target = $rels(rel).attr('Target');
            if (id && target) targets.set(id, target);
        });

        const $ = loadXml(await presentation.async('string'));
        const ordered = $('p\\:sldIdLst > p\\:sldId').toArray()
            .map(el => targets.get($(el).attr('r:id') || ''))
            .filter((target): target is string => target !== undefined)
            .map(target => target.startsWith('/') ? target.slice(1) : path.posix.join('ppt', target))
            .filter(part => zip.file(part) !== null);

        if (ordered.length > 0) return ordered;
    }

    return Object.keys(zip.files)
        .map(name => ({ name, match: SLIDE_PART.exec(name) }))
        .filter(entry => entry.match !== null)
        .sort((a, b) => Number(a.match?.[1]) - Number(b.match?.[1]))
        .map(entry => entry.name);
};

/**
 * Top-level shapes of each slide: text frames first-class, table cells
 * one entry per non-blank cell. Slides with no text contribute nothing.
 */
export class PptxExtractor implements Extractor {
    formats: DocumentFormat[] = ['pptx'];

    async extract(buffer: Buffer): Promise<ExtractionResult> {
        const zip = await openPackage(buffer, KIND);
        const slides = await slideParts(zip);
        const runs: string[] = [];

        for (const slide of slides) {
            const $ = loadXml(await readPart(zip, slide, KIND));

            $('p\\:cSld > p\\:spTree').children().each((_, shape) => {
                const $shape = $(shape);

                if ($shape.is('p\\:sp')) {
                    const body = $shape.children('p\\:txBody').get(0);
                    if (body) {
                        const text = textBodyText($, body);
                        if (text.trim()) runs.push(text);
                    }
                }

                if ($shape.is('p\\:graphicFrame')) {
                    $shape.find('a\\:tbl a\\:tc > a\\:txBody').each((_, cell) => {
                        const text = textBodyText($, cell);
                        if (text.trim()) runs.push(text);
                    });
                }
            });
        }

        return { text: runs.join('\n'), structuralCount: slides.length, unit: 'slides' };
    }
}
