import fs from 'fs';
import os from 'os';
import path from 'path';
import { loadSchema, parseBody, SCHEMAS_DIR } from './validation';
import { ValidationFailure } from './errors';

interface AnswerRequest {
    query: string;
    top_k?: number;
}

describe('request validation', () => {
    const validate = loadSchema<AnswerRequest>('AnswerRequest.json');

    it('should point at the shared schemas directory', () => {
        expect(fs.existsSync(path.join(SCHEMAS_DIR, 'AnswerRequest.json'))).toBe(true);
    });

    it('should return the typed body when valid', () => {
        const body = parseBody(validate, { query: 'What is the refund policy?', top_k: 3 });
        expect(body.query).toBe('What is the refund policy?');
        expect(body.top_k).toBe(3);
    });

    it('should reject a missing query', () => {
        expect(() => parseBody(validate, { top_k: 3 })).toThrow(ValidationFailure);
    });

    it('should list every violation', () => {
        let caught: unknown;
        try {
            parseBody(validate, { query: '', top_k: 0 });
        } catch (err) {
            caught = err;
        }

        expect(caught).toBeInstanceOf(ValidationFailure);
        expect(caught instanceof ValidationFailure && caught.details).toEqual([
            '/query must NOT have fewer than 1 characters',
            '/query must match pattern "\\S"',
            '/top_k must be >= 1'
        ]);
    });

    it('should reject a whitespace-only query', () => {
        expect(() => parseBody(validate, { query: '  \n ' })).toThrow('Invalid request body');
    });

    it('should load schemas from a custom directory', () => {
        const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'schemas-'));
        fs.writeFileSync(path.join(dir, 'Ping.json'), JSON.stringify({
            type: 'object',
            properties: { ping: { type: 'string', format: 'uri' } },
            required: ['ping']
        }));

        try {
            const ping = loadSchema<{ ping: string }>('Ping.json', dir);
            expect(ping({ ping: 'https://example.com/a.pdf' })).toBe(true);
            expect(ping({ ping: 'not a url' })).toBe(false);
        } finally {
            fs.rmSync(dir, { recursive: true, force: true });
        }
    });
});
