import { env, envInt, optionalEnv } from './env';

describe('env helpers', () => {
    const saved = { ...process.env };

    afterEach(() => {
        process.env = { ...saved };
    });

    test('falls back when unset or blank', () => {
        delete process.env.DOCQA_TEST_VALUE;
        expect(env('DOCQA_TEST_VALUE', 'pdf_chunks')).toBe('pdf_chunks');

        process.env.DOCQA_TEST_VALUE = '   ';
        expect(env('DOCQA_TEST_VALUE', 'pdf_chunks')).toBe('pdf_chunks');
        expect(optionalEnv('DOCQA_TEST_VALUE')).toBeUndefined();
    });

    test('trims configured values', () => {
        process.env.DOCQA_TEST_VALUE = ' manuals ';
        expect(env('DOCQA_TEST_VALUE', 'pdf_chunks')).toBe('manuals');
    });

    test('parses integers and rejects garbage', () => {
        process.env.DOCQA_TEST_INT = '7';
        expect(envInt('DOCQA_TEST_INT', 5)).toBe(7);

        process.env.DOCQA_TEST_INT = 'seven';
        expect(() => envInt('DOCQA_TEST_INT', 5)).toThrow('DOCQA_TEST_INT must be an integer');
    });
});
