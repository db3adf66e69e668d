import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { Request, Response } from 'express';
import { ValidationFailure, logger } from '@docqa/service-template';
import { createIngestionHandlers } from './ingestionHandler';
import { IngestionPipeline, IngestionResult } from '../pipeline/ingestionPipeline';
import { UnsupportedFormat } from '../errors';

const result: IngestionResult = {
    filename: 'notes.txt',
    format: 'txt',
    collection: 'pdf_chunks',
    chunks_created: 1,
    chars_total: 11,
    structural_count: 1,
    structural_unit: 'lines'
};

function mockRequest(body: any, file?: { originalname: string; path: string }): Request {
    return { body, file } as any;
}

function mockResponse() {
    const res = {} as any;
    res.status = jest.fn().mockReturnValue(res);
    res.json = jest.fn().mockReturnValue(res);
    res.on = jest.fn().mockReturnValue(res);
    return res as Response;
}

const exists = (file: string) => fs.access(file).then(() => true, () => false);

describe('Ingestion Handlers', () => {
    const pipeline = { ingest: jest.fn() };
    const connector = { fetch: jest.fn() };
    const handlers = createIngestionHandlers({ pipeline: pipeline as unknown as IngestionPipeline, connector });
    let stagingDir: string;

    beforeEach(async () => {
        jest.clearAllMocks();
        stagingDir = await fs.mkdtemp(path.join(os.tmpdir(), 'ingest-test-'));
    });

    afterEach(async () => {
        await fs.rm(stagingDir, { recursive: true, force: true });
    });

    describe('uploadDocument', () => {
        it('should ingest the staged file and remove it afterwards', async () => {
            const staged = path.join(stagingDir, 'upload-1');
            await fs.writeFile(staged, 'hello world');
            pipeline.ingest.mockResolvedValue(result);
            const res = mockResponse();
            const next = jest.fn();

            await handlers.uploadDocument(mockRequest({}, { originalname: 'notes.txt', path: staged }), res, next);

            expect(pipeline.ingest).toHaveBeenCalledWith(
                { content: Buffer.from('hello world'), format: 'txt' },
                'notes.txt',
                expect.any(AbortSignal)
            );
            expect(res.json).toHaveBeenCalledWith({
                status: 'success',
                message: "Processed Text File 'notes.txt' into 1 chunks",
                ...result
            });
            expect(next).not.toHaveBeenCalled();
            await expect(exists(staged)).resolves.toBe(false);
        });

        it('should reject a request without a file', async () => {
            const next = jest.fn();

            await handlers.uploadDocument(mockRequest({}), mockResponse(), next);

            expect(next).toHaveBeenCalledWith(expect.any(ValidationFailure));
            expect(pipeline.ingest).not.toHaveBeenCalled();
        });

        it('should remove the staged file when the format is unsupported', async () => {
            const staged = path.join(stagingDir, 'upload-2');
            await fs.writeFile(staged, 'a,b,c');
            const next = jest.fn();

            await handlers.uploadDocument(mockRequest({}, { originalname: 'sheet.xlsx', path: staged }), mockResponse(), next);

            expect(next).toHaveBeenCalledWith(expect.any(UnsupportedFormat));
            await expect(exists(staged)).resolves.toBe(false);
        });

        it('should pass pipeline failures to the error handler', async () => {
            const staged = path.join(stagingDir, 'upload-3');
            await fs.writeFile(staged, 'hello');
            const failure = new Error('store unavailable');
            pipeline.ingest.mockRejectedValue(failure);
            const next = jest.fn();

            await handlers.uploadDocument(mockRequest({}, { originalname: 'notes.txt', path: staged }), mockResponse(), next);

            expect(next).toHaveBeenCalledWith(failure);
            await expect(exists(staged)).resolves.toBe(false);
        });

        it('should only warn when the staged file is already gone', async () => {
            const warn = jest.spyOn(logger, 'warn').mockImplementation(() => logger);
            const rm = jest.spyOn(fs, 'rm').mockRejectedValueOnce(new Error('EACCES: permission denied'));
            pipeline.ingest.mockResolvedValue(result);
            const staged = path.join(stagingDir, 'upload-4');
            await fs.writeFile(staged, 'hello');
            const res = mockResponse();

            await handlers.uploadDocument(mockRequest({}, { originalname: 'notes.txt', path: staged }), res, jest.fn());

            expect(res.json).toHaveBeenCalled();
            expect(warn).toHaveBeenCalledWith(`Could not remove staged upload ${staged}`, { error: 'EACCES: permission denied' });
            rm.mockRestore();
            warn.mockRestore();
        });
    });

    describe('ingestUrl', () => {
        it('should download and ingest the document', async () => {
            const document = {
                sourceUri: 'https://files.test/notes.txt',
                filename: 'notes.txt',
                content: Buffer.from('hello world'),
                format: 'txt'
            };
            connector.fetch.mockResolvedValue(document);
            pipeline.ingest.mockResolvedValue(result);
            const res = mockResponse();

            await handlers.ingestUrl(
                mockRequest({ url: 'https://files.test/notes.txt', credentials: { type: 'bearer', token: 'test-token' } }),
                res,
                jest.fn()
            );

            expect(connector.fetch).toHaveBeenCalledWith('https://files.test/notes.txt', { type: 'bearer', token: 'test-token' });
            expect(pipeline.ingest).toHaveBeenCalledWith(document, 'notes.txt', expect.any(AbortSignal));
            expect(res.json).toHaveBeenCalledWith(expect.objectContaining({
                status: 'success',
                chunks_created: 1,
                source_url: 'https://files.test/notes.txt'
            }));
        });

        it('should reject a body that is not an http(s) URL', async () => {
            const next = jest.fn();

            await handlers.ingestUrl(mockRequest({ url: 'ftp://files.test/notes.txt' }), mockResponse(), next);

            expect(next).toHaveBeenCalledWith(expect.any(ValidationFailure));
            expect(connector.fetch).not.toHaveBeenCalled();
        });
    });
});
