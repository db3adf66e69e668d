import Ajv, { ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import fs from 'fs';
import path from 'path';
import { ValidationFailure } from './errors';

const ajv = new Ajv({ allErrors: true });
addFormats(ajv);

export const SCHEMAS_DIR = path.resolve(__dirname, '../../schemas');

/**
 * Compile a JSON schema from `shared/schemas`. The type parameter is the
 * shape the schema describes; the returned function narrows to it.
 */
export function loadSchema<T>(fileName: string, dir: string = SCHEMAS_DIR): ValidateFunction<T> {
    const schema = JSON.parse(fs.readFileSync(path.join(dir, fileName), 'utf-8'));
    return ajv.compile<T>(schema);
}

export function parseBody<T>(validate: ValidateFunction<T>, body: unknown): T {
    if (validate(body)) {
        return body;
    }

    const details = (validate.errors || []).map(e => `${e.instancePath || '/'} ${e.message || 'is invalid'}`);
    throw new ValidationFailure('Invalid request body', details);
}
