import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { formatZodIssues } from './toolHelpers.js';

// Resolves to <repo>/data from both src/utils and dist/utils.
const DATA_DIR = path.resolve(__dirname, '..', '..', 'data');

/**
 * Reads and validates one of the bundled JSON data files.
 * @throws ConfigurationError if the file is missing or does not match the schema.
 */
export function loadDataFile<S extends z.ZodTypeAny>(fileName: string, schema: S): z.output<S> {
    const filePath = path.join(DATA_DIR, fileName);
    let raw: unknown;
    try {
        raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (error: unknown) {
        throw new ConfigurationError(`Cannot read data file ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
    }
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
        throw new ConfigurationError(`Invalid data file ${filePath}: ${formatZodIssues(parsed.error)}`);
    }
    return parsed.data;
}
