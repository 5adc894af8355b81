/**
 * Scoped File Loader
 *
 * Loads a record from a JSON file with the file's directory as the
 * resolution base, so relative `path` fields resolve the same way from
 * any working directory.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { AnyEntityType, ModelInstance } from './schema.contract.js';
import { LoadError, MalformedInput, SchemaViolation } from './schema.errors.js';
import { resolutionContext } from './resolution.context.js';
import { serialize, type SerializeOptions } from './schema.serializer.js';
import { validate } from './schema.validator.js';
import { config } from '../config/index.js';
import { createModuleLogger } from '../utils/logger.js';

const logger = createModuleLogger('loader');

export interface DumpOptions {
    /** JSON indentation; defaults to MODEL_JSON_INDENT */
    indent?: number;
}

/**
 * Read and parse a JSON file
 */
export function loadData(file: string): unknown {
    const filename = path.resolve(file);

    let text: string;
    try {
        text = fs.readFileSync(filename, 'utf-8');
    } catch (error) {
        logger.error({ file: filename }, 'Failed to load data');
        throw new LoadError(filename, 'read', error);
    }

    let data: unknown;
    try {
        data = JSON.parse(text);
    } catch (error) {
        logger.error({ file: filename }, 'Failed to load data');
        throw new MalformedInput(filename, error);
    }

    logger.debug({ file: filename }, 'Loaded data');
    return data;
}

/**
 * Load and validate a model from a file
 */
export function load<E extends AnyEntityType>(entity: E, file: string): ModelInstance<E> {
    const filename = path.resolve(file);
    const scope = resolutionContext.enter(path.dirname(filename));

    try {
        const data = loadData(filename);
        return validate(entity, data, { baseDir: scope.baseDir });
    } catch (error) {
        if (error instanceof SchemaViolation) {
            logger.error({ file: filename, entity: entity.name, path: error.pathString }, 'Failed to validate');
        }
        throw error;
    } finally {
        scope.release();
    }
}

/**
 * Write data as a JSON document, replacing any existing file
 */
export function dump(data: object, file: string, options: DumpOptions = {}): void {
    const filename = path.resolve(file);
    const text = JSON.stringify(data, null, options.indent ?? config.output.indent);

    try {
        fs.writeFileSync(filename, text + '\n', 'utf-8');
    } catch (error) {
        throw new LoadError(filename, 'write', error);
    }

    logger.debug({ file: filename }, 'Dumped data');
}

/**
 * Serialize a model instance and write it to a file
 */
export function dumpModel(instance: object, file: string, options: SerializeOptions & DumpOptions = {}): void {
    dump(serialize(instance, options), file, options);
}
