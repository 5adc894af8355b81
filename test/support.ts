import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { defineEntity, field } from '../src/schema/index.js';

export const fixturesDir = path.join(path.dirname(fileURLToPath(import.meta.url)), 'fixtures');

export function fixture(name: string): string {
    return path.join(fixturesDir, name);
}

export function makeTempDir(): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), 'gridbid-'));
}

/**
 * Entity type exercising aliases, optional fields and coercion
 */
export const Unit = defineEntity('Unit', {
    unitId: field.string({ title: 'Unit ID', alias: 'unit-id' }),
    capacity: field.optional(field.number({ title: 'Capacity', alias: 'Capacity MW' })),
    online: field.optional(field.boolean()),
    count: field.optional(field.integer()),
});

export const Document = defineEntity('Document', {
    name: field.string(),
    file: field.path(),
});
