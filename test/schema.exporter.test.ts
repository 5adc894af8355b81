import * as fs from 'node:fs';
import * as path from 'node:path';
import { describe, expect, it } from 'vitest';
import { BidModel, Generator } from '../src/bid/bid.model.js';
import {
    DeclarationError,
    defineEntity,
    exportSchema,
    field,
    schemaJson,
    serialize,
    validate,
    writeSchema,
} from '../src/schema/index.js';
import { Unit, makeTempDir } from './support.js';

describe('exportSchema', () => {
    it('describes the bid model with definitions for nested types', () => {
        expect(exportSchema(BidModel)).toEqual({
            title: 'BidDSJsonModel',
            type: 'object',
            properties: {
                network: { title: 'network', allOf: [{ $ref: '#/definitions/Network' }] },
                scenario: { title: 'scenario', allOf: [{ $ref: '#/definitions/Scenario' }] },
            },
            required: ['network', 'scenario'],
            additionalProperties: false,
            definitions: {
                Network: {
                    title: 'Network',
                    type: 'object',
                    properties: {
                        generators: { title: 'generators', type: 'array', items: { $ref: '#/definitions/Generator' } },
                    },
                    required: ['generators'],
                    additionalProperties: false,
                },
                Generator: {
                    title: 'Generator',
                    type: 'object',
                    properties: {
                        uid: { title: 'uid', type: 'string' },
                        bus: { title: 'bus', type: 'string' },
                    },
                    required: ['uid', 'bus'],
                    additionalProperties: false,
                },
                Scenario: {
                    title: 'Scenario',
                    type: 'object',
                    properties: {
                        time_series: {
                            title: 'time_series',
                            description: 'Time-series data file, relative to this file',
                            type: 'string',
                            format: 'path',
                        },
                    },
                    additionalProperties: false,
                },
            },
        });
    });

    it('lists definitions in first-encounter order', () => {
        expect(Object.keys(exportSchema(BidModel).definitions ?? {})).toEqual(['Network', 'Generator', 'Scenario']);
    });

    it('leaves out definitions for a flat entity type', () => {
        expect(exportSchema(Generator).definitions).toBeUndefined();
    });

    it('names properties by alias or by field name', () => {
        const byAlias = exportSchema(Unit);
        const byName = exportSchema(Unit, { useAliases: false });

        expect(Object.keys(byAlias.properties)).toEqual(['unit-id', 'Capacity MW', 'online', 'count']);
        expect(byAlias.required).toEqual(['unit-id']);
        expect(Object.keys(byName.properties)).toEqual(['unitId', 'capacity', 'online', 'count']);
        expect(byName.required).toEqual(['unitId']);
        expect(byName.properties.count).toEqual({ title: 'count', type: 'integer' });
    });

    it('describes the canonical records serialize emits', () => {
        const unit = validate(Unit, { unitId: 'U1', capacity: null, count: '3' });
        const document = exportSchema(Unit, { useAliases: false });
        const record = serialize(unit, { useAliases: false });

        expect(record).toEqual({ unitId: 'U1', count: 3 });
        expect(Object.keys(record).every((key) => key in document.properties)).toBe(true);
        expect(document.properties.count?.type).toBe('integer');
    });

    it('rejects two entity types sharing a name', () => {
        const first = defineEntity('Part', { id: field.string() });
        const second = defineEntity('Part', { code: field.string() });
        const Assembly = defineEntity('Assembly', {
            main: field.entity(first),
            spare: field.entity(second),
        });

        expect(() => exportSchema(Assembly)).toThrow(DeclarationError);
    });
});

describe('schemaJson', () => {
    it('is byte-identical across calls', () => {
        expect(schemaJson(BidModel)).toBe(schemaJson(BidModel));
    });

    it('renders compact text with indent 0', () => {
        expect(schemaJson(Generator, { indent: 0 })).toBe(
            '{"title":"Generator","type":"object","properties":{"uid":{"title":"uid","type":"string"},' +
                '"bus":{"title":"bus","type":"string"}},"required":["uid","bus"],"additionalProperties":false}'
        );
    });

    it('writes the schema to a file', () => {
        const file = path.join(makeTempDir(), 'schema.json');
        writeSchema(BidModel, file, { useAliases: false });

        expect(JSON.parse(fs.readFileSync(file, 'utf-8'))).toEqual(exportSchema(BidModel, { useAliases: false }));
    });
});
