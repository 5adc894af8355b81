import { describe, expect, it } from 'vitest';
import { BidModel, Generator, Network } from '../src/bid/bid.model.js';
import { SchemaViolation, entityOf, isModelInstance, validate } from '../src/schema/index.js';
import { Unit } from './support.js';

const rawModel = {
    network: {
        generators: [
            { uid: 'G1', bus: 'B1' },
            { uid: 'G2', bus: 'B2' },
        ],
    },
    scenario: {},
};

describe('model instances', () => {
    it('remember their entity type', () => {
        const generator = validate(Generator, { uid: 'G1', bus: 'B1' });

        expect(isModelInstance(generator)).toBe(true);
        expect(entityOf(generator)).toBe(Generator);
        expect(isModelInstance({ uid: 'G1', bus: 'B1' })).toBe(false);
    });

    it('validate and normalize assigned values', () => {
        const generator = validate(Generator, { uid: 'G1', bus: 'B1' });
        generator.uid = '  G9 ';

        expect(generator.uid).toBe('G9');
    });

    it('reject assignments of the wrong type and stay unchanged', () => {
        const generator = validate(Generator, { uid: 'G1', bus: 'B1' });

        expect(() => Reflect.set(generator, 'bus', 5)).toThrow(SchemaViolation);
        expect(generator.bus).toBe('B1');
    });

    it('reject undeclared properties', () => {
        const generator = validate(Generator, { uid: 'G1', bus: 'B1' });

        expect(() => Reflect.set(generator, 'capacity', 100)).toThrow(SchemaViolation);
        expect(Object.keys(generator)).toEqual(['uid', 'bus']);
    });

    it('reject deleting a required field', () => {
        const generator = validate(Generator, { uid: 'G1', bus: 'B1' });

        expect(() => Reflect.deleteProperty(generator, 'uid')).toThrow(SchemaViolation);
        expect(generator.uid).toBe('G1');
    });

    it('reject defineProperty', () => {
        const generator = validate(Generator, { uid: 'G1', bus: 'B1' });

        expect(() => Object.defineProperty(generator, 'uid', { value: 'G2' })).toThrow(TypeError);
    });

    it('clear an optional field assigned undefined', () => {
        const unit = validate(Unit, { unitId: 'U1', capacity: 5 });
        unit.capacity = undefined;

        expect('capacity' in unit).toBe(false);
    });

    it('freeze sequences so elements are only replaced by assignment', () => {
        const network = validate(Network, rawModel.network);

        expect(() => network.generators.push({ uid: 'G3', bus: 'B3' })).toThrow(TypeError);

        network.generators = [...network.generators, { uid: 'G3', bus: 'B3' }];
        expect(network.generators).toHaveLength(3);
        expect(isModelInstance(network.generators[2])).toBe(true);
    });

    it('report the path of a nested assignment failure', () => {
        const network = validate(Network, rawModel.network);

        try {
            Reflect.set(network, 'generators', [{ uid: 'G1' }]);
            expect.unreachable();
        } catch (error) {
            expect(error).toBeInstanceOf(SchemaViolation);
            if (error instanceof SchemaViolation) {
                expect(error.kind).toBe('MissingField');
                expect(error.pathString).toBe('generators[0].bus');
            }
        }
        expect(network.generators).toHaveLength(2);
    });

    it('own their nested instances', () => {
        const first = validate(BidModel, rawModel);
        const second = validate(BidModel, rawModel);

        second.network = first.network;

        expect(second.network).not.toBe(first.network);
        expect(second.network).toEqual(first.network);
    });
});
