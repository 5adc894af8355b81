import { defineEntity, field, type AnyEntityType, type ModelInstance } from '../schema/index.js';

/**
 * Bid Data Model
 *
 * Entity types of a power-network bid dataset.
 */

export const Generator = defineEntity('Generator', {
    uid: field.string({ title: 'uid' }),
    bus: field.string({ title: 'bus' }),
});

export const Network = defineEntity('Network', {
    generators: field.sequence(Generator, { title: 'generators' }),
});

export const Scenario = defineEntity('Scenario', {
    // Time series are written to a separate file next to the network file
    time_series: field.optional(
        field.path({
            title: 'time_series',
            description: 'Time-series data file, relative to this file',
        })
    ),
});

export const BidModel = defineEntity(
    'BidModel',
    {
        network: field.entity(Network, { title: 'network' }),
        scenario: field.entity(Scenario, { title: 'scenario' }),
    },
    { title: 'BidDSJsonModel' }
);

export type GeneratorRecord = ModelInstance<typeof Generator>;
export type NetworkRecord = ModelInstance<typeof Network>;
export type ScenarioRecord = ModelInstance<typeof Scenario>;
export type BidModelRecord = ModelInstance<typeof BidModel>;

export const entityRegistry: ReadonlyMap<string, AnyEntityType> = new Map<string, AnyEntityType>([
    ['BidModel', BidModel],
    ['Network', Network],
    ['Generator', Generator],
    ['Scenario', Scenario],
]);
