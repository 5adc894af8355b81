import type { AnyEntityType, FieldDescriptor } from './schema.contract.js';
import { SchemaViolation } from './schema.errors.js';

/**
 * Validates and normalizes one field value; throws SchemaViolation.
 * Returns undefined for an absent optional field.
 */
export type FieldParser = (
    entity: AnyEntityType,
    descriptor: FieldDescriptor,
    value: unknown,
    baseDir: string
) => unknown;

interface InstanceMeta {
    entity: AnyEntityType;
    baseDir: string;
}

const instances = new WeakMap<object, InstanceMeta>();

export function isModelInstance(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && instances.has(value);
}

/**
 * Entity type an instance was validated against
 */
export function entityOf(value: object): AnyEntityType | undefined {
    return instances.get(value)?.entity;
}

/**
 * Resolution base the instance was validated with
 */
export function baseDirOf(value: object): string | undefined {
    return instances.get(value)?.baseDir;
}

function freezeValue(value: unknown): unknown {
    return Array.isArray(value) ? Object.freeze(value) : value;
}

/**
 * Wrap already-validated values as a closed model instance.
 *
 * Assigning a declared field runs `parseField` and stores its result;
 * anything else that would change the shape is rejected.
 */
export function createInstance(
    entity: AnyEntityType,
    values: Record<string, unknown>,
    baseDir: string,
    parseField: FieldParser
): Record<string, unknown> {
    const target: Record<string, unknown> = {};

    for (const descriptor of entity.fields) {
        const value = values[descriptor.name];
        if (value !== undefined) {
            target[descriptor.name] = freezeValue(value);
        }
    }

    const proxy = new Proxy(target, {
        set(obj, key, value) {
            if (typeof key === 'symbol') return false;

            const descriptor = entity.byName.get(key);
            if (!descriptor) {
                throw new SchemaViolation([
                    {
                        kind: 'UnknownField',
                        entity: entity.name,
                        field: key,
                        path: [key],
                        message: `Unknown field '${key}' for ${entity.name}`,
                    },
                ]);
            }

            const parsed = parseField(entity, descriptor, value, baseDir);
            if (parsed === undefined) {
                delete obj[key];
            } else {
                obj[key] = freezeValue(parsed);
            }
            return true;
        },

        deleteProperty(obj, key) {
            if (typeof key === 'symbol') return false;

            const descriptor = entity.byName.get(key);
            if (descriptor?.required) {
                throw new SchemaViolation([
                    {
                        kind: 'MissingField',
                        entity: entity.name,
                        field: key,
                        path: [key],
                        message: `Missing required field '${key}' for ${entity.name}`,
                    },
                ]);
            }
            delete obj[key];
            return true;
        },

        defineProperty() {
            throw new TypeError(`${entity.name} fields can only be changed by assignment`);
        },

        setPrototypeOf() {
            return false;
        },
    });

    instances.set(proxy, { entity, baseDir });
    return proxy;
}
