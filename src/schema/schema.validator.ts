import * as path from 'node:path';
import { z } from 'zod';
import type { AnyEntityType, FieldDescriptor, ModelInstance } from './schema.contract.js';
import { SchemaViolation, type PathSegment, type Violation } from './schema.errors.js';
import { createInstance } from './schema.instance.js';
import { resolutionContext } from './resolution.context.js';
import { createModuleLogger } from '../utils/logger.js';

const logger = createModuleLogger('validator');

export interface ValidateOptions {
    /** Base for relative `path` fields; defaults to the current resolution context */
    baseDir?: string;
}

/**
 * Compiled schema per entity type
 */
const compiled = new WeakMap<AnyEntityType, z.ZodTypeAny>();

/**
 * Resolution base of the parse in progress. Parsing is synchronous, so the
 * base is set for the duration of one `safeParse` call.
 */
let parseBase = '';

function withBase<T>(baseDir: string, parse: () => T): T {
    const previous = parseBase;
    parseBase = baseDir;
    try {
        return parse();
    } finally {
        parseBase = previous;
    }
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

/**
 * Decimal numeric strings become numbers; everything else is left for zod to reject
 */
function coerceNumber(value: unknown): unknown {
    if (typeof value !== 'string') return value;
    const trimmed = value.trim();
    if (!DECIMAL.test(trimmed)) return value;
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : value;
}

function coerceBoolean(value: unknown): unknown {
    if (typeof value !== 'string') return value;
    const lowered = value.trim().toLowerCase();
    if (lowered === 'true') return true;
    if (lowered === 'false') return false;
    return value;
}

/**
 * Rename alias keys to field names. A key that is neither, or an alias whose
 * field name is also present, is kept so the strict check reports it.
 */
function applyAliases(entity: AnyEntityType, raw: unknown): unknown {
    if (!isRecord(raw)) return raw;

    const out: Record<string, unknown> = Object.create(null);
    for (const [key, value] of Object.entries(raw)) {
        const aliased = entity.byName.has(key) ? undefined : entity.byAlias.get(key);
        if (aliased && !Object.hasOwn(raw, aliased.name)) {
            out[aliased.name] = value;
        } else {
            out[key] = value;
        }
    }
    return out;
}

function requireEntity(descriptor: FieldDescriptor): AnyEntityType {
    if (!descriptor.entity) {
        throw new TypeError(`Field '${descriptor.name}' has no entity type`);
    }
    return descriptor.entity;
}

function scalarOrNestedSchema(descriptor: FieldDescriptor): z.ZodTypeAny {
    switch (descriptor.kind) {
        case 'string':
            return z.string().trim();
        case 'path':
            return z
                .string()
                .trim()
                .min(1)
                .transform((value) => path.resolve(parseBase, value));
        case 'number':
            return z.preprocess(coerceNumber, z.number().finite());
        case 'integer':
            return z.preprocess(coerceNumber, z.number().int());
        case 'boolean':
            return z.preprocess(coerceBoolean, z.boolean());
        case 'entity':
            return entitySchema(requireEntity(descriptor));
        case 'sequence':
            return z.array(entitySchema(requireEntity(descriptor)));
    }
}

function fieldSchema(descriptor: FieldDescriptor): z.ZodTypeAny {
    const schema = scalarOrNestedSchema(descriptor);
    if (descriptor.required) return schema;

    // null and absence both mean "not set"
    return schema.nullish().transform((value) => value ?? undefined);
}

function entitySchema(entity: AnyEntityType): z.ZodTypeAny {
    const cached = compiled.get(entity);
    if (cached) return cached;

    const shape: Record<string, z.ZodTypeAny> = {};
    for (const descriptor of entity.fields) {
        shape[descriptor.name] = fieldSchema(descriptor);
    }

    const schema = z
        .preprocess((raw) => applyAliases(entity, raw), z.object(shape).strict())
        .transform((values: Record<string, unknown>) => createInstance(entity, values, parseBase, parseField));

    compiled.set(entity, schema);
    return schema;
}

/* -------------------------------------------------------------------------- */
/* Issue mapping                                                              */
/* -------------------------------------------------------------------------- */

interface Location {
    /** Entity type declaring the field at the location */
    owner: AnyEntityType;
    descriptor?: FieldDescriptor;
    /** Location is one element of a sequence */
    element: boolean;
}

function locate(root: AnyEntityType, segments: readonly PathSegment[]): Location {
    let owner = root;
    let valueEntity: AnyEntityType | undefined = root;
    let descriptor: FieldDescriptor | undefined;
    let element = false;

    for (const segment of segments) {
        if (typeof segment === 'number') {
            element = true;
            valueEntity = descriptor?.kind === 'sequence' ? descriptor.entity : undefined;
            continue;
        }

        if (!valueEntity) break;
        owner = valueEntity;
        descriptor = owner.byName.get(segment);
        element = false;
        valueEntity = descriptor?.kind === 'entity' ? descriptor.entity : undefined;
    }

    return { owner, descriptor, element };
}

function rawAt(root: unknown, entity: AnyEntityType, segments: readonly PathSegment[]): unknown {
    let value = root;
    let current: AnyEntityType | undefined = entity;

    for (const segment of segments) {
        if (typeof segment === 'number') {
            value = Array.isArray(value) ? value[segment] : undefined;
            continue;
        }
        if (!isRecord(value)) return undefined;

        const descriptor: FieldDescriptor | undefined = current?.byName.get(segment);
        if (Object.hasOwn(value, segment)) {
            value = value[segment];
        } else if (descriptor?.alias !== undefined) {
            value = value[descriptor.alias];
        } else {
            value = undefined;
        }
        current = descriptor?.entity;
    }
    return value;
}

function describeValue(value: unknown): string {
    if (value === null) return 'null';
    if (Array.isArray(value)) return 'array';
    if (typeof value === 'string' && value.trim() === '') return 'empty string';
    return typeof value;
}

function describeExpected(location: Location): string {
    const { owner, descriptor, element } = location;
    if (!descriptor) return owner.name;
    if (element) return requireEntity(descriptor).name;

    switch (descriptor.kind) {
        case 'entity':
            return requireEntity(descriptor).name;
        case 'sequence':
            return `${requireEntity(descriptor).name}[]`;
        default:
            return descriptor.kind;
    }
}

/**
 * Position of the raw key holding a field, by name or by alias
 */
function rawKeyIndex(record: Record<string, unknown>, descriptor: FieldDescriptor | undefined, segment: string): number {
    const keys = Object.keys(record);
    let index = keys.indexOf(segment);
    if (index < 0 && descriptor?.alias !== undefined) index = keys.indexOf(descriptor.alias);
    return index < 0 ? keys.length : index;
}

/**
 * Sort key placing a violation in depth-first order: within one record,
 * unknown keys first, then missing fields, then field values in the order
 * the record gives them; sequence elements in index order.
 */
function orderKey(entity: AnyEntityType, raw: unknown, violation: Violation): number[] {
    const key: number[] = [];
    let value = raw;
    let current: AnyEntityType | undefined = entity;
    const last = violation.path.length - 1;

    for (const [position, segment] of violation.path.entries()) {
        if (typeof segment === 'number') {
            key.push(segment);
            value = Array.isArray(value) ? value[segment] : undefined;
            continue;
        }

        const record: Record<string, unknown> = isRecord(value) ? value : {};
        const descriptor: FieldDescriptor | undefined = current?.byName.get(segment);

        if (position === last && violation.kind === 'UnknownField') {
            key.push(0, rawKeyIndex(record, undefined, segment));
        } else if (position === last && violation.kind === 'MissingField') {
            key.push(1, current ? current.fields.findIndex((d) => d.name === segment) : 0);
        } else {
            key.push(2, rawKeyIndex(record, descriptor, segment));
        }

        if (Object.hasOwn(record, segment)) {
            value = record[segment];
        } else {
            value = descriptor?.alias !== undefined ? record[descriptor.alias] : undefined;
        }
        current = descriptor?.entity;
    }
    return key;
}

function compareKeys(a: readonly number[], b: readonly number[]): number {
    const length = Math.min(a.length, b.length);
    for (let i = 0; i < length; i++) {
        const diff = (a[i] ?? 0) - (b[i] ?? 0);
        if (diff !== 0) return diff;
    }
    return a.length - b.length;
}

function toViolations(entity: AnyEntityType, issues: readonly z.ZodIssue[], raw: unknown): Violation[] {
    const violations: Violation[] = [];

    for (const issue of issues) {
        if (issue.code === z.ZodIssueCode.unrecognized_keys) {
            const location = locate(entity, issue.path);
            const owner = location.descriptor?.entity ?? location.owner;
            for (const key of issue.keys) {
                violations.push({
                    kind: 'UnknownField',
                    entity: owner.name,
                    field: key,
                    path: [...issue.path, key],
                    message: `Unknown field '${key}' for ${owner.name}`,
                });
            }
            continue;
        }

        const location = locate(entity, issue.path);
        const field = location.descriptor?.name ?? '';
        const actualValue = rawAt(raw, entity, issue.path);

        if (issue.code === z.ZodIssueCode.invalid_type && actualValue === undefined) {
            violations.push({
                kind: 'MissingField',
                entity: location.owner.name,
                field,
                path: [...issue.path],
                message: `Missing required field '${field}' for ${location.owner.name}`,
            });
            continue;
        }

        const expected = describeExpected(location);
        const actual = describeValue(actualValue);
        violations.push({
            kind: 'TypeMismatch',
            entity: location.owner.name,
            field,
            path: [...issue.path],
            expected,
            actual,
            message: `Expected ${expected}, received ${actual}`,
        });
    }

    const keyed = violations.map((violation) => ({ violation, key: orderKey(entity, raw, violation) }));
    keyed.sort((a, b) => compareKeys(a.key, b.key));
    return keyed.map(({ violation }) => violation);
}

/* -------------------------------------------------------------------------- */
/* Public API                                                                 */
/* -------------------------------------------------------------------------- */

/**
 * Validate one field value of `entity`. Used when a field is assigned on an
 * existing instance.
 */
export function parseField(
    entity: AnyEntityType,
    descriptor: FieldDescriptor,
    value: unknown,
    baseDir: string
): unknown {
    const result = withBase(baseDir, () => fieldSchema(descriptor).safeParse(value));
    if (result.success) return result.data;

    const wrapped = { [descriptor.name]: value };
    const issues = result.error.issues.map((issue) => ({ ...issue, path: [descriptor.name, ...issue.path] }));
    throw new SchemaViolation(toViolations(entity, issues, wrapped));
}

/**
 * Validate a raw record against an entity type.
 *
 * Throws SchemaViolation describing the first violation; no partial
 * instance is ever returned.
 */
export function validate<E extends AnyEntityType>(
    entity: E,
    raw: unknown,
    options: ValidateOptions = {}
): ModelInstance<E> {
    const baseDir = path.resolve(resolutionContext.current, options.baseDir ?? '');
    const result = withBase(baseDir, () => entitySchema(entity).safeParse(raw));

    if (!result.success) {
        throw new SchemaViolation(toViolations(entity, result.error.issues, raw));
    }

    const instance: ModelInstance<E> = result.data;
    logger.debug({ entity: entity.name, baseDir }, 'Validated record');
    return instance;
}
