import { externalName } from './schema.contract.js';
import { entityOf, isModelInstance } from './schema.instance.js';

/**
 * Plain JSON-compatible value
 */
export type CanonicalValue = string | number | boolean | null | CanonicalValue[] | CanonicalRecord;

export interface CanonicalRecord {
    [key: string]: CanonicalValue;
}

export interface SerializeOptions {
    /** Emit declared aliases instead of internal field names (default true) */
    useAliases?: boolean;
    /**
     * Dotted paths of internal field names to omit, e.g. `network.generators.bus`.
     * On a sequence, a numeric segment addresses one element and any other
     * segment applies to every element.
     */
    exclude?: readonly string[];
}

/**
 * Exclusion tree built from dotted paths; an entry with no children drops the
 * whole value at that position.
 */
interface ExcludeNode {
    children: Map<string, ExcludeNode>;
}

function buildExcludeTree(paths: readonly string[]): ExcludeNode {
    const root: ExcludeNode = { children: new Map() };

    for (const dotted of paths) {
        let node = root;
        for (const segment of dotted.split('.').filter((s) => s !== '')) {
            let next = node.children.get(segment);
            if (!next) {
                next = { children: new Map() };
                node.children.set(segment, next);
            }
            node = next;
        }
    }
    return root;
}

function isLeaf(node: ExcludeNode | undefined): boolean {
    return node !== undefined && node.children.size === 0;
}

function isIndex(segment: string): boolean {
    return /^\d+$/.test(segment);
}

/**
 * Exclusions for one element of a sequence: shared entries plus the element's own
 */
function elementExclusions(node: ExcludeNode | undefined, index: number): ExcludeNode | undefined {
    if (!node) return undefined;

    const merged: ExcludeNode = { children: new Map() };
    for (const [segment, child] of node.children) {
        if (!isIndex(segment)) merged.children.set(segment, child);
    }
    const own = node.children.get(String(index));
    if (own) {
        for (const [segment, child] of own.children) merged.children.set(segment, child);
    }
    return merged.children.size > 0 ? merged : undefined;
}

function serializeInstance(
    instance: Record<string, unknown>,
    useAliases: boolean,
    exclude: ExcludeNode | undefined
): CanonicalRecord {
    const entity = entityOf(instance);
    const out: CanonicalRecord = {};

    if (!entity) {
        return serializeRecord(instance, useAliases, exclude);
    }

    for (const descriptor of entity.fields) {
        const excluded = exclude?.children.get(descriptor.name);
        if (isLeaf(excluded)) continue;

        const value = instance[descriptor.name];
        if (value === undefined) continue;

        out[externalName(descriptor, useAliases)] = serializeItem(value, useAliases, excluded);
    }
    return out;
}

function serializeRecord(
    record: Record<string, unknown>,
    useAliases: boolean,
    exclude: ExcludeNode | undefined
): CanonicalRecord {
    const out: CanonicalRecord = {};
    for (const [key, value] of Object.entries(record)) {
        const excluded = exclude?.children.get(key);
        if (isLeaf(excluded) || value === undefined) continue;
        out[key] = serializeItem(value, useAliases, excluded);
    }
    return out;
}

function serializeItem(value: unknown, useAliases: boolean, exclude: ExcludeNode | undefined): CanonicalValue {
    if (isModelInstance(value)) {
        return serializeInstance(value, useAliases, exclude);
    }

    if (Array.isArray(value)) {
        const out: CanonicalValue[] = [];
        value.forEach((item, index) => {
            if (isLeaf(exclude?.children.get(String(index)))) return;
            out.push(serializeItem(item, useAliases, elementExclusions(exclude, index)));
        });
        return out;
    }

    if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
        return value;
    }

    if (typeof value === 'object') {
        return serializeRecord(Object.fromEntries(Object.entries(value)), useAliases, exclude);
    }

    throw new TypeError(`Cannot serialize value of type ${typeof value}`);
}

/**
 * Convert a model instance into a canonical record of plain values.
 * Plain records are accepted too; exclusions then address their own keys.
 */
export function serialize(instance: object, options: SerializeOptions = {}): CanonicalRecord {
    const useAliases = options.useAliases ?? true;
    const exclude = options.exclude && options.exclude.length > 0 ? buildExcludeTree(options.exclude) : undefined;

    if (!isModelInstance(instance)) {
        return serializeRecord(Object.fromEntries(Object.entries(instance)), useAliases, exclude);
    }
    return serializeInstance(instance, useAliases, exclude);
}

/**
 * Normalize nested plain data (records, sequences, instances) into canonical form
 */
export function serializeData(value: unknown, options: Pick<SerializeOptions, 'useAliases'> = {}): CanonicalValue {
    return serializeItem(value, options.useAliases ?? true, undefined);
}
