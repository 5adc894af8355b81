/**
 * Schema Exporter
 *
 * Produces a draft-07 JSON Schema from the same field tables the
 * validator enforces. Output is deterministic: properties follow
 * declaration order and definitions follow first encounter.
 *
 * The document describes canonical records, the form `serialize` emits.
 * Input accepted by `validate` is wider: `null` for an optional field,
 * the internal name where an alias is declared, and numeric or boolean
 * strings for number, integer and boolean fields.
 */

import { externalName, type AnyEntityType, type FieldDescriptor, type ScalarKind } from './schema.contract.js';
import { DeclarationError } from './schema.errors.js';
import { dump, type DumpOptions } from './schema.loader.js';
import { config } from '../config/index.js';

export interface JsonSchemaProperty {
    title: string;
    description?: string;
    type?: 'string' | 'number' | 'integer' | 'boolean' | 'array';
    format?: string;
    items?: { $ref: string };
    allOf?: Array<{ $ref: string }>;
}

export interface JsonSchemaObject {
    title: string;
    description?: string;
    type: 'object';
    properties: Record<string, JsonSchemaProperty>;
    required?: string[];
    additionalProperties: false;
}

export interface JsonSchemaDocument extends JsonSchemaObject {
    definitions?: Record<string, JsonSchemaObject>;
}

export interface ExportOptions {
    /** Describe fields by their aliases (default true) */
    useAliases?: boolean;
}

const SCALAR_TYPES: Record<ScalarKind, Pick<JsonSchemaProperty, 'type' | 'format'>> = {
    string: { type: 'string' },
    path: { type: 'string', format: 'path' },
    number: { type: 'number' },
    integer: { type: 'integer' },
    boolean: { type: 'boolean' },
};

function refTo(entity: AnyEntityType): { $ref: string } {
    return { $ref: `#/definitions/${entity.name}` };
}

class SchemaWalker {
    readonly definitions = new Map<string, JsonSchemaObject>();
    private readonly seen = new Map<string, AnyEntityType>();

    constructor(private readonly useAliases: boolean) {}

    root(entity: AnyEntityType): JsonSchemaObject {
        this.seen.set(entity.name, entity);
        return this.objectSchema(entity);
    }

    /**
     * Register a nested entity type, once per name
     */
    private define(entity: AnyEntityType): void {
        const known = this.seen.get(entity.name);
        if (known) {
            if (known !== entity) {
                throw new DeclarationError(`Two different entity types are named '${entity.name}'`);
            }
            return;
        }
        this.seen.set(entity.name, entity);

        // Reserve the slot so definitions keep first-encounter order
        this.definitions.set(entity.name, { title: entity.title, type: 'object', properties: {}, additionalProperties: false });
        this.definitions.set(entity.name, this.objectSchema(entity));
    }

    private nested(descriptor: FieldDescriptor): AnyEntityType {
        if (!descriptor.entity) {
            throw new DeclarationError(`Field '${descriptor.name}' has no entity type`);
        }
        this.define(descriptor.entity);
        return descriptor.entity;
    }

    private property(descriptor: FieldDescriptor): JsonSchemaProperty {
        const base: JsonSchemaProperty = {
            title: descriptor.title,
            ...(descriptor.description !== undefined ? { description: descriptor.description } : {}),
        };

        switch (descriptor.kind) {
            case 'entity':
                return { ...base, allOf: [refTo(this.nested(descriptor))] };
            case 'sequence':
                return { ...base, type: 'array', items: refTo(this.nested(descriptor)) };
            default:
                return { ...base, ...SCALAR_TYPES[descriptor.kind] };
        }
    }

    private objectSchema(entity: AnyEntityType): JsonSchemaObject {
        const properties: Record<string, JsonSchemaProperty> = {};
        const required: string[] = [];

        for (const descriptor of entity.fields) {
            const key = externalName(descriptor, this.useAliases);
            properties[key] = this.property(descriptor);
            if (descriptor.required) {
                required.push(key);
            }
        }

        return {
            title: entity.title,
            ...(entity.description !== undefined ? { description: entity.description } : {}),
            type: 'object',
            properties,
            ...(required.length > 0 ? { required } : {}),
            additionalProperties: false,
        };
    }
}

/**
 * Export the JSON Schema of an entity type
 */
export function exportSchema(entity: AnyEntityType, options: ExportOptions = {}): JsonSchemaDocument {
    const walker = new SchemaWalker(options.useAliases ?? true);
    const document: JsonSchemaDocument = walker.root(entity);

    if (walker.definitions.size > 0) {
        document.definitions = Object.fromEntries(walker.definitions);
    }
    return document;
}

/**
 * JSON Schema of an entity type as text
 */
export function schemaJson(entity: AnyEntityType, options: ExportOptions & { indent?: number } = {}): string {
    return JSON.stringify(exportSchema(entity, options), null, options.indent ?? config.output.indent);
}

/**
 * Write the JSON Schema of an entity type to a file
 */
export function writeSchema(entity: AnyEntityType, file: string, options: ExportOptions & DumpOptions = {}): void {
    dump(exportSchema(entity, options), file, options);
}
