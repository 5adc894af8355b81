/**
 * Field Registry Contract
 *
 * Entity types are declared as ordered tables of field descriptors.
 * The validator, the serializer and the schema exporter all read the
 * same tables, so an entity type has exactly one definition.
 */

import { DeclarationError } from './schema.errors.js';

/**
 * Scalar kinds. `path` is a string resolved against the resolution base.
 */
export type ScalarKind = 'string' | 'number' | 'integer' | 'boolean' | 'path';

export type FieldKind = ScalarKind | 'entity' | 'sequence';

/**
 * Display metadata accepted by every field builder
 */
export interface FieldOptions {
    title?: string;
    alias?: string;
    description?: string;
}

/**
 * Field specification as written in an entity declaration.
 * `T` is the validated value type, `R` whether the field is required.
 */
export interface FieldSpec<T = unknown, R extends boolean = boolean> extends FieldOptions {
    readonly kind: FieldKind;
    readonly required: R;
    readonly entity?: AnyEntityType;
    // Type-level marker, never set at runtime
    readonly _value?: T;
}

/**
 * Field specification bound to its name inside an entity type
 */
export interface FieldDescriptor {
    readonly name: string;
    readonly kind: FieldKind;
    readonly required: boolean;
    readonly title: string;
    readonly alias?: string;
    readonly description?: string;
    readonly entity?: AnyEntityType;
}

export type FieldMap = Record<string, FieldSpec>;

export interface EntityType<F extends FieldMap = FieldMap> {
    readonly name: string;
    readonly title: string;
    readonly description?: string;
    readonly shape: F;
    /** Declaration order */
    readonly fields: readonly FieldDescriptor[];
    readonly byName: ReadonlyMap<string, FieldDescriptor>;
    readonly byAlias: ReadonlyMap<string, FieldDescriptor>;
}

export type AnyEntityType = EntityType<FieldMap>;

type RequiredKeys<F extends FieldMap> = {
    [K in keyof F]: F[K] extends FieldSpec<unknown, true> ? K : never;
}[keyof F];

type OptionalKeys<F extends FieldMap> = Exclude<keyof F, RequiredKeys<F>>;

type FieldValue<S> = S extends FieldSpec<infer T, boolean> ? T : never;

type Flatten<T> = { [K in keyof T]: T[K] };

export type InferShape<F extends FieldMap> = Flatten<
    { -readonly [K in RequiredKeys<F>]: FieldValue<F[K]> } & {
        -readonly [K in OptionalKeys<F>]?: FieldValue<F[K]>;
    }
>;

/**
 * Validated value of an entity type
 */
export type ModelInstance<E extends AnyEntityType> = E extends EntityType<infer F> ? InferShape<F> : never;

/**
 * Field builders
 */
export const field = {
    string: (options: FieldOptions = {}): FieldSpec<string, true> => ({ ...options, kind: 'string', required: true }),

    number: (options: FieldOptions = {}): FieldSpec<number, true> => ({ ...options, kind: 'number', required: true }),

    integer: (options: FieldOptions = {}): FieldSpec<number, true> => ({ ...options, kind: 'integer', required: true }),

    boolean: (options: FieldOptions = {}): FieldSpec<boolean, true> => ({ ...options, kind: 'boolean', required: true }),

    path: (options: FieldOptions = {}): FieldSpec<string, true> => ({ ...options, kind: 'path', required: true }),

    entity: <E extends AnyEntityType>(entity: E, options: FieldOptions = {}): FieldSpec<ModelInstance<E>, true> => ({
        ...options,
        kind: 'entity',
        required: true,
        entity,
    }),

    sequence: <E extends AnyEntityType>(entity: E, options: FieldOptions = {}): FieldSpec<ModelInstance<E>[], true> => ({
        ...options,
        kind: 'sequence',
        required: true,
        entity,
    }),

    optional: <T>(spec: FieldSpec<T, true>): FieldSpec<T, false> => ({ ...spec, required: false }),
};

/**
 * Declare an entity type
 */
export function defineEntity<F extends FieldMap>(
    name: string,
    shape: F,
    options: { title?: string; description?: string } = {}
): EntityType<F> {
    if (name.trim() === '') {
        throw new DeclarationError('Entity type name must not be empty');
    }

    const fields: FieldDescriptor[] = [];
    const byName = new Map<string, FieldDescriptor>();
    const byAlias = new Map<string, FieldDescriptor>();

    for (const [fieldName, spec] of Object.entries(shape)) {
        if ((spec.kind === 'entity' || spec.kind === 'sequence') && !spec.entity) {
            throw new DeclarationError(`${name}.${fieldName}: ${spec.kind} field needs an entity type`);
        }

        const descriptor: FieldDescriptor = Object.freeze({
            name: fieldName,
            kind: spec.kind,
            required: spec.required,
            title: spec.title ?? fieldName,
            ...(spec.alias !== undefined ? { alias: spec.alias } : {}),
            ...(spec.description !== undefined ? { description: spec.description } : {}),
            ...(spec.entity ? { entity: spec.entity } : {}),
        });

        fields.push(descriptor);
        byName.set(fieldName, descriptor);
    }

    // Aliases share one key space with field names
    for (const descriptor of fields) {
        if (descriptor.alias === undefined || descriptor.alias === descriptor.name) continue;

        const clash = byName.get(descriptor.alias) ?? byAlias.get(descriptor.alias);
        if (clash) {
            throw new DeclarationError(
                `${name}.${descriptor.name}: alias '${descriptor.alias}' collides with field '${clash.name}'`
            );
        }
        byAlias.set(descriptor.alias, descriptor);
    }

    return Object.freeze({
        name,
        title: options.title ?? name,
        ...(options.description !== undefined ? { description: options.description } : {}),
        shape,
        fields: Object.freeze(fields),
        byName,
        byAlias,
    });
}

/**
 * Key under which a field appears in serialized output
 */
export function externalName(descriptor: FieldDescriptor, useAliases: boolean): string {
    return useAliases && descriptor.alias !== undefined ? descriptor.alias : descriptor.name;
}
