/**
 * Error taxonomy for the model layer
 *
 * Validation failures are grouped under SchemaViolation; file-level
 * failures raise LoadError or MalformedInput.
 */

export type ModelErrorCode =
    | 'SCHEMA_VIOLATION'
    | 'MALFORMED_INPUT'
    | 'LOAD_ERROR'
    | 'DECLARATION_ERROR';

export type ViolationKind = 'UnknownField' | 'MissingField' | 'TypeMismatch';

/**
 * One segment of a location inside a record: a field name or a sequence index
 */
export type PathSegment = string | number;

export interface Violation {
    kind: ViolationKind;
    entity: string;
    field: string;
    path: PathSegment[];
    expected?: string;
    actual?: string;
    message: string;
}

export class ModelError extends Error {
    readonly code: ModelErrorCode;

    constructor(code: ModelErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.code = code;
    }
}

/**
 * Render a record location as `generators[1].bus`
 */
export function formatPath(path: readonly PathSegment[]): string {
    if (path.length === 0) return '<root>';

    let out = '';
    for (const segment of path) {
        if (typeof segment === 'number') {
            out += `[${segment}]`;
        } else {
            out += out === '' ? segment : `.${segment}`;
        }
    }
    return out;
}

export class SchemaViolation extends ModelError {
    readonly kind: ViolationKind;
    readonly entity: string;
    readonly field: string;
    readonly path: PathSegment[];
    readonly expected?: string;
    readonly actual?: string;
    /** Every violation found in the same pass; the reported one is first */
    readonly issues: Violation[];

    constructor(issues: Violation[]) {
        const [first] = issues;
        if (!first) {
            throw new TypeError('SchemaViolation requires at least one issue');
        }
        super('SCHEMA_VIOLATION', `${formatPath(first.path)}: ${first.message}`);
        this.kind = first.kind;
        this.entity = first.entity;
        this.field = first.field;
        this.path = first.path;
        this.expected = first.expected;
        this.actual = first.actual;
        this.issues = issues;
    }

    get pathString(): string {
        return formatPath(this.path);
    }
}

export class MalformedInput extends ModelError {
    readonly file: string;

    constructor(file: string, cause: unknown) {
        const detail = cause instanceof Error ? cause.message : String(cause);
        super('MALFORMED_INPUT', `Failed to parse ${file}: ${detail}`, { cause });
        this.file = file;
    }
}

export class LoadError extends ModelError {
    readonly file: string;

    constructor(file: string, operation: 'read' | 'write', cause: unknown) {
        const detail = cause instanceof Error ? cause.message : String(cause);
        super('LOAD_ERROR', `Failed to ${operation} ${file}: ${detail}`, { cause });
        this.file = file;
    }
}

export class DeclarationError extends ModelError {
    constructor(message: string) {
        super('DECLARATION_ERROR', message);
    }
}
