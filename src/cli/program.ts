/**
 * CLI for the bid data model
 */

import { Command } from 'commander';
import chalk from 'chalk';
import {
    ModelError,
    SchemaViolation,
    dump,
    load,
    schemaJson,
    serialize,
    writeSchema,
    type AnyEntityType,
} from '../schema/index.js';
import { entityRegistry } from '../bid/bid.model.js';
import { config } from '../config/index.js';

interface EntityOption {
    entity: string;
}

interface AliasOption {
    alias?: boolean;
}

interface NormalizeOptions extends EntityOption, AliasOption {
    exclude?: string[];
}

interface SchemaOptions extends EntityOption, AliasOption {
    indent?: string;
    output?: string;
}

export class CliError extends Error {}

function resolveEntity(name: string): AnyEntityType {
    const entity = entityRegistry.get(name);
    if (!entity) {
        throw new CliError(`Unknown entity '${name}'. Available: ${[...entityRegistry.keys()].join(', ')}`);
    }
    return entity;
}

function parseIndent(value: string | undefined): number {
    if (value === undefined) return config.output.indent;
    const parsed = parseInt(value, 10);
    if (isNaN(parsed) || parsed < 0) {
        throw new CliError(`Invalid indent '${value}'`);
    }
    return parsed;
}

/**
 * Print an error raised by a command
 */
export function reportError(error: unknown): void {
    if (error instanceof SchemaViolation) {
        console.error(chalk.red(`✗ ${error.kind} at ${error.pathString}`));
        console.error(chalk.red(`  ${error.message}`));
        if (error.issues.length > 1) {
            console.error(chalk.dim(`  ... and ${error.issues.length - 1} more`));
        }
        return;
    }
    if (error instanceof ModelError || error instanceof CliError) {
        console.error(chalk.red(`✗ ${error.message}`));
        return;
    }
    console.error(chalk.red(`✗ ${error instanceof Error ? error.message : String(error)}`));
}

export function buildProgram(): Command {
    const program = new Command();

    program
        .name('gridbid')
        .description('Validate, normalize and describe bid data model files')
        .version('1.0.0');

    program
        .command('validate')
        .description('Validate a model file')
        .argument('<file>', 'JSON file to validate')
        .option('-e, --entity <name>', 'Entity type of the file', 'BidModel')
        .action((file: string, options: EntityOption) => {
            const entity = resolveEntity(options.entity);
            const instance = load(entity, file);
            const fieldCount = Object.keys(instance).length;
            console.log(chalk.green(`✓ ${file} is a valid ${entity.name} (${fieldCount} fields set)`));
        });

    program
        .command('normalize')
        .description('Validate a model file and write its canonical form')
        .argument('<input>', 'JSON file to read')
        .argument('<output>', 'JSON file to write')
        .option('-e, --entity <name>', 'Entity type of the file', 'BidModel')
        .option('--alias', 'Write field aliases')
        .option('--no-alias', 'Write internal field names')
        .option('-x, --exclude <paths...>', 'Dotted field paths to leave out')
        .action((input: string, output: string, options: NormalizeOptions) => {
            const entity = resolveEntity(options.entity);
            const instance = load(entity, input);
            const record = serialize(instance, {
                useAliases: options.alias ?? config.output.byAlias,
                ...(options.exclude ? { exclude: options.exclude } : {}),
            });
            dump(record, output);
            console.log(chalk.green(`✓ Wrote ${output}`));
        });

    program
        .command('schema')
        .description('Print or write the JSON Schema of an entity type')
        .option('-e, --entity <name>', 'Entity type to describe', 'BidModel')
        .option('--alias', 'Describe fields by alias')
        .option('--no-alias', 'Describe fields by internal name')
        .option('-i, --indent <number>', 'JSON indentation')
        .option('-o, --output <file>', 'File to write instead of stdout')
        .action((options: SchemaOptions) => {
            const entity = resolveEntity(options.entity);
            const exportOptions = {
                useAliases: options.alias ?? config.output.byAlias,
                indent: parseIndent(options.indent),
            };

            if (options.output) {
                writeSchema(entity, options.output, exportOptions);
                console.log(chalk.green(`✓ Wrote ${options.output}`));
            } else {
                console.log(schemaJson(entity, exportOptions));
            }
        });

    return program;
}
