import { ensureError, FieldSchema, ResourceSchema } from '@netform/contracts';
import { routerOSRegistry } from '@netform/provider-routeros';
import { keyFieldOf } from '@netform/schema';
import chalk from 'chalk';
import { Command } from 'commander';

function describeMode(field: FieldSchema): string {
  if (field.required) return 'required';
  if (field.optional && field.computed) return 'optional, computed';
  if (field.computed) return 'computed';
  return 'optional';
}

function describeType(field: FieldSchema): string {
  return field.format ? `${field.type} (${field.format})` : field.type;
}

function displaySchema(schema: ResourceSchema): void {
  const identity = schema.idType === 'id' ? 'device id' : `"${keyFieldOf(schema)}"`;
  console.log(chalk.bold(`\n${schema.name}`) + ` ${schema.path}, identified by ${identity}`);
  if (schema.ordering) console.log(`  ordered by "${schema.ordering.field}" (${schema.ordering.strategy})`);
  console.log();

  const width = Math.max(...Object.keys(schema.fields).map((name) => name.length));
  for (const [name, field] of Object.entries(schema.fields)) {
    const defaultValue = field.default === undefined ? '' : ` = ${JSON.stringify(field.default)}`;
    console.log(`  ${chalk.cyan(name.padEnd(width))}  ${describeType(field)}, ${describeMode(field)}${defaultValue}`);
    if (field.description) console.log(chalk.gray(`  ${' '.repeat(width)}  ${field.description}`));
  }
}

export function createSchemaCommand(): Command {
  return new Command('schema')
    .description('Describe the supported resource kinds')
    .argument('[kind]', 'Resource kind to describe')
    .option('--json', 'Output in JSON format')
    .action((kind: string | undefined, options: { json?: boolean }) => {
      try {
        const schemas = kind ? [routerOSRegistry.define(kind)] : routerOSRegistry.kinds().map((k) => routerOSRegistry.define(k));

        if (options.json) {
          // Validators and suppressors are functions and drop out of the JSON
          console.log(JSON.stringify(kind ? schemas[0] : schemas, null, 2));
          return;
        }

        if (!kind) {
          for (const schema of schemas) console.log(`${chalk.cyan(schema.name.padEnd(24))} ${schema.path}`);
          return;
        }

        displaySchema(schemas[0]);
      } catch (error) {
        console.error(chalk.red('Schema failed:'), ensureError(error).message);
        process.exit(1);
      }
    });
}
