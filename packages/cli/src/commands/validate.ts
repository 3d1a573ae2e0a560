import { ensureError } from '@netform/contracts';
import chalk from 'chalk';
import { Command } from 'commander';
import * as fs from 'node:fs/promises';
import { resolve } from 'node:path';

import { loadConfig } from '../config';
import { CONFIG_FILE, createOrchestrator, fileExists } from '../context';

export function createValidateCommand(): Command {
  const command = new Command('validate');

  command
    .description('Validate the desired-state document without contacting the device')
    .argument('[config]', 'Desired-state document', CONFIG_FILE)
    .action(async (config: string) => {
      const fullPath = resolve(process.cwd(), config);
      console.log(chalk.bold(`\nValidating ${config}...\n`));

      if (!(await fileExists(fullPath))) {
        console.log(chalk.red('✗ File not found'));
        process.exit(1);
        return;
      }

      try {
        const content = await fs.readFile(fullPath, 'utf8');
        const orchestrator = createOrchestrator(process.cwd(), { ...loadConfig(), transport: 'memory' });
        const resources = orchestrator.validate(content);

        for (const { address } of resources) console.log(chalk.green(`  ✓ ${address.toString()}`));
        console.log(chalk.bold.green(`\n✓ Configuration is valid (${resources.length} resources)\n`));
      } catch (error) {
        console.log(chalk.red('  ✗'), ensureError(error).message);
        process.exit(1);
      }
    });

  return command;
}
