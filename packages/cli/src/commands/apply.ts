import { ensureError } from '@netform/contracts';
import chalk from 'chalk';
import { Command } from 'commander';
import fs from 'node:fs/promises';
import path from 'node:path';

import { CONFIG_FILE, createOrchestrator, fileExists } from '../context';
import { describeSummary, displayPlan, hasChanges } from '../display';
import { confirmAction } from '../prompt';

async function executeApply(cwd: string, configPath: string, autoConfirm: boolean): Promise<void> {
  const content = await fs.readFile(configPath, 'utf8');
  const orchestrator = createOrchestrator(cwd);

  console.log(chalk.blue('Calculating plan...'));
  const plans = await orchestrator.plan(content);

  if (!hasChanges(plans)) {
    console.log(chalk.green('No changes needed.'));
    return;
  }

  displayPlan(plans);

  if (!(await confirmAction('Do you want to perform these actions?', autoConfirm))) {
    console.log(chalk.yellow('Apply cancelled.'));
    return;
  }

  console.log(chalk.blue('\nApplying...'));
  const applied = await orchestrator.apply(content);
  console.log(chalk.green(`\nApply complete! Resources: ${describeSummary(applied)}.`));
}

export function createApplyCommand(): Command {
  return new Command('apply')
    .description('Converge the device onto the configuration')
    .argument('[config]', 'Desired-state document', CONFIG_FILE)
    .option('-y, --yes', 'Approve changes automatically')
    .action(async (config: string, options: { yes?: boolean }) => {
      const cwd = process.cwd();
      const configPath = path.resolve(cwd, config);

      if (!(await fileExists(configPath))) {
        console.error(chalk.red(`Error: ${config} not found.`));
        process.exit(1);
        return;
      }

      try {
        await executeApply(cwd, configPath, options.yes ?? false);
      } catch (error: unknown) {
        console.error(chalk.red('Apply failed:'), ensureError(error).message);
        process.exit(1);
      }
    });
}
