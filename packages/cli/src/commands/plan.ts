import { ensureError } from '@netform/contracts';
import chalk from 'chalk';
import { Command } from 'commander';
import fs from 'node:fs/promises';
import path from 'node:path';

import { CONFIG_FILE, createOrchestrator, fileExists } from '../context';
import { describeSummary, displayPlan, hasChanges } from '../display';

async function executePlan(cwd: string, configPath: string): Promise<void> {
  const content = await fs.readFile(configPath, 'utf8');
  const orchestrator = createOrchestrator(cwd);

  console.log(chalk.blue('Reading device state...'));
  const plans = await orchestrator.plan(content);

  if (!hasChanges(plans)) {
    console.log(chalk.green('No changes. The device matches the configuration.'));
    return;
  }

  displayPlan(plans);
  console.log(chalk.bold(`\nPlan: ${describeSummary(plans)}.`));
}

export function createPlanCommand(): Command {
  return new Command('plan')
    .description('Show the changes required to make the device match the configuration')
    .argument('[config]', 'Desired-state document', CONFIG_FILE)
    .action(async (config: string) => {
      const cwd = process.cwd();
      const configPath = path.resolve(cwd, config);

      if (!(await fileExists(configPath))) {
        console.error(chalk.red(`Error: ${config} not found.`));
        process.exit(1);
        return;
      }

      try {
        await executePlan(cwd, configPath);
      } catch (error: unknown) {
        console.error(chalk.red('Planning failed:'), ensureError(error).message);
        process.exit(1);
      }
    });
}
