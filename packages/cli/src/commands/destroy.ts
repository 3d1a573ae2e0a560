import { ensureError } from '@netform/contracts';
import chalk from 'chalk';
import { Command } from 'commander';

import { createOrchestrator } from '../context';
import { displayPlan } from '../display';
import { confirmAction } from '../prompt';

export function createDestroyCommand(): Command {
  return new Command('destroy')
    .description('Delete every resource recorded in state from the device')
    .option('-y, --yes', 'Approve changes automatically')
    .action(async (options: { yes?: boolean }) => {
      try {
        const orchestrator = createOrchestrator(process.cwd());
        const plans = await orchestrator.planDestroy();

        if (plans.length === 0) {
          console.log(chalk.green('Nothing to destroy.'));
          return;
        }

        displayPlan(plans);

        if (!(await confirmAction('Do you really want to destroy all resources?', options.yes ?? false))) {
          console.log(chalk.yellow('Destroy cancelled.'));
          return;
        }

        const destroyed = await orchestrator.destroy();
        console.log(chalk.green(`\nDestroy complete! Resources: ${destroyed.length} destroyed.`));
      } catch (error: unknown) {
        console.error(chalk.red('Destroy failed:'), ensureError(error).message);
        process.exit(1);
      }
    });
}
