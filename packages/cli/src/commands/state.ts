import { ensureError, formatIdentity } from '@netform/contracts';
import { StateManager } from '@netform/state';
import chalk from 'chalk';
import { Command } from 'commander';

export function createStateCommand(): Command {
  const command = new Command('state').description('Inspect the state file');

  command
    .command('list')
    .description('List resources in the state')
    .action(async () => {
      try {
        const state = await new StateManager(process.cwd()).read();

        if (Object.keys(state.resources).length === 0) {
          console.log('The state file is empty.');
          return;
        }

        for (const key of Object.keys(state.resources).sort()) console.log(key);
      } catch (error) {
        console.error(chalk.red('Error listing state:'), ensureError(error).message);
        process.exit(1);
      }
    });

  command
    .command('show')
    .description('Show a resource in the state')
    .argument('<address>', 'Resource address, e.g. system_scheduler.nightly')
    .action(async (address: string) => {
      try {
        const state = await new StateManager(process.cwd()).read();
        const resource = state.resources[address];

        if (!resource) {
          console.error(chalk.red(`Resource not found: ${address}`));
          process.exit(1);
          return;
        }

        console.log(chalk.bold(`# ${address} (${formatIdentity(resource.identity)}):`));
        for (const [key, value] of Object.entries(resource.attributes)) console.log(`  ${key} = ${JSON.stringify(value)}`);
        if (resource.dependsOn && resource.dependsOn.length > 0) console.log(`  # depends on ${resource.dependsOn.join(', ')}`);
      } catch (error) {
        console.error(chalk.red('Error showing resource:'), ensureError(error).message);
        process.exit(1);
      }
    });

  return command;
}
