import { Command } from 'commander';

import { createApplyCommand } from './commands/apply';
import { createDestroyCommand } from './commands/destroy';
import { createPlanCommand } from './commands/plan';
import { createSchemaCommand } from './commands/schema';
import { createStateCommand } from './commands/state';
import { createValidateCommand } from './commands/validate';

const program = new Command();

program.name('netform').description('Declarative configuration for RouterOS devices').version('0.1.0');

program.addCommand(createPlanCommand());
program.addCommand(createApplyCommand());
program.addCommand(createDestroyCommand());
program.addCommand(createValidateCommand());
program.addCommand(createSchemaCommand());
program.addCommand(createStateCommand());

await program.parseAsync();
