import { ActionType, isNoOp, PlanAction, summarizePlan } from '@netform/planner';
import { ResourcePlan } from '@netform/orchestrator';
import chalk from 'chalk';

function getActionSymbol(type: ActionType): string {
  if (type === 'CREATE') return chalk.green('+');
  if (type === 'UPDATE') return chalk.yellow('~');
  if (type === 'DELETE') return chalk.red('-');
  if (type === 'MOVE') return chalk.cyan('>');
  return ' ';
}

function getActionVerb(type: ActionType): string {
  if (type === 'CREATE') return chalk.green('created');
  if (type === 'UPDATE') return chalk.yellow('updated');
  if (type === 'DELETE') return chalk.red('destroyed');
  if (type === 'MOVE') return chalk.cyan('moved');
  return 'left unchanged';
}

export function hasChanges(plans: ResourcePlan[]): boolean {
  return plans.some((plan) => !isNoOp(plan.actions));
}

export function displayAction(address: string, action: PlanAction): void {
  console.log(`  ${getActionSymbol(action.type)} ${address} will be ${getActionVerb(action.type)}`);

  if (action.type === 'CREATE' && action.params)
    for (const [key, value] of Object.entries(action.params)) console.log(`      ${key} = ${JSON.stringify(value)}`);

  if (action.type === 'UPDATE' && action.changes)
    for (const [key, change] of Object.entries(action.changes)) console.log(`      ${key}: ${JSON.stringify(change.old ?? '')} -> ${JSON.stringify(change.new)}`);

  if (action.type === 'MOVE') console.log(action.destination ? `      before ${action.destination}` : '      to the end');
}

export function displayPlan(plans: ResourcePlan[]): void {
  console.log(chalk.bold('\nNetform will perform the following actions:\n'));

  for (const { address, actions } of plans) for (const action of actions) if (action.type !== 'NO_OP') displayAction(address, action);
}

export function describeSummary(plans: ResourcePlan[]): string {
  const summary = summarizePlan(plans.flatMap((plan) => plan.actions));
  return `${summary.create} to add, ${summary.update} to change, ${summary.delete} to destroy, ${summary.move} to move`;
}
