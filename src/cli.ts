import { Command, Option } from 'commander';
import { PRIORITIES, STATUSES } from './constants.js';
import type { GlobalOptions } from './commands/context.js';
import { notificationsCommand, subscribeCommand } from './commands/notifications.js';
import {
  assignCommand,
  commentCommand,
  createCommand,
  listCommand,
  mentionsCommand,
  moveCommand,
  showCommand,
  updateCommand,
  workCommand,
} from './commands/tasks.js';
import { watchCommand } from './commands/watch.js';

const program = new Command();

program
  .name('taskboard')
  .description('File-system task board for autonomous development agents')
  .version('0.1.0')
  .option('-w, --workspace <dir>', 'Workspace directory (default: $TASKBOARD_WORKSPACE or ./workspace)')
  .option('--verbose', 'Log debug output');

function globals(command: Command): GlobalOptions {
  return command.optsWithGlobals<GlobalOptions>();
}

const priorityOption = () => new Option('-p, --priority <priority>', 'Priority').choices(PRIORITIES);

program
  .command('create')
  .description('Create a task in the inbox')
  .argument('<title>', 'Task title')
  .option('-d, --description <text>', 'Task description')
  .addOption(priorityOption().default('P2'))
  .option('-t, --tag <tag...>', 'Tags')
  .action(async (title: string, opts, command: Command) => {
    await createCommand(globals(command), title, opts);
  });

program
  .command('show')
  .description('Show a task and its thread')
  .argument('<task-id>')
  .action(async (taskId: string, _opts, command: Command) => {
    await showCommand(globals(command), taskId);
  });

program
  .command('list')
  .description('List tasks, in pipeline order')
  .addOption(new Option('-s, --status <status>', 'Only this status').choices(STATUSES))
  .action(async (opts, command: Command) => {
    await listCommand(globals(command), opts);
  });

program
  .command('update')
  .description('Update task fields (status changes go through move)')
  .argument('<task-id>')
  .option('--title <title>')
  .option('-d, --description <text>')
  .addOption(priorityOption())
  .option('-t, --tag <tag...>', 'Replace tags')
  .option('--prd <ref>')
  .option('--plan <ref>')
  .option('--pr <ref>')
  .action(async (taskId: string, opts, command: Command) => {
    await updateCommand(globals(command), taskId, opts);
  });

program
  .command('move')
  .description(`Move a task to another status (${STATUSES.join(', ')})`)
  .argument('<task-id>')
  .argument('<status>')
  .action(async (taskId: string, status: string, _opts, command: Command) => {
    await moveCommand(globals(command), taskId, status);
  });

program
  .command('assign')
  .description('Assign an agent to a task')
  .argument('<task-id>')
  .argument('<agent>')
  .action(async (taskId: string, agent: string, _opts, command: Command) => {
    await assignCommand(globals(command), taskId, agent);
  });

program
  .command('comment')
  .description('Comment on a task and notify its subscribers')
  .argument('<task-id>')
  .argument('<agent>')
  .argument('<message>')
  .action(async (taskId: string, agent: string, message: string, _opts, command: Command) => {
    await commentCommand(globals(command), taskId, agent, message);
  });

program
  .command('work')
  .description('Find the next task for a role')
  .argument('<role>')
  .action(async (role: string, _opts, command: Command) => {
    await workCommand(globals(command), role);
  });

program
  .command('mentions')
  .description('List tasks mentioning @agent')
  .argument('<agent>')
  .action(async (agent: string, _opts, command: Command) => {
    await mentionsCommand(globals(command), agent);
  });

program
  .command('notifications')
  .description('Show pending notifications for an agent')
  .argument('<agent>')
  .option('--ack', 'Mark them delivered after showing them')
  .action(async (agent: string, opts, command: Command) => {
    await notificationsCommand(globals(command), agent, opts);
  });

program
  .command('subscribe')
  .description('Subscribe an agent to a task')
  .argument('<agent>')
  .argument('<task-id>')
  .option('--reason <reason>', 'Why the agent is subscribing')
  .action(async (agent: string, taskId: string, opts, command: Command) => {
    await subscribeCommand(globals(command), agent, taskId, opts);
  });

program
  .command('watch')
  .description('Watch the notification ledger for an agent')
  .argument('<agent>')
  .option('--debounce <ms>', 'Debounce interval in ms (default: 300)', (value) => Number.parseInt(value, 10))
  .option('--ack', 'Mark notifications delivered as they are shown')
  .action(async (agent: string, opts, command: Command) => {
    await watchCommand(globals(command), agent, opts);
  });

export async function main(argv: string[] = process.argv): Promise<void> {
  await program.parseAsync(argv);
}
