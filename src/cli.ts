import { Command, CommanderError } from 'commander';
import os from 'os';
import { isLayerEnabled, loadConfig, type HubConfig } from './config.js';
import { closeDb, connectDb } from './db.js';
import { DatabaseUnavailableError } from './errors.js';
import * as fmt from './format.js';
import { loadIdentity } from './identity.js';
import { handleInbox, handleRead, handleSend } from './tools/messages.js';
import { handleRecall, handleRemember, handleUpdateMemory } from './tools/memory.js';
import {
  handleCleanup,
  handleDeregister,
  handleHeartbeat,
  handleLog,
  handleRegister,
  handleStatus,
} from './tools/presence.js';
import { handleCreateRole, handleGetRole, handleListRoles, handleSeedRoles } from './tools/roles.js';
import {
  handleClaimTask,
  handleCompleteTask,
  handleCreateTask,
  handleFailTask,
  handleListTasks,
  handleStartTask,
} from './tools/tasks.js';
import { handleDisable, handleEnable, handleInit } from './tools/gate.js';
import type { Identity } from './types.js';
import { failure, isFailure, splitList, type Failure } from './utils.js';

export const VERSION = '1.0.0';

const ALWAYS_RUN = new Set(['init', 'enable', 'on', 'disable', 'off']);

export interface CliIo {
  out(line: string): void;
  err(line: string): void;
}

export const consoleIo: CliIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

interface ScopeOpts {
  project?: string;
  global?: boolean;
}

interface RegisterOpts {
  project: string;
  dir?: string;
  model?: string;
}

interface HeartbeatOpts {
  task?: string;
  status?: string;
}

interface SendOpts {
  to: string;
  subject: string;
  body?: string;
  type: string;
}

interface RememberOpts extends ScopeOpts {
  type: string;
  title: string;
  content: string;
  tags?: string;
  files?: string;
}

interface RecallOpts extends ScopeOpts {
  type?: string;
  search?: string;
  limit?: string;
  includeInactive?: boolean;
}

interface UpdateMemoryOpts extends ScopeOpts {
  title?: string;
  content?: string;
  status?: string;
}

interface LogOpts {
  action: string;
  summary: string;
  files?: string;
}

interface TaskCreateOpts {
  title: string;
  project?: string;
  description?: string;
  role?: string;
  priority: string;
  fileScope?: string;
  dependsOn?: string;
}

interface TaskListOpts {
  project?: string;
  status?: string;
  role?: string;
  available?: boolean;
}

interface RoleCreateOpts {
  name: string;
  description: string;
  prompt: string;
  capabilities?: string;
}

export function commandName(argv: readonly string[]): string | undefined {
  return argv.find((arg) => !arg.startsWith('-'));
}

// While disabled, only the gate commands run; everything else, a bare
// invocation included, exits 0 without output.
export function isDormant(argv: readonly string[], enabled: boolean): boolean {
  if (enabled) return false;
  const name = commandName(argv);
  return name === undefined || !ALWAYS_RUN.has(name);
}

export function runFromEnv(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
  homeDir: string = os.homedir(),
  io: CliIo = consoleIo,
): number {
  if (isDormant(argv, isLayerEnabled(env, homeDir))) return 0;
  let config: HubConfig;
  try {
    config = loadConfig(env, homeDir);
  } catch (error) {
    io.err(`ERROR: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }
  return runCli(argv, config, io);
}

export function runCli(argv: string[], config: HubConfig, io: CliIo = consoleIo): number {
  if (isDormant(argv, config.enabled)) return 0;

  let exitCode = 0;
  let identityCache: Identity | null | undefined;
  const identity = (): Identity | null => {
    if (identityCache === undefined) identityCache = loadIdentity(config.identityFile);
    return identityCache;
  };

  const program = new Command();
  program
    .name('agentdesk')
    .description('Coordination layer for agent instances sharing one database')
    .version(VERSION)
    .option('--json', 'print results as JSON')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.out(text.trimEnd()),
      writeErr: (text) => io.err(text.trimEnd()),
    });

  const json = (): boolean => program.opts<{ json?: boolean }>().json === true;

  function emit<T extends { success: true }>(result: T | Failure, render: (ok: T) => string[]): void {
    if (isFailure(result)) {
      exitCode = 1;
      if (json()) {
        io.out(JSON.stringify(result, null, 2));
      } else {
        io.err(`ERROR: ${result.error}`);
      }
      return;
    }
    if (json()) {
      io.out(JSON.stringify(result, null, 2));
    } else {
      for (const line of render(result)) io.out(line);
    }
    if ('warning' in result && typeof result.warning === 'string') {
      io.err(`WARNING: ${result.warning}`);
    }
  }

  function withDb<T>(run: () => T): T {
    connectDb(config.dbPath);
    try {
      return run();
    } finally {
      closeDb();
    }
  }

    function asInstance<T extends { success: true }>(
    run: (self: Identity) => T | Failure,
    render: (ok: T) => string[],
  ): void {
    const self = identity();
    if (!self) {
      emit(failure('NOT_REGISTERED', "Not registered. Run 'agentdesk register' first."), render);
      return;
    }
    emit(withDb(() => run(self)), render);
  }

  // --- Setup and gate ---

  program
    .command('init')
    .description('Create the database and its schema')
    .action(() => {
      try {
        emit(handleInit(config), fmt.formatInit);
      } finally {
        closeDb();
      }
    });

  program
    .command('enable')
    .alias('on')
    .description('Enable coordination (persists via the flag file)')
    .action(() => emit(handleEnable(config), fmt.formatEnable));

  program
    .command('disable')
    .alias('off')
    .description('Disable coordination; every other command becomes a silent no-op')
    .action(() => emit(handleDisable(config), fmt.formatDisable));

  // --- Presence ---

  program
    .command('register')
    .description('Register this instance')
    .requiredOption('--project <name>', 'project this instance works on')
    .option('--dir <path>', 'working directory (defaults to the current one)')
    .option('--model <name>', 'model label')
    .action((opts: RegisterOpts) => {
      emit(withDb(() => handleRegister(config, { project: opts.project, working_dir: opts.dir, model: opts.model })), fmt.formatRegister);
    });

  program
    .command('heartbeat')
    .description('Refresh the heartbeat and optionally the current task or status')
    .option('--task <label>', 'current task label')
    .option('--status <status>', 'active, idle, busy or shutting_down')
    .action((opts: HeartbeatOpts) => {
      asInstance((self) => handleHeartbeat(self, { task: opts.task, status: opts.status }), fmt.formatHeartbeat);
    });

  program
    .command('status')
    .description('Show active instances, recent messages and recent activity')
    .action(() => emit(withDb(() => handleStatus(config)), fmt.formatStatus));

  program
    .command('log')
    .description('Append a session log entry')
    .requiredOption('--action <action>', 'session action')
    .requiredOption('--summary <text>', 'what happened')
    .option('--files <list>', 'comma-separated modified files')
    .action((opts: LogOpts) => {
      asInstance(
        (self) => handleLog(self, { action: opts.action, summary: opts.summary, files: splitList(opts.files) }),
        fmt.formatLog,
      );
    });

  program
    .command('deregister')
    .description('Remove this instance and forget its identity')
    .action(() => {
      const self = identity();
      if (!self) {
        if (json()) {
          io.out(JSON.stringify({ success: true, registered: false }, null, 2));
        } else {
          io.out('Not registered.');
        }
        return;
      }
      emit(withDb(() => handleDeregister(config, self)), fmt.formatDeregister);
    });

  program
    .command('cleanup')
    .description('Remove stale instances, expired messages and old log entries')
    .action(() => emit(withDb(() => handleCleanup(config)), fmt.formatCleanup));

  // --- Messages ---

  program
    .command('send')
    .description('Send a message to an instance, a project or @all')
    .requiredOption('--to <target>', 'instance id, project name or @all')
    .requiredOption('--subject <text>', 'subject line')
    .option('--body <text>', 'message body')
    .option('--type <type>', 'info, warning, blocker, request or done', 'info')
    .action((opts: SendOpts) => {
      asInstance(
        (self) => handleSend(config, self, { to: opts.to, subject: opts.subject, body: opts.body, type: opts.type }),
        fmt.formatSend,
      );
    });

  program
    .command('inbox')
    .description('List messages addressed to this instance')
    .option('--all', 'include messages already read')
    .action((opts: { all?: boolean }) => {
      asInstance((self) => handleInbox(config, self, { include_read: opts.all === true }), fmt.formatInbox);
    });

  program
    .command('read')
    .description('Show a message and mark it read')
    .argument('<message_id>', 'message id')
    .action((messageId: string) => emit(withDb(() => handleRead({ message_id: messageId })), fmt.formatRead));

  // --- Memory ---

  program
    .command('remember')
    .description('Store a project or global memory entry')
    .option('--project <name>', 'project scope (defaults to the registered project)')
    .option('--global', 'store in global memory')
    .requiredOption('--type <type>', 'memory type')
    .requiredOption('--title <text>', 'title')
    .requiredOption('--content <text>', 'content')
    .option('--tags <list>', 'comma-separated tags')
    .option('--files <list>', 'comma-separated related files')
    .action((opts: RememberOpts) => {
      emit(withDb(() => handleRemember(identity(), {
        project: opts.project,
        global: opts.global,
        type: opts.type,
        title: opts.title,
        content: opts.content,
        tags: splitList(opts.tags),
        files: splitList(opts.files),
      })), fmt.formatRemember);
    });

  program
    .command('recall')
    .description('Search project or global memory')
    .option('--project <name>', 'project scope (defaults to the registered project)')
    .option('--global', 'search global memory')
    .option('--type <type>', 'memory type')
    .option('--search <text>', 'substring to match in title or content')
    .option('--limit <n>', 'maximum entries', '20')
    .option('--include-inactive', 'include resolved, deprecated and superseded entries')
    .action((opts: RecallOpts) => {
      emit(withDb(() => handleRecall(identity(), {
        project: opts.project,
        global: opts.global,
        type: opts.type,
        search: opts.search,
        limit: opts.limit,
        include_inactive: opts.includeInactive === true,
      })), fmt.formatRecall);
    });

  program
    .command('update-memory')
    .description('Update the title, content or status of a memory entry')
    .argument('<memory_id>', 'memory id')
    .option('--project <name>', 'only match an entry of this project')
    .option('--global', 'update a global memory entry')
    .option('--title <text>', 'new title')
    .option('--content <text>', 'new content')
    .option('--status <status>', 'active, resolved, deprecated or superseded')
    .action((memoryId: string, opts: UpdateMemoryOpts) => {
      emit(withDb(() => handleUpdateMemory({
        memory_id: memoryId,
        project: opts.project,
        global: opts.global,
        title: opts.title,
        content: opts.content,
        status: opts.status,
      })), fmt.formatUpdateMemory);
    });

  // --- Tasks ---

  program
    .command('task-create')
    .description('Queue a task')
    .requiredOption('--title <text>', 'task title')
    .option('--project <name>', 'project (defaults to the registered project)')
    .option('--description <text>', 'what to do')
    .option('--role <name>', 'role expected to take the task')
    .option('--priority <n>', 'higher is claimed first', '0')
    .option('--file-scope <list>', 'comma-separated files the task may touch')
    .option('--depends-on <list>', 'comma-separated task ids')
    .action((opts: TaskCreateOpts) => {
      emit(withDb(() => handleCreateTask(identity(), {
        title: opts.title,
        project: opts.project,
        description: opts.description,
        role: opts.role,
        priority: opts.priority,
        file_scope: splitList(opts.fileScope),
        depends_on: splitList(opts.dependsOn),
      })), fmt.formatTaskCreate);
    });

  program
    .command('task-list')
    .description('List tasks in claim order')
    .option('--project <name>', 'filter by project')
    .option('--status <status>', 'filter by status')
    .option('--role <name>', 'filter by role')
    .option('--available', 'only pending tasks')
    .action((opts: TaskListOpts) => {
      emit(withDb(() => handleListTasks({
        project: opts.project,
        status: opts.status,
        role: opts.role,
        available: opts.available === true,
      })), fmt.formatTaskList);
    });

  program
    .command('task-claim')
    .description('Claim a pending task')
    .argument('<task_id>', 'task id')
    .action((taskId: string) => asInstance((self) => handleClaimTask(self, { task_id: taskId }), fmt.formatClaim));

  program
    .command('task-start')
    .description('Mark a claimed task as in progress')
    .argument('<task_id>', 'task id')
    .action((taskId: string) => asInstance((self) => handleStartTask(self, { task_id: taskId }), fmt.formatStart));

  program
    .command('task-done')
    .description('Complete a task')
    .argument('<task_id>', 'task id')
    .option('--result <text>', 'outcome summary')
    .action((taskId: string, opts: { result?: string }) => {
      emit(withDb(() => handleCompleteTask(identity(), { task_id: taskId, result: opts.result })), fmt.formatDone);
    });

  program
    .command('task-fail')
    .description('Fail a task')
    .argument('<task_id>', 'task id')
    .option('--result <text>', 'reason')
    .action((taskId: string, opts: { result?: string }) => {
      emit(withDb(() => handleFailTask(identity(), { task_id: taskId, result: opts.result })), fmt.formatFail);
    });

  // --- Roles ---

  program
    .command('role-list')
    .description('List agent roles')
    .action(() => emit(withDb(() => handleListRoles()), fmt.formatRoleList));

  program
    .command('role-get')
    .description('Show a role including its system prompt')
    .argument('<name>', 'role name')
    .action((roleName: string) => emit(withDb(() => handleGetRole({ name: roleName })), fmt.formatRoleGet));

  program
    .command('role-create')
    .description('Create or replace an agent role')
    .requiredOption('--name <name>', 'role name')
    .requiredOption('--description <text>', 'one-line description')
    .requiredOption('--prompt <text>', 'system prompt handed to claimants')
    .option('--capabilities <list>', 'comma-separated capabilities')
    .action((opts: RoleCreateOpts) => {
      emit(withDb(() => handleCreateRole({
        name: opts.name,
        description: opts.description,
        system_prompt: opts.prompt,
        capabilities: splitList(opts.capabilities),
      })), fmt.formatRoleCreate);
    });

  program
    .command('role-seed')
    .description('Create or refresh the default roles')
    .action(() => emit(withDb(() => handleSeedRoles()), fmt.formatRoleSeed));

  try {
    program.parse(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    if (error instanceof DatabaseUnavailableError) {
      io.err(`DB ERROR: ${error.message}`);
      io.err("Run 'agentdesk init' to create the database.");
      return 1;
    }
    const message = error instanceof Error ? error.message : String(error);
    io.err(`ERROR: ${message}`);
    if (config.debug && error instanceof Error && error.stack) {
      io.err(error.stack);
    }
    return 1;
  }
  return exitCode;
}
