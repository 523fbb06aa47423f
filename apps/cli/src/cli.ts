import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import type { Annotation, Severity } from '@mender/core';
import { addLogTransport, createLogger, errorMessage, isLogLevel, setLogLevel } from '@mender/core';
import { loadConfig } from './config.js';
import type { MenderConfig } from './config.js';
import { Engine } from './engine.js';
import { createFileLogTransport } from './file-log-transport.js';
import { formatAnnotation, formatFixResult, formatQueueItem, formatQueueStats } from './format.js';

const log = createLogger('CLI');

const SEVERITIES: readonly Severity[] = ['low', 'medium', 'high', 'critical'];

export interface CliIo {
  out(text: string): void;
  err(text: string): void;
}

export interface RunOptions {
  io?: CliIo;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  createEngine?: (config: MenderConfig) => Engine;
}

interface GlobalOptions {
  config?: string;
  logLevel?: string;
}

interface FixOptions {
  taskId?: string;
  feature?: string;
  escalation: boolean;
}

interface ListOptions {
  all?: boolean;
  limit?: number;
}

interface ResolveOptions {
  rootCause: string;
  strategy: string;
  severity: Severity;
  notes: string;
  patchFile?: string;
}

const consoleIo: CliIo = {
  out: (text) => process.stdout.write(`${text}\n`),
  err: (text) => process.stderr.write(`${text}\n`),
};

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

function isSeverity(value: string): value is Severity {
  return SEVERITIES.some((severity) => severity === value);
}

function parseSeverity(value: string): Severity {
  if (!isSeverity(value)) {
    throw new InvalidArgumentError(`Expected one of: ${SEVERITIES.join(', ')}.`);
  }
  return value;
}

/**
 * Parse and execute one invocation. Resolves to the process exit code:
 * 0 on success, 1 otherwise (including usage errors).
 */
export async function run(argv: string[], options: RunOptions = {}): Promise<number> {
  const io = options.io ?? consoleIo;
  const cwd = options.cwd ?? process.cwd();
  const createEngine = options.createEngine ?? ((config: MenderConfig) => new Engine(config));
  let exitCode = 0;

  const program = new Command();
  program
    .name('mender')
    .description('Repair failing end-to-end tests with regression checks and human escalation')
    .version('0.1.0')
    .option('-c, --config <path>', 'Config file (default: ./mender.config.json)')
    .option('--log-level <level>', 'debug, info, warn or error')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.out(text.trimEnd()),
      writeErr: (text) => io.err(text.trimEnd()),
    });

  /** Load config, open the engine, run `action`, then flush state and detach logging. */
  async function withEngine(
    action: (engine: Engine) => Promise<number>,
    adjust?: (config: MenderConfig) => void,
  ): Promise<void> {
    const globals = program.opts<GlobalOptions>();
    const config = loadConfig({ configPath: globals.config, cwd, env: options.env });
    adjust?.(config);

    const level = globals.logLevel ?? config.logLevel;
    if (!isLogLevel(level)) {
      io.err(`Invalid log level: ${level}`);
      exitCode = 1;
      return;
    }
    setLogLevel(level);
    const removeTransport = addLogTransport(createFileLogTransport(resolve(config.projectDir, config.logsDir)));

    const engine = createEngine(config);
    try {
      exitCode = await action(engine);
    } finally {
      await engine.shutdown();
      removeTransport();
    }
  }

  program
    .command('fix')
    .description('Propose, verify and apply a fix for one failing test')
    .argument('<testPath>', 'Failing test file, relative to the project directory')
    .argument('<errorMessage>', 'Failure message reported by the test runner')
    .option('--task-id <id>', 'Stable id for attempt counting (default: derived from the test file)')
    .option('--feature <name>', 'Feature name shown to reviewers')
    .option('--no-escalation', 'Abort instead of queueing for human review')
    .action(async (testPath: string, message: string, opts: FixOptions) => {
      await withEngine(async (engine) => {
        const result = await engine.controller.attemptFix({
          testPath,
          errorMessage: message,
          taskId: opts.taskId,
          feature: opts.feature,
        });
        io.out(formatFixResult(result));
        return result.outcome === 'success' ? 0 : 1;
      }, (config) => {
        if (!opts.escalation) config.escalation = { enabled: false };
      });
    });

  program
    .command('attempts')
    .description('Show the attempt count and history of a task')
    .argument('<taskId>')
    .action(async (taskId: string) => {
      await withEngine(async (engine) => {
        const count = await engine.attemptTracker.get(taskId);
        const history = await engine.attemptTracker.history(taskId);
        io.out(`Attempts: ${count}`);
        for (const record of history) {
          io.out(`  #${record.attempt}  ${record.timestamp}  ${record.testPath}`);
        }
        return 0;
      });
    });

  const queue = program.command('queue').description('Inspect and resolve escalated tasks');

  queue
    .command('list')
    .description('List queued tasks, highest priority first')
    .option('--all', 'Include resolved tasks')
    .option('--limit <n>', 'Maximum number of tasks', parsePositiveInt)
    .action(async (opts: ListOptions) => {
      await withEngine(async (engine) => {
        const items = await engine.escalationQueue.list({ includeResolved: opts.all, limit: opts.limit });
        if (items.length === 0) {
          io.out('Queue is empty');
        }
        for (const item of items) {
          io.out(formatQueueItem(item));
        }
        return 0;
      });
    });

  queue
    .command('show')
    .description('Print the full record of a queued task as JSON')
    .argument('<taskId>')
    .action(async (taskId: string) => {
      await withEngine(async (engine) => {
        const item = await engine.escalationQueue.get(taskId);
        if (!item) {
          io.err(`No escalation found for ${taskId}`);
          return 1;
        }
        io.out(JSON.stringify(item, null, 2));
        return 0;
      });
    });

  queue
    .command('resolve')
    .description('Close a queued task with a human annotation')
    .argument('<taskId>')
    .requiredOption('--root-cause <category>', 'Root cause category')
    .requiredOption('--strategy <text>', 'How the failure was fixed')
    .addOption(
      new Option('--severity <level>', SEVERITIES.join(', '))
        .argParser(parseSeverity)
        .makeOptionMandatory(),
    )
    .requiredOption('--notes <text>', 'Free-form reviewer notes')
    .option('--patch-file <path>', 'Diff of the human fix')
    .action(async (taskId: string, opts: ResolveOptions) => {
      await withEngine(async (engine) => {
        const annotation: Annotation = {
          rootCauseCategory: opts.rootCause,
          fixStrategy: opts.strategy,
          severity: opts.severity,
          humanNotes: opts.notes,
        };
        if (opts.patchFile) {
          annotation.patchDiff = await readFile(resolve(cwd, opts.patchFile), 'utf-8');
        }
        const resolved = await engine.escalationQueue.resolve(taskId, annotation);
        if (!resolved) {
          io.err(`No escalation found for ${taskId}`);
          return 1;
        }
        io.out(`Resolved ${taskId}`);
        return 0;
      });
    });

  queue
    .command('stats')
    .description('Summarize the queue')
    .action(async () => {
      await withEngine(async (engine) => {
        io.out(formatQueueStats(await engine.escalationQueue.stats()));
        return 0;
      });
    });

  program
    .command('annotations')
    .description('Query past human annotations')
    .command('search')
    .description('Find annotations similar to a description')
    .argument('<query>', 'Feature or failure description')
    .option('--limit <n>', 'Maximum number of results', parsePositiveInt, 5)
    .action(async (query: string, opts: { limit: number }) => {
      await withEngine(async (engine) => {
        const matches = await engine.learningStore.searchAnnotations(query, opts.limit);
        if (matches.length === 0) {
          io.out('No matching annotations');
        }
        for (const match of matches) {
          io.out(formatAnnotation(match));
        }
        return 0;
      });
    });

  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      // --help and --version exit through here with code 0
      return error.exitCode === 0 ? 0 : 1;
    }
    log.error(`Command failed: ${errorMessage(error)}`);
    io.err(`Error: ${errorMessage(error)}`);
    return 1;
  }
  return exitCode;
}
