#!/usr/bin/env node
import { Command, InvalidArgumentError, Option } from 'commander';
import {
  DEFAULT_CONFIG_PATH,
  DEFAULT_INTERVAL_MINUTES,
  DEFAULT_STATE_DIR,
  doctorReport,
  loadConfig,
  readEnv,
} from './config.js';
import { loadEnvFiles } from './env.js';
import { createLogger, type LogLevel } from './log.js';
import { buildJobs, createServices, selectJobs } from './jobs.js';
import { runMockDemo } from './demo.js';
import { Scheduler } from './sync/scheduler.js';
import type { SyncReport } from './sync/report.js';

loadEnvFiles();

type Format = 'pretty' | 'json';

interface CommonOpts {
  config: string;
  dryRun?: boolean;
  verbose?: boolean;
  limit?: number;
  stateDir?: string;
  format: Format;
  job?: string;
}

interface DaemonOpts extends CommonOpts {
  interval?: number;
}

function positiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) throw new InvalidArgumentError('must be a positive integer');
  return n;
}

function positiveNumber(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n <= 0) throw new InvalidArgumentError('must be a positive number');
  return n;
}

function formatOption() {
  return new Option('--format <format>', 'Output format').choices(['pretty', 'json']).default('pretty');
}

function withCommonOptions(cmd: Command): Command {
  return cmd
    .option('--config <path>', 'Config file', DEFAULT_CONFIG_PATH)
    .option('--dry-run', 'Log intended changes without writing anything')
    .option('--verbose', 'Debug logging')
    .option('--limit <n>', 'Stop after N create/update/delete/complete operations per job', positiveInt)
    .option('--state-dir <dir>', `State directory (default: ${DEFAULT_STATE_DIR} or TASK_MIRROR_STATE_DIR)`)
    .option('--job <name>', 'Run only this job')
    .addOption(formatOption());
}

function printReport(report: SyncReport, format: Format) {
  if (format === 'json') {
    console.log(JSON.stringify(report, null, 2));
    return;
  }

  console.log(`task-mirror report: ${report.job}`);
  console.log(`lastSyncAt: ${report.lastSyncAt ?? '(none)'}`);
  console.log(`newLastSyncAt: ${report.newLastSyncAt}`);
  console.log(`dryRun: ${report.dryRun}`);
  console.log(`durationMs: ${report.durationMs}`);

  console.log('\ncounts:');
  for (const [k, v] of Object.entries(report.counts)) console.log(`- ${k}: ${v}`);

  if (report.errors.length) {
    console.log('\nerrors:');
    for (const e of report.errors) console.log(`- ${e.stage}${e.id ? ` ${e.id}` : ''}: ${e.error}`);
  }

  const changes = report.actions.filter((a) => a.kind !== 'noop');
  if (changes.length) {
    console.log('\nactions:');
    for (const a of changes) {
      const exec = a.executed ? 'exec' : 'plan';
      const tgt = `${a.target.service}:${a.target.collectionId}${a.target.id ? `/${a.target.id}` : ''}`;
      const src = a.source ? ` <= ${a.source.service}:${a.source.id}` : '';
      console.log(`- [${exec}] ${a.kind} ${tgt}${src} ${a.title ? `"${a.title}" ` : ''}:: ${a.detail}`);
    }
  }
  console.log('');
}

async function prepare(opts: CommonOpts) {
  const env = readEnv();
  const config = await loadConfig(opts.config);
  const level: LogLevel = opts.verbose ? 'debug' : (env.TASK_MIRROR_LOG_LEVEL ?? config.logLevel ?? 'info');
  const logger = createLogger(level);
  const stateDir = opts.stateDir ?? env.TASK_MIRROR_STATE_DIR ?? config.stateDir ?? DEFAULT_STATE_DIR;

  const jobs = selectJobs(config, opts.job);
  const services = createServices(config, env, jobs, { logger: logger.child('http') });
  const scheduler = new Scheduler(buildJobs(jobs, config, services, stateDir, logger), logger, {
    dryRun: !!opts.dryRun,
    limit: opts.limit,
    onReport: (r) => printReport(r, opts.format),
  });

  return { env, config, logger, scheduler };
}

const program = new Command();

program
  .name('task-mirror')
  .description('Mirror tasks between Todoist and Google Tasks')
  .version('0.1.0');

withCommonOptions(program.command('run-once').description('Run every configured job once')).action(
  async (opts: CommonOpts) => {
    const { scheduler } = await prepare(opts);
    await scheduler.runOnce();
  },
);

withCommonOptions(program.command('run-daemon').description('Run the jobs every N minutes until interrupted'))
  .option('--interval <minutes>', 'Minutes between cycles (or TASK_MIRROR_INTERVAL_MINUTES)', positiveNumber)
  .action(async (opts: DaemonOpts) => {
    const { env, config, logger, scheduler } = await prepare(opts);
    const interval =
      opts.interval ?? env.TASK_MIRROR_INTERVAL_MINUTES ?? config.intervalMinutes ?? DEFAULT_INTERVAL_MINUTES;

    const controller = new AbortController();
    const stop = (signal: string) => {
      logger.info(`${signal} received; stopping after the current cycle`);
      controller.abort();
    };
    process.once('SIGINT', () => stop('SIGINT'));
    process.once('SIGTERM', () => stop('SIGTERM'));

    await scheduler.runForever(interval, controller.signal);
  });

program
  .command('doctor')
  .description('Check config and credentials and print what is missing')
  .option('--config <path>', 'Config file', DEFAULT_CONFIG_PATH)
  .action(async (opts: { config: string }) => {
    const report = doctorReport(await loadConfig(opts.config), readEnv());
    console.log('task-mirror doctor');
    console.log('\njobs:');
    for (const j of report.jobs) console.log(`- ${j.name} (${j.kind})${j.enabled ? '' : ' [disabled]'}`);

    if (report.missing.length) {
      console.log('\nMissing env vars:');
      for (const k of report.missing) console.log(`- ${k}`);
      process.exitCode = 2;
    } else {
      console.log('\nNo missing env vars detected for enabled jobs.');
    }

    if (report.notes.length) {
      console.log('\nNotes:');
      for (const n of report.notes) console.log(`- ${n}`);
    }
  });

program
  .command('mock')
  .description('Dry-run a priority mirror between in-memory providers (for demos)')
  .option('--verbose', 'Debug logging')
  .addOption(formatOption())
  .action(async (opts: { verbose?: boolean; format: Format }) => {
    const { report } = await runMockDemo(createLogger(opts.verbose ? 'debug' : 'info'));
    printReport(report, opts.format);
  });

program.parseAsync(process.argv).catch((err) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
