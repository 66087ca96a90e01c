import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigError, errorMessage } from './errors.js';
import { LOG_LEVELS } from './log.js';
import { DEFAULT_FALLBACK_DAYS, DEFAULT_RECURRENCE_UNITS, DEFAULT_TAG } from './directives.js';
import { DEFAULT_INBOX_NAME } from './providers/todoist.js';

const str = z.string().min(1);

export const DEFAULT_CONFIG_PATH = 'task-mirror.config.json';
export const DEFAULT_STATE_DIR = '.task-mirror';
export const DEFAULT_INTERVAL_MINUTES = 15;

export const EnvSchema = z.object({
  // Todoist
  TASK_MIRROR_TODOIST_TOKEN: str.optional(),

  // Google Tasks
  TASK_MIRROR_GOOGLE_CLIENT_ID: str.optional(),
  TASK_MIRROR_GOOGLE_CLIENT_SECRET: str.optional(),
  TASK_MIRROR_GOOGLE_REFRESH_TOKEN: str.optional(),

  // behavior
  TASK_MIRROR_LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  TASK_MIRROR_STATE_DIR: str.optional(),
  TASK_MIRROR_INTERVAL_MINUTES: z.coerce.number().int().positive().optional(),
  TASK_MIRROR_HTTP_RPS: z.coerce.number().positive().optional(),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

export function readEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) throw new ConfigError(`Invalid environment: ${formatIssues(parsed.error)}`);
  return parsed.data;
}

const names = z.array(str).default([]);

const JobBase = z.object({
  /** Used for the state file name; defaults to the job kind. */
  name: str.regex(/^[\w.-]+$/, 'letters, digits, dot, dash and underscore only').optional(),
  enabled: z.boolean().default(true),
});

/** Todoist tasks with a near due date and a priority or label land in one Google list. */
export const PriorityJobSchema = JobBase.extend({
  kind: z.literal('priority'),
  targetList: str.default('@default'),
  /** Todoist project names to read; empty reads every project. */
  projects: names,
  syncPriorityTasks: z.boolean().default(true),
  /** Todoist API priority (4 = p1, 1 = none). */
  minPriority: z.number().int().min(1).max(4).default(2),
  labels: names,
  lookaheadDays: z.number().int().nonnegative().default(1),
  cascadeCompletion: z.boolean().default(true),
});

/** Every Todoist project becomes a Google list of the same name. */
export const ProjectsJobSchema = JobBase.extend({
  kind: z.literal('projects'),
  excludedProjects: names,
  cascadeCompletion: z.boolean().default(false),
});

/** Starred or tagged Google tasks are copied into one consolidated list. */
export const StarredJobSchema = JobBase.extend({
  kind: z.literal('starred'),
  targetList: str.default('TRMNL'),
  /** Google list names to read; empty reads every list except the target. */
  sourceLists: names,
  tag: str.default(DEFAULT_TAG),
  cascadeCompletion: z.boolean().default(false),
});

/** Completed Google tasks with an `every!` directive are recreated with a new due date. */
export const RecurrenceJobSchema = JobBase.extend({
  kind: z.literal('recurrence'),
  /** Google list names to scan; empty scans every list. */
  lists: names,
});

export const JobSchema = z.discriminatedUnion('kind', [
  PriorityJobSchema,
  ProjectsJobSchema,
  StarredJobSchema,
  RecurrenceJobSchema,
]);

export type JobConfig = z.infer<typeof JobSchema>;
export type JobKind = JobConfig['kind'];

export const ConfigFileSchema = z
  .object({
    stateDir: str.optional(),
    intervalMinutes: z.number().int().positive().optional(),
    logLevel: z.enum(LOG_LEVELS).optional(),
    httpRps: z.number().positive().optional(),
    inboxListName: str.default(DEFAULT_INBOX_NAME),
    cascadeToleranceDays: z.number().int().nonnegative().default(1),
    recurrenceUnits: z
      .object({
        day: z.number().int().positive(),
        week: z.number().int().positive(),
        month: z.number().int().positive(),
        year: z.number().int().positive(),
      })
      .default(DEFAULT_RECURRENCE_UNITS),
    recurrenceFallbackDays: z.number().int().positive().default(DEFAULT_FALLBACK_DAYS),
    jobs: z.array(JobSchema).min(1),
  })
  .superRefine((cfg, ctx) => {
    const seen = new Set<string>();
    cfg.jobs.forEach((job, i) => {
      if (job.kind === 'priority' && !job.syncPriorityTasks && !job.labels.length) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['jobs', i],
          message: 'priority job needs syncPriorityTasks or at least one label',
        });
      }
      const name = jobName(job);
      if (seen.has(name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['jobs', i, 'name'],
          message: `duplicate job name "${name}"`,
        });
      }
      seen.add(name);
    });
  });

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export function jobName(job: JobConfig): string {
  return job.name ?? job.kind;
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
}

export function parseConfig(input: unknown, source = 'config'): ConfigFile {
  const parsed = ConfigFileSchema.safeParse(input);
  if (!parsed.success) throw new ConfigError(`Invalid ${source}: ${formatIssues(parsed.error)}`);
  return parsed.data;
}

export async function loadConfig(filePath: string): Promise<ConfigFile> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf8');
  } catch (e) {
    throw new ConfigError(`Cannot read config file ${filePath}: ${errorMessage(e)}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e) {
    throw new ConfigError(`Config file ${filePath} is not valid JSON: ${errorMessage(e)}`);
  }

  return parseConfig(json, `config file ${filePath}`);
}

export type ServiceNeed = 'todoist' | 'google';

export function servicesFor(job: JobConfig): ServiceNeed[] {
  switch (job.kind) {
    case 'priority':
    case 'projects':
      return ['todoist', 'google'];
    case 'starred':
    case 'recurrence':
      return ['google'];
  }
}

export function missingCredentials(services: Iterable<ServiceNeed>, env: EnvConfig): string[] {
  const missing: string[] = [];
  for (const s of new Set(services)) {
    if (s === 'todoist') {
      if (!env.TASK_MIRROR_TODOIST_TOKEN) missing.push('TASK_MIRROR_TODOIST_TOKEN');
    }
    if (s === 'google') {
      if (!env.TASK_MIRROR_GOOGLE_CLIENT_ID) missing.push('TASK_MIRROR_GOOGLE_CLIENT_ID');
      if (!env.TASK_MIRROR_GOOGLE_CLIENT_SECRET) missing.push('TASK_MIRROR_GOOGLE_CLIENT_SECRET');
      if (!env.TASK_MIRROR_GOOGLE_REFRESH_TOKEN) missing.push('TASK_MIRROR_GOOGLE_REFRESH_TOKEN');
    }
  }
  return missing;
}

export interface DoctorReport {
  jobs: Array<{ name: string; kind: JobKind; enabled: boolean }>;
  missing: string[];
  notes: string[];
}

export function doctorReport(config: ConfigFile, env: EnvConfig): DoctorReport {
  const enabled = config.jobs.filter((j) => j.enabled);
  const notes: string[] = [];

  if (!enabled.length) notes.push('Every job is disabled; nothing will run.');
  if (enabled.some((j) => j.kind === 'projects')) {
    notes.push(`Todoist inbox is mirrored as "${config.inboxListName}" (inboxListName).`);
  }
  if (enabled.some((j) => j.kind === 'recurrence')) {
    notes.push('Recurrence: add "every! <interval>" to a Google task\'s notes to repeat it after completion.');
  }

  return {
    jobs: config.jobs.map((j) => ({ name: jobName(j), kind: j.kind, enabled: j.enabled })),
    missing: missingCredentials(enabled.flatMap(servicesFor), env),
    notes,
  };
}
