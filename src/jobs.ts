import { jobName, missingCredentials, servicesFor, type ConfigFile, type EnvConfig, type JobConfig } from './config.js';
import { ConfigError } from './errors.js';
import type { Logger } from './log.js';
import { DEFAULT_TAG } from './directives.js';
import type { FetchLike } from './http.js';
import type { TaskProvider } from './providers/provider.js';
import { GoogleTasksProvider } from './providers/google.js';
import { TodoistProvider } from './providers/todoist.js';
import { JsonStore } from './store/jsonStore.js';
import type { Criterion } from './sync/eligibility.js';
import type { MirrorJob } from './sync/job.js';
import { Reconciler } from './sync/reconciler.js';
import { RecurrenceRunner } from './sync/recurrence.js';
import type { RunnableJob } from './sync/scheduler.js';

export interface Services {
  todoist?: TaskProvider;
  google?: TaskProvider;
}

function need(value: string | undefined, key: string): string {
  if (!value) throw new ConfigError(`Missing ${key}. Run: task-mirror doctor`);
  return value;
}

export function selectJobs(config: ConfigFile, only?: string): JobConfig[] {
  const enabled = config.jobs.filter((j) => j.enabled);
  if (only === undefined) return enabled;
  const hit = config.jobs.find((j) => jobName(j) === only);
  if (!hit) throw new ConfigError(`No job named "${only}" (have: ${config.jobs.map(jobName).join(', ')})`);
  return [hit];
}

export interface ServiceOptions {
  /** Receives HTTP retry warnings. */
  logger?: Logger;
  fetcher?: FetchLike;
}

/** Build the providers the selected jobs need; missing credentials are a ConfigError. */
export function createServices(
  config: ConfigFile,
  env: EnvConfig,
  jobs: JobConfig[],
  { logger, fetcher }: ServiceOptions = {},
): Services {
  const needs = new Set(jobs.flatMap(servicesFor));
  const missing = missingCredentials(needs, env);
  if (missing.length) throw new ConfigError(`Missing credentials: ${missing.join(', ')}. Run: task-mirror doctor`);

  const rps = env.TASK_MIRROR_HTTP_RPS ?? config.httpRps;
  const services: Services = {};

  if (needs.has('todoist')) {
    services.todoist = new TodoistProvider({
      token: need(env.TASK_MIRROR_TODOIST_TOKEN, 'TASK_MIRROR_TODOIST_TOKEN'),
      inboxName: config.inboxListName,
      rps,
      fetcher,
      logger,
    });
  }
  if (needs.has('google')) {
    services.google = new GoogleTasksProvider({
      clientId: need(env.TASK_MIRROR_GOOGLE_CLIENT_ID, 'TASK_MIRROR_GOOGLE_CLIENT_ID'),
      clientSecret: need(env.TASK_MIRROR_GOOGLE_CLIENT_SECRET, 'TASK_MIRROR_GOOGLE_CLIENT_SECRET'),
      refreshToken: need(env.TASK_MIRROR_GOOGLE_REFRESH_TOKEN, 'TASK_MIRROR_GOOGLE_REFRESH_TOKEN'),
      rps,
      fetcher,
      logger,
    });
  }

  return services;
}

function provider(services: Services, key: keyof Services): TaskProvider {
  const p = services[key];
  if (!p) throw new ConfigError(`${key} is not configured`);
  return p;
}

/** The mirror profile a configured job describes. */
export function toMirrorJob(job: Exclude<JobConfig, { kind: 'recurrence' }>, config: ConfigFile, services: Services): MirrorJob {
  const common = {
    name: jobName(job),
    cascadeCompletion: job.cascadeCompletion,
    cascadeToleranceDays: config.cascadeToleranceDays,
  };

  switch (job.kind) {
    case 'priority': {
      const anyOf: Criterion[] = [];
      if (job.syncPriorityTasks) anyOf.push({ kind: 'priority', min: job.minPriority });
      if (job.labels.length) anyOf.push({ kind: 'labels', names: job.labels });
      return {
        ...common,
        source: provider(services, 'todoist'),
        mirror: provider(services, 'google'),
        sourceCollections: job.projects,
        excludedCollections: [],
        target: { kind: 'single', listName: job.targetList },
        eligibility: { requireDate: true, lookaheadDays: job.lookaheadDays, anyOf },
        notesStyle: 'provenance',
        stripMarkers: true,
        tag: DEFAULT_TAG,
        compareDue: false,
      };
    }
    case 'projects':
      return {
        ...common,
        source: provider(services, 'todoist'),
        mirror: provider(services, 'google'),
        sourceCollections: [],
        excludedCollections: job.excludedProjects,
        target: { kind: 'per-collection' },
        eligibility: { requireDate: false, anyOf: [] },
        notesStyle: 'recurrence',
        stripMarkers: false,
        tag: DEFAULT_TAG,
        compareDue: true,
      };
    case 'starred':
      return {
        ...common,
        source: provider(services, 'google'),
        mirror: provider(services, 'google'),
        sourceCollections: job.sourceLists,
        excludedCollections: [job.targetList],
        target: { kind: 'single', listName: job.targetList },
        eligibility: { requireDate: false, anyOf: [{ kind: 'starred' }, { kind: 'tagged', tag: job.tag }] },
        notesStyle: 'source',
        stripMarkers: true,
        tag: job.tag,
        compareDue: true,
      };
  }
}

export function buildJobs(
  jobs: JobConfig[],
  config: ConfigFile,
  services: Services,
  stateDir: string,
  logger: Logger,
): RunnableJob[] {
  return jobs.map((job): RunnableJob => {
    const log = logger.child(jobName(job));
    if (job.kind === 'recurrence') {
      return new RecurrenceRunner(
        {
          name: jobName(job),
          provider: provider(services, 'google'),
          lists: job.lists,
          units: config.recurrenceUnits,
          fallbackDays: config.recurrenceFallbackDays,
        },
        log,
      );
    }
    return new Reconciler(toMirrorJob(job, config, services), new JsonStore(stateDir, jobName(job), log), log);
  });
}
