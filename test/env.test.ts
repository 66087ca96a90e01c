import { describe, expect, it } from 'vitest';
import path from 'node:path';
import os from 'node:os';
import { mkdtemp, writeFile } from 'node:fs/promises';
import { loadEnvFiles, parseEnvFile } from '../src/env.js';

describe('parseEnvFile', () => {
  it('reads keys, strips quotes and skips comments', () => {
    const raw = ['# creds', '', 'export TASK_MIRROR_TODOIST_TOKEN="test-token"', "A='x y'", 'B = 2', 'junk'].join('\n');

    expect(parseEnvFile(raw)).toEqual({ TASK_MIRROR_TODOIST_TOKEN: 'test-token', A: 'x y', B: '2' });
  });
});

describe('loadEnvFiles', () => {
  it('never overrides variables that are already set', async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), 'task-mirror-env-'));
    await writeFile(path.join(dir, '.env'), 'A=from-file\nB=from-file\n');
    const env: NodeJS.ProcessEnv = { A: 'preset' };

    const { loaded } = loadEnvFiles(['.env', '.env.local'], dir, env);

    expect(loaded).toEqual(['.env']);
    expect(env).toEqual({ A: 'preset', B: 'from-file' });
  });
});
