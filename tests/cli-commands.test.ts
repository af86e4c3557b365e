import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { readFile, readdir } from 'node:fs/promises';
import { join } from 'node:path';

import { runDigestCommand } from '../src/cli/commands/digest.js';
import { runExecuteCommand } from '../src/cli/commands/execute.js';
import { runLogCommand } from '../src/cli/commands/log.js';
import { runRelayCommand } from '../src/cli/commands/relay.js';
import { runRunCommand } from '../src/cli/commands/run.js';
import { QuietRenderer, setRenderer } from '../src/cli/ui/renderer.js';
import type { HostEnvironment } from '../src/core/run/environment.js';
import { fileExists } from '../src/utils/fs.js';
import { stringifyJson } from '../src/utils/json.js';
import { createWorkspace } from './fixtures.js';

const HOST: HostEnvironment = {
  node_version: '20.0.0',
  platform: 'linux-test-x64',
  hostname: 'test-host',
  user: 'tester',
  git_head: null
};

let events: Array<Record<string, unknown>> = [];

beforeEach(() => {
  events = [];
  setRenderer(new QuietRenderer());
  vi.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array) => {
    for (const line of String(chunk).split('\n')) {
      if (!line.trim()) continue;
      const parsed: unknown = JSON.parse(line);
      if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
        events.push(Object.fromEntries(Object.entries(parsed)));
      }
    }
    return true;
  });
});

afterEach(() => {
  vi.restoreAllMocks();
});

function collector() {
  const chunks: string[] = [];
  return { out: (text: string) => void chunks.push(text), text: () => chunks.join('') };
}

async function readJsonFile(path: string): Promise<unknown> {
  return JSON.parse(await readFile(path, 'utf8'));
}

describe('relay command', () => {
  it('writes agent outputs and prints the relay document', async () => {
    const root = await createWorkspace();
    const stdout = collector();

    const res = await runRelayCommand({
      persona: 'sage',
      role: 'advisor',
      payload: '{"intent":"reduce latency"}',
      runDir: 'runs/one',
      cwd: root,
      env: {},
      out: stdout.out
    });

    expect(res.ok).toBe(true);
    const printed: unknown = JSON.parse(stdout.text());
    expect(printed).toEqual(JSON.parse(stringifyJson(res.value)));
    expect(res.value?.run_dir).toBe(join(root, 'runs/one'));
    expect(res.value?.cfms.status).toBe('ok');
    expect(res.value?.result.policy_bundle).toEqual(['charter', 'privacy']);
    expect(res.value?.result.environment).toEqual({ tier: 'test' });
    expect(res.value?.result.evaluation.weighted_total).toBeCloseTo(0.875, 10);

    expect(await readdir(join(root, 'runs/one/outputs'))).toEqual(['sage_agent.json']);
    expect(await readJsonFile(join(root, 'runs/one/outputs/sage_agent.json'))).toEqual(
      JSON.parse(stringifyJson(res.value?.result.outputs.sage_agent))
    );
    expect(events.map((e) => e.type)).toEqual(['relay_complete']);
  });

  it('prints payload keys in request order', async () => {
    const root = await createWorkspace();
    const stdout = collector();

    const res = await runRelayCommand({
      persona: 'sage',
      role: 'advisor',
      payload: '{"intent":"ship","7":"a"}',
      runDir: 'runs/ordered',
      cwd: root,
      env: {},
      out: stdout.out
    });

    expect(res.ok).toBe(true);
    expect(stdout.text()).toContain('  "payload": {\n    "intent": "ship",\n    "7": "a"\n  },\n');
    expect(stdout.text()).toContain('    "inputs": {\n      "intent": "ship",\n      "7": "a"\n    },\n');
  });

  it('fails on a malformed payload before touching the run directory', async () => {
    const root = await createWorkspace();
    const stdout = collector();

    const res = await runRelayCommand({ persona: 'sage', role: 'advisor', payload: '{oops', runDir: 'run', cwd: root, env: {}, out: stdout.out });

    expect(res.ok).toBe(false);
    expect(String(res.details)).toMatch(/^Invalid payload JSON: /);
    expect(res.tip).toBeDefined();
    expect(stdout.text()).toBe('');
    expect(await fileExists(join(root, 'run'))).toBe(false);
  });

  it('reads the stacks directory from the environment', async () => {
    const root = await createWorkspace();
    const res = await runRelayCommand({
      persona: 'sage',
      role: 'advisor',
      runDir: 'run',
      cwd: root,
      env: { STACKRELAY_STACKS_DIR: 'elsewhere' },
      out: collector().out
    });

    expect(res.ok).toBe(false);
    expect(res.details).toBe(`No stack matches persona=sage role=advisor in ${join(root, 'elsewhere')}`);
  });

  it('rejects an explicit stack with another routing', async () => {
    const root = await createWorkspace();
    const res = await runRelayCommand({
      persona: 'sage',
      role: 'critic',
      stackFile: 'stacks/sage.yaml',
      runDir: 'run',
      cwd: root,
      env: {},
      out: collector().out
    });

    expect(res.ok).toBe(false);
    expect(String(res.details)).toMatch(/^Stack routing mismatch: expected persona=sage, role=critic/);
  });
});

describe('execute command', () => {
  it('prints the envelope without resolving includes', async () => {
    const root = await createWorkspace();
    const stdout = collector();

    const res = await runExecuteCommand({ stack: 'stacks/sage.yaml', payload: '{"goal":"tidy"}', cwd: root, env: {}, out: stdout.out });

    expect(res.ok).toBe(true);
    expect(res.value?.stack_id).toBe('sage-advisor');
    expect(res.value?.invariants_snapshot).toEqual({});
    expect(res.value?.outputs.sage_agent?.content.advice).toContain("confirms the goal 'tidy'");
    const printed: unknown = JSON.parse(stdout.text());
    expect(printed).toEqual(JSON.parse(stringifyJson(res.value)));
  });

  it('reports a missing stack file', async () => {
    const root = await createWorkspace();
    const res = await runExecuteCommand({ stack: 'stacks/none.yaml', cwd: root, env: {}, out: collector().out });
    expect(res.ok).toBe(false);
    expect(res.details).toBe(`Missing YAML file: ${join(root, 'stacks/none.yaml')}`);
  });
});

describe('log command', () => {
  it('writes logger.json for the run directory', async () => {
    const root = await createWorkspace();
    const res = await runLogCommand({ runDir: 'runs/two', cwd: root, env: {} });

    expect(res.ok).toBe(true);
    expect(res.value?.files_present).toEqual([]);
    expect(res.value?.environment).toBeUndefined();
    expect(await readJsonFile(join(root, 'runs/two/logger.json'))).toEqual(res.value);
  });
});

describe('run and digest commands', () => {
  it('records a full run in the vault and digests it', async () => {
    const root = await createWorkspace();

    const res = await runRunCommand({
      stack: 'stacks/sage.yaml',
      persona: 'sage',
      role: 'advisor',
      payload: '{"intent":"reduce latency","next_action":"profile"}',
      cwd: root,
      env: {},
      now: new Date('2026-10-18T09:10:11.000Z'),
      captureEnvironment: async () => HOST
    });

    expect(res.ok).toBe(true);
    const runDir = join(root, 'vault', 'runs', '2026-10-18', '091011');
    expect(res.value).toMatchObject({ runDir, label: '2026-10-18/091011', stackId: 'sage-advisor', vault: 'not_a_repository' });
    expect((await readdir(runDir)).sort()).toEqual(['evaluation.json', 'logger.json', 'outputs', 'relay.json']);

    const logger = await readJsonFile(join(runDir, 'logger.json'));
    expect(logger).toMatchObject({ run_dir: runDir, files_present: ['outputs', 'relay.json'], environment: HOST });

    const relayDoc = await readJsonFile(join(runDir, 'relay.json'));
    expect(relayDoc).toMatchObject({
      run_dir: runDir,
      stack_file: join(root, 'stacks', 'sage.yaml'),
      persona: 'sage',
      role: 'advisor',
      payload: { intent: 'reduce latency', next_action: 'profile' },
      cfms: { status: 'ok' }
    });
    expect(await readFile(join(runDir, 'evaluation.json'), 'utf8')).toBe(
      await readFile(join(root, 'config', 'rubric.json'), 'utf8')
    );

    const digest = await runDigestCommand({ cwd: root, env: {}, now: new Date('2026-10-18T10:00:00.000Z') });
    expect(digest.ok).toBe(true);
    expect(digest.value).toMatchObject({
      window_days: 7,
      runs_considered: 1,
      persona_roles: [{ persona: 'sage', role: 'advisor' }],
      average_scores: { charter_alignment: 0.9, clarity: 0.85 },
      recent_runs: [{ timestamp: '2026-10-18T091011Z', stack_id: 'sage-advisor' }]
    });
    expect(await readJsonFile(join(root, 'vault', 'digest.json'))).toEqual(digest.value);
  });

  it('writes the digest to an explicit output path', async () => {
    const root = await createWorkspace();
    const res = await runDigestCommand({ cwd: root, env: {}, output: 'out/digest.json', windowDays: 1 });

    expect(res.ok).toBe(true);
    expect(res.value?.runs_considered).toBe(0);
    expect(await readJsonFile(join(root, 'out', 'digest.json'))).toMatchObject({ window_days: 1, runs_considered: 0 });
  });

  it('rejects a negative window', async () => {
    const root = await createWorkspace();
    const res = await runDigestCommand({ cwd: root, env: {}, windowDays: -1 });
    expect(res.ok).toBe(false);
    expect(res.details).toBe('--window-days must be a non-negative integer, got -1');
  });
});
