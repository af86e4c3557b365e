import { describe, expect, it } from 'vitest';
import { join } from 'node:path';

import { defineRelayConfig, loadRelayConfig, policyKeys } from '../src/core/config/store.js';
import { ConfigError } from '../src/core/errors.js';
import { ENVIRONMENT, POLICIES, RUBRIC, makeTempDir, writeFixture } from './fixtures.js';

function pathsIn(dir: string) {
  return {
    policiesPath: join(dir, 'policies.yaml'),
    environmentPath: join(dir, 'environment.yaml'),
    rubricPath: join(dir, 'rubric.json')
  };
}

describe('config store', () => {
  it('degrades missing documents to empty collections', async () => {
    const config = await loadRelayConfig(pathsIn(await makeTempDir()));
    expect(config.policies.size).toBe(0);
    expect(config.environment).toEqual({});
    expect(config.rubric).toEqual({ criteria: [] });
  });

  it('loads all three documents', async () => {
    const dir = await makeTempDir();
    await writeFixture(dir, 'policies.yaml', POLICIES);
    await writeFixture(dir, 'environment.yaml', ENVIRONMENT);
    await writeFixture(dir, 'rubric.json', RUBRIC);

    const config = await loadRelayConfig(pathsIn(dir));
    expect(policyKeys(config)).toEqual(['charter', 'privacy']);
    expect(config.policies.get('charter')?.summary).toBe('Stay within the charter');
    expect(config.environment).toEqual({ tier: 'test' });
    expect(config.rubric.criteria).toEqual([
      { key: 'charter_alignment', weight: 0.5 },
      { key: 'clarity', weight: 0.5 }
    ]);
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.environment)).toBe(true);
  });

  it('treats empty documents and null sections as empty', async () => {
    const dir = await makeTempDir();
    await writeFixture(dir, 'policies.yaml', '');
    await writeFixture(dir, 'environment.yaml', 'environment:\n');

    const config = await loadRelayConfig(pathsIn(dir));
    expect(config.policies.size).toBe(0);
    expect(config.environment).toEqual({});
  });

  it('keeps the policy catalog in document order', async () => {
    const dir = await makeTempDir();
    await writeFixture(dir, 'policies.yaml', 'policies:\n  charter:\n    summary: c\n  2024:\n    summary: yearly\n  audit:\n    summary: yes\n');

    const config = await loadRelayConfig(pathsIn(dir));
    expect(policyKeys(config)).toEqual(['charter', '2024', 'audit']);
    expect(config.policies.get('2024')?.summary).toBe('yearly');
    expect(config.policies.get('audit')?.summary).toBe(true);
  });

  it('rejects a policy catalog that is not a mapping', async () => {
    const dir = await makeTempDir();
    const path = await writeFixture(dir, 'policies.yaml', '- charter\n');

    await expect(loadRelayConfig(pathsIn(dir))).rejects.toThrow(new ConfigError(path, `YAML document at ${path} must be a mapping`));
  });

  it('rejects an unreadable rubric', async () => {
    const dir = await makeTempDir();
    await writeFixture(dir, 'rubric.json', '{"criteria": [');
    await expect(loadRelayConfig(pathsIn(dir))).rejects.toBeInstanceOf(ConfigError);

    await writeFixture(dir, 'rubric.json', '{"criteria": [{"weight": 1}]}');
    await expect(loadRelayConfig(pathsIn(dir))).rejects.toThrow(/^Malformed document/);
  });

  it('defines a frozen configuration from parts', () => {
    const config = defineRelayConfig({ environment: { region: 'none' } });
    expect(config.policies.size).toBe(0);
    expect(config.environment).toEqual({ region: 'none' });
    expect(config.rubric).toEqual({ criteria: [] });
    expect(Object.isFrozen(config.environment)).toBe(true);
  });
});
