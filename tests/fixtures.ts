import { mkdir, mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';

export const PIPELINE_LINE = 'pipeline: relay → executor → logger → evaluation → digest';

export const SAGE_STACK = `meta:
  id: sage-advisor
  purpose: charter stewardship
routing:
  persona: sage
  role: advisor
include:
  - _cfms_invariants.yaml
agents:
  - name: sage_agent
    outputs:
      - format: json
        normalize: true
`;

export const INVARIANTS = `cfms_invariants:
  stackable:
    enforcement:
      - "${PIPELINE_LINE}"
`;

export const POLICIES = `policies:
  charter:
    summary: Stay within the charter
  privacy: {}
`;

export const ENVIRONMENT = `environment:
  tier: test
`;

export const RUBRIC = JSON.stringify({
  criteria: [
    { key: 'charter_alignment', weight: 0.5 },
    { key: 'clarity', weight: 0.5 }
  ]
});

export async function makeTempDir(prefix = 'stackrelay-'): Promise<string> {
  return await mkdtemp(join(tmpdir(), prefix));
}

export async function writeFixture(root: string, relPath: string, content: string): Promise<string> {
  const path = join(root, relPath);
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, content, 'utf8');
  return path;
}

/**
 * A project directory laid out the way the CLI defaults expect:
 * `stacks/`, `config/policies.yaml`, `config/environment.yaml`, `config/rubric.json`.
 */
export async function createWorkspace(): Promise<string> {
  const root = await makeTempDir('stackrelay-ws-');
  await writeFixture(root, 'stacks/sage.yaml', SAGE_STACK);
  await writeFixture(root, 'stacks/_cfms_invariants.yaml', INVARIANTS);
  await writeFixture(root, 'config/policies.yaml', POLICIES);
  await writeFixture(root, 'config/environment.yaml', ENVIRONMENT);
  await writeFixture(root, 'config/rubric.json', RUBRIC);
  return root;
}
