import { silentLogger, type Logger } from '../../utils/logger.js';
import { loadJsonDocument, loadOrderedYamlMapping, loadYamlMapping, parseDocument } from './documents.js';
import {
  EnvironmentDocument,
  PolicyCatalogSection,
  RubricSchema,
  type ConfigPaths,
  type PolicyCatalog,
  type PolicyEntry,
  type RelayConfig
} from './types.js';

/**
 * Load the policy catalog, environment description and rubric schema.
 *
 * Each document is independent and optional: a missing file degrades to an empty collection.
 * A file that exists but is not a mapping (or is malformed) is a ConfigError.
 */
export async function loadRelayConfig(paths: ConfigPaths, logger: Logger = silentLogger): Promise<RelayConfig> {
  const catalog = await loadOrderedYamlMapping(paths.policiesPath, { required: false });
  const policies = parseDocument(PolicyCatalogSection, catalog.get('policies'), paths.policiesPath);
  const environmentDoc = parseDocument(
    EnvironmentDocument,
    await loadYamlMapping(paths.environmentPath, { required: false }),
    paths.environmentPath
  );
  const rubricRaw = await loadJsonDocument(paths.rubricPath, { required: false });
  const rubric = parseDocument(RubricSchema, rubricRaw ?? { criteria: [] }, paths.rubricPath);

  const config = defineRelayConfig({
    policies,
    environment: environmentDoc.environment,
    rubric
  });

  logger.debug('config loaded', {
    policies: config.policies.size,
    environmentKeys: Object.keys(config.environment).length,
    criteria: config.rubric.criteria.length
  });
  return config;
}

/**
 * Build a frozen configuration value; omitted parts are empty.
 */
export function defineRelayConfig(parts: Partial<RelayConfig> = {}): RelayConfig {
  const policies: PolicyCatalog = new Map<string, PolicyEntry>(parts.policies ?? []);
  const environment = { ...(parts.environment ?? {}) };
  const rubric = RubricSchema.parse(parts.rubric ?? { criteria: [] });
  return Object.freeze({
    policies,
    environment: Object.freeze(environment),
    rubric: Object.freeze(rubric)
  });
}

/** Policy keys in catalog order. */
export function policyKeys(config: RelayConfig): string[] {
  return Array.from(config.policies.keys());
}
