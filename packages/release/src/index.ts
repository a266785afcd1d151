/**
 * @fluxlint/release
 * Loader, validator and linter for Flux HelmRepository / HelmRelease documents
 */

// Schema types
export type {
  ValuesScalar,
  ValuesNode,
  ValuesTree,
  ObjectMeta,
  HelmRepositorySpec,
  HelmRepositoryDocument,
  ChartSourceRef,
  ChartTemplateSpec,
  SourceRefKind,
  ValuesReference,
  ValuesReferenceKind,
  HelmReleaseSpec,
  HelmReleaseDocument,
  SecretDocument,
  ConfigMapDocument,
  LoadedDocument,
  Located,
  DocumentBundle,
  ValidationError,
  ValidationResult,
  Severity,
  RuleSetting,
  RuleId,
  DocumentLocation,
  Diagnostic,
  LintReport,
} from './schema.js';

export {
  HELM_REPOSITORY_API_VERSIONS,
  HELM_RELEASE_API_VERSIONS,
  SOURCE_REF_KINDS,
  DEFAULT_VALUES_KEY,
  RULE_IDS,
} from './schema.js';

// Parser
export {
  DocumentParseError,
  findDocumentFiles,
  parseDocumentString,
  parseDocuments,
  buildBundle,
  loadBundle,
} from './parser.js';

// Validation
export {
  validateHelmRepository,
  validateHelmRelease,
  validateSecret,
  validateConfigMap,
  validateValuesTree,
  formatIssuePath,
} from './validation.js';

// Scalars
export { parseDuration, isPositiveDuration } from './duration.js';
export { parseQuantity, compareQuantities } from './quantity.js';

// Identity
export { documentIdentity, formatIdentity, locate, type DocumentIdentity } from './identity.js';

// Lint config
export {
  DEFAULT_LINT_CONFIG,
  LintConfigError,
  findLintConfigFile,
  loadLintConfig,
  parseLintConfig,
  resolveLintConfig,
  type LintConfig,
  type ReferenceExpectation,
} from './config.js';

// Lint
export { RULES, lintBundle, hasErrors, formatDiagnostic, formatReport } from './lint.js';

// Values
export * from './values/index.js';

// =============================================================================
// Convenience Functions
// =============================================================================

import { loadBundle } from './parser.js';
import { lintBundle } from './lint.js';
import { DEFAULT_LINT_CONFIG, type LintConfig } from './config.js';
import { bundleResolver, composeValues, type ComposedValues } from './values/merger.js';
import type { DocumentBundle, HelmReleaseDocument, LintReport, Located } from './schema.js';

/**
 * Full pipeline: load, validate, lint
 */
export function lintPaths(paths: string[], config: LintConfig = DEFAULT_LINT_CONFIG): LintReport {
  return lintBundle(loadBundle(paths), config);
}

/**
 * Find a release by `namespace/name`, or by bare name when it is unambiguous
 */
export function findRelease(
  bundle: DocumentBundle,
  ref: string
): Located<HelmReleaseDocument> | undefined {
  const [namespace, name] = ref.includes('/') ? ref.split('/', 2) : [undefined, ref];
  const matches = bundle.releases.filter(
    r =>
      r.document.metadata.name === name &&
      (namespace === undefined || r.document.metadata.namespace === namespace)
  );
  if (matches.length > 1) {
    throw new Error(
      `Release "${ref}" is ambiguous; use one of: ${matches
        .map(m => `${m.document.metadata.namespace}/${m.document.metadata.name}`)
        .join(', ')}`
    );
  }
  return matches[0];
}

/**
 * Compose the values of one release, taking Secrets and ConfigMaps from the
 * same bundle as its external layers
 */
export function composeReleaseValues(bundle: DocumentBundle, ref: string): ComposedValues {
  const release = findRelease(bundle, ref);
  if (!release) {
    throw new Error(`Release "${ref}" not found`);
  }
  return composeValues(release.document, bundleResolver(bundle));
}
