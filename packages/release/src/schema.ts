/**
 * fluxlint release schema
 * TypeScript interfaces for Flux HelmRepository / HelmRelease documents
 */

// =============================================================================
// Values
// =============================================================================

export type ValuesScalar = string | number | boolean | null;

export type ValuesNode = ValuesScalar | ValuesNode[] | ValuesTree;

export interface ValuesTree {
  [key: string]: ValuesNode;
}

// =============================================================================
// Common
// =============================================================================

export interface ObjectMeta {
  name: string;
  namespace: string;
  labels?: Record<string, string>;
  annotations?: Record<string, string>;
}

// =============================================================================
// Chart Source (HelmRepository)
// =============================================================================

export const HELM_REPOSITORY_API_VERSIONS = [
  'source.toolkit.fluxcd.io/v1beta1',
  'source.toolkit.fluxcd.io/v1beta2',
  'source.toolkit.fluxcd.io/v1',
] as const;

export interface HelmRepositorySpec {
  url: string;
  interval: string;
  type?: 'default' | 'oci';
  timeout?: string;
  suspend?: boolean;
}

export interface HelmRepositoryDocument {
  apiVersion: (typeof HELM_REPOSITORY_API_VERSIONS)[number];
  kind: 'HelmRepository';
  metadata: ObjectMeta;
  spec: HelmRepositorySpec;
}

// =============================================================================
// Release (HelmRelease)
// =============================================================================

export const HELM_RELEASE_API_VERSIONS = [
  'helm.toolkit.fluxcd.io/v2beta1',
  'helm.toolkit.fluxcd.io/v2beta2',
  'helm.toolkit.fluxcd.io/v2',
] as const;

export const SOURCE_REF_KINDS = ['HelmRepository', 'GitRepository', 'Bucket'] as const;

export type SourceRefKind = (typeof SOURCE_REF_KINDS)[number];

export interface ChartSourceRef {
  kind: SourceRefKind;
  name: string;
  namespace?: string;
}

export interface ChartTemplateSpec {
  chart: string;
  version?: string;
  sourceRef: ChartSourceRef;
}

export type ValuesReferenceKind = 'Secret' | 'ConfigMap';

export const DEFAULT_VALUES_KEY = 'values.yaml';

export interface ValuesReference {
  kind: ValuesReferenceKind;
  name: string;
  valuesKey: string;
  targetPath?: string;
  optional: boolean;
}

export interface HelmReleaseSpec {
  interval: string;
  chart: {
    spec: ChartTemplateSpec;
  };
  releaseName?: string;
  targetNamespace?: string;
  suspend?: boolean;
  valuesFrom: ValuesReference[];
  values: ValuesTree;
}

export interface HelmReleaseDocument {
  apiVersion: (typeof HELM_RELEASE_API_VERSIONS)[number];
  kind: 'HelmRelease';
  metadata: ObjectMeta;
  spec: HelmReleaseSpec;
}

// =============================================================================
// Value Carriers (Secret / ConfigMap)
// =============================================================================

export interface SecretDocument {
  apiVersion: 'v1';
  kind: 'Secret';
  metadata: ObjectMeta;
  data?: Record<string, string>;
  stringData?: Record<string, string>;
}

export interface ConfigMapDocument {
  apiVersion: 'v1';
  kind: 'ConfigMap';
  metadata: ObjectMeta;
  data?: Record<string, string>;
}

// =============================================================================
// Loaded Documents
// =============================================================================

/**
 * A single YAML document as read from disk, before validation
 */
export interface LoadedDocument {
  file: string;
  /** Position of the document within its file, starting at 0 */
  index: number;
  apiVersion?: string;
  kind?: string;
  raw: unknown;
}

export interface Located<T> {
  source: LoadedDocument;
  document: T;
}

export interface DocumentBundle {
  repositories: Located<HelmRepositoryDocument>[];
  releases: Located<HelmReleaseDocument>[];
  secrets: Located<SecretDocument>[];
  configMaps: Located<ConfigMapDocument>[];
  /** Documents of kinds this tool does not inspect */
  other: LoadedDocument[];
  /** Schema failures found while classifying */
  invalid: Array<{ source: LoadedDocument; errors: ValidationError[] }>;
}

// =============================================================================
// Validation Types
// =============================================================================

export interface ValidationError {
  path: string;
  message: string;
  value?: unknown;
}

export type ValidationResult<T = unknown> =
  | { valid: true; errors: ValidationError[]; document: T }
  | { valid: false; errors: ValidationError[] };

// =============================================================================
// Lint Types
// =============================================================================

export type Severity = 'error' | 'warning';

export type RuleSetting = Severity | 'off';

export const RULE_IDS = [
  'schema',
  'duplicate-resource',
  'source-ref',
  'chart-version',
  'node-selector-consistency',
  'resource-bounds',
  'replica-bounds',
  'secret-optional',
  'reference-expectations',
  'duplicate-values-source',
] as const;

export type RuleId = (typeof RULE_IDS)[number];

export interface DocumentLocation {
  file: string;
  index: number;
  kind?: string;
  name?: string;
  namespace?: string;
}

export interface Diagnostic {
  rule: RuleId;
  severity: Severity;
  document: DocumentLocation;
  path: string;
  message: string;
}

export interface LintReport {
  diagnostics: Diagnostic[];
  errorCount: number;
  warningCount: number;
  documentCount: number;
}
