/**
 * Values layering for a HelmRelease
 *
 * Layers are applied in the order the Flux helm controller uses: every
 * `valuesFrom` entry in declaration order, then the inline `values` block.
 * The last layer to set a leaf wins.
 */

import * as yaml from 'js-yaml';
import type {
  DocumentBundle,
  HelmReleaseDocument,
  ValuesReference,
  ValuesTree,
} from '../schema.js';
import { validateValuesTree } from '../validation.js';
import { isValuesTree, parseTargetPath, setAtPath, type PathSegment } from './paths.js';

/**
 * Data held by a referenced Secret or ConfigMap, already decoded.
 * `undefined` means the resource does not exist.
 */
export type ValuesResolver = (
  reference: ValuesReference,
  namespace: string
) => Record<string, string> | undefined;

export type ValuesResolutionReason = 'not-found' | 'missing-key' | 'invalid-content';

export class ValuesResolutionError extends Error {
  reference: ValuesReference;
  reason: ValuesResolutionReason;

  constructor(message: string, reference: ValuesReference, reason: ValuesResolutionReason) {
    super(message);
    this.name = 'ValuesResolutionError';
    this.reference = reference;
    this.reason = reason;
  }
}

export interface ValuesLayer {
  source: 'valuesFrom' | 'values';
  /** `Secret/name[key]`, or `inline` for the values block */
  label: string;
  applied: boolean;
  /** Why an optional reference was skipped */
  skipped?: ValuesResolutionReason;
}

export interface ComposedValues {
  values: ValuesTree;
  layers: ValuesLayer[];
}

/**
 * Recursively merge `override` onto `base`. Mappings merge key by key; any
 * other value in `override` (scalar, list, null) replaces what `base` holds.
 * Neither input is modified.
 */
export function mergeValues(base: ValuesTree, override: ValuesTree): ValuesTree {
  const result: ValuesTree = { ...base };

  for (const [key, value] of Object.entries(override)) {
    const existing = result[key];
    result[key] =
      isValuesTree(existing) && isValuesTree(value) ? mergeValues(existing, value) : value;
  }

  return result;
}

export function describeReference(reference: ValuesReference): string {
  const target = reference.targetPath ? ` -> ${reference.targetPath}` : '';
  return `${reference.kind}/${reference.name}[${reference.valuesKey}]${target}`;
}

/**
 * Compute the values a release hands to its chart
 */
export function composeValues(
  release: HelmReleaseDocument,
  resolver: ValuesResolver
): ComposedValues {
  const namespace = release.metadata.namespace;
  const layers: ValuesLayer[] = [];
  let values: ValuesTree = {};

  for (const reference of release.spec.valuesFrom) {
    const label = describeReference(reference);

    try {
      values = applyReference(values, reference, resolver(reference, namespace));
      layers.push({ source: 'valuesFrom', label, applied: true });
    } catch (err) {
      if (err instanceof ValuesResolutionError && reference.optional && err.reason !== 'invalid-content') {
        layers.push({ source: 'valuesFrom', label, applied: false, skipped: err.reason });
        continue;
      }
      throw err;
    }
  }

  values = mergeValues(values, release.spec.values);
  layers.push({ source: 'values', label: 'inline', applied: true });

  return { values, layers };
}

function applyReference(
  values: ValuesTree,
  reference: ValuesReference,
  data: Record<string, string> | undefined
): ValuesTree {
  const label = `${reference.kind} "${reference.name}"`;

  if (data === undefined) {
    throw new ValuesResolutionError(`${label} not found`, reference, 'not-found');
  }

  const content = data[reference.valuesKey];
  if (content === undefined) {
    throw new ValuesResolutionError(
      `${label} has no key "${reference.valuesKey}"`,
      reference,
      'missing-key'
    );
  }

  if (reference.targetPath) {
    return setAtPath(values, targetSegments(reference.targetPath, reference), content);
  }

  return mergeValues(values, parseValuesContent(content, reference));
}

function targetSegments(targetPath: string, reference: ValuesReference): PathSegment[] {
  try {
    return parseTargetPath(targetPath);
  } catch (err) {
    throw new ValuesResolutionError(
      `${reference.kind} "${reference.name}": ${err instanceof Error ? err.message : String(err)}`,
      reference,
      'invalid-content'
    );
  }
}

function parseValuesContent(content: string, reference: ValuesReference): ValuesTree {
  const label = `${reference.kind} "${reference.name}" key "${reference.valuesKey}"`;

  let parsed: unknown;
  try {
    parsed = yaml.load(content, { schema: yaml.CORE_SCHEMA });
  } catch (err) {
    const reason = err instanceof yaml.YAMLException ? err.reason : String(err);
    throw new ValuesResolutionError(`${label} is not valid YAML: ${reason}`, reference, 'invalid-content');
  }

  if (parsed === null || parsed === undefined) return {};

  const result = validateValuesTree(parsed);
  if (!result.valid) {
    throw new ValuesResolutionError(`${label} must hold a mapping`, reference, 'invalid-content');
  }
  return result.document;
}

/**
 * Resolve references from Secret and ConfigMap documents in a bundle
 */
export function bundleResolver(bundle: DocumentBundle): ValuesResolver {
  return (reference, namespace) => {
    const matches = <T extends { metadata: { name: string; namespace: string } }>(doc: T) =>
      doc.metadata.name === reference.name && doc.metadata.namespace === namespace;

    if (reference.kind === 'ConfigMap') {
      const configMap = bundle.configMaps.find(c => matches(c.document));
      return configMap ? { ...configMap.document.data } : undefined;
    }

    const secret = bundle.secrets.find(s => matches(s.document));
    if (!secret) return undefined;

    // stringData wins over data, as on the API server
    const decoded: Record<string, string> = {};
    for (const [key, value] of Object.entries(secret.document.data ?? {})) {
      decoded[key] = Buffer.from(value, 'base64').toString('utf-8');
    }
    return { ...decoded, ...secret.document.stringData };
  };
}
