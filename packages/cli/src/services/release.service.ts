/**
 * Release service
 * Loads document bundles for commands and shapes them for output
 */

import * as yaml from 'js-yaml';
import {
  bundleResolver,
  collectValueSecretRefs,
  loadBundle,
  type ComposedValues,
  type DocumentBundle,
  type ValueSecretRef,
  type ValuesReference,
} from '@fluxlint/release';

export interface ReferenceSummary extends ValuesReference {
  /** Whether the Secret or ConfigMap is among the loaded documents */
  declared: boolean;
}

export interface ReleaseReferences {
  release: string;
  file: string;
  valuesFrom: ReferenceSummary[];
  valueSecrets: ValueSecretRef[];
}

export class BundleLoadError extends Error {
  paths: string[];

  constructor(paths: string[], cause: unknown) {
    super(cause instanceof Error ? cause.message : String(cause), { cause });
    this.name = 'BundleLoadError';
    this.paths = paths;
  }
}

/**
 * Load a bundle, wrapping parse and I/O failures
 */
export function loadReleaseBundle(paths: string[]): DocumentBundle {
  try {
    return loadBundle(paths);
  } catch (error) {
    throw new BundleLoadError(paths, error);
  }
}

/**
 * External references of every release: its valuesFrom entries and the
 * secrets its inline values point at
 */
export function collectReleaseReferences(bundle: DocumentBundle): ReleaseReferences[] {
  const resolve = bundleResolver(bundle);

  return bundle.releases.map(({ source, document }) => ({
    release: `${document.metadata.namespace}/${document.metadata.name}`,
    file: source.file,
    valuesFrom: document.spec.valuesFrom.map(reference => ({
      ...reference,
      declared: resolve(reference, document.metadata.namespace) !== undefined,
    })),
    valueSecrets: collectValueSecretRefs(document.spec.values),
  }));
}

/**
 * Render composed values as YAML with a comment line per layer, or as JSON
 */
export function renderComposedValues(composed: ComposedValues, format: 'yaml' | 'json'): string {
  if (format === 'json') {
    return JSON.stringify(composed, null, 2);
  }

  const header = composed.layers.map(layer =>
    layer.applied ? `# applied: ${layer.label}` : `# skipped (${layer.skipped}): ${layer.label}`
  );
  const body = Object.keys(composed.values).length === 0 ? '{}\n' : yaml.dump(composed.values, { lineWidth: -1 });

  return [...header, body.trimEnd()].join('\n');
}
