import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'url';
import {
  mergeValues,
  composeValues,
  bundleResolver,
  ValuesResolutionError,
  type ValuesResolver,
} from '../values/merger.js';
import { buildBundle, loadBundle } from '../parser.js';
import { composeReleaseValues } from '../index.js';
import type { HelmReleaseDocument, ValuesReference, ValuesTree } from '../schema.js';

const fixturesDir = fileURLToPath(new URL('./fixtures', import.meta.url));

function release(valuesFrom: ValuesReference[], values: ValuesTree = {}): HelmReleaseDocument {
  return {
    apiVersion: 'helm.toolkit.fluxcd.io/v2',
    kind: 'HelmRelease',
    metadata: { name: 'app', namespace: 'apps' },
    spec: {
      interval: '10m',
      chart: { spec: { chart: 'app', version: '1.0.0', sourceRef: { kind: 'HelmRepository', name: 'charts' } } },
      valuesFrom,
      values,
    },
  };
}

function ref(kind: 'Secret' | 'ConfigMap', name: string, extra: Partial<ValuesReference> = {}): ValuesReference {
  return { kind, name, valuesKey: 'values.yaml', optional: false, ...extra };
}

function resolverFrom(sources: Record<string, Record<string, string>>): ValuesResolver {
  return reference => sources[`${reference.kind}/${reference.name}`];
}

describe('mergeValues', () => {
  it('should merge nested mappings key by key', () => {
    const result = mergeValues(
      { global: { hosts: { domain: 'a.example', https: true } }, replicas: 1 },
      { global: { hosts: { domain: 'b.example' } } }
    );

    expect(result).toEqual({ global: { hosts: { domain: 'b.example', https: true } }, replicas: 1 });
  });

  it('should replace lists and accept null overrides', () => {
    const result = mergeValues({ hosts: ['a', 'b'], tls: { enabled: true } }, { hosts: ['c'], tls: null });

    expect(result).toEqual({ hosts: ['c'], tls: null });
  });

  it('should not modify its inputs', () => {
    const base: ValuesTree = { a: { b: 1 } };
    const override: ValuesTree = { a: { c: 2 } };
    mergeValues(base, override);

    expect(base).toEqual({ a: { b: 1 } });
    expect(override).toEqual({ a: { c: 2 } });
  });
});

describe('composeValues', () => {
  it('should apply valuesFrom in order, then inline values last', () => {
    const resolver = resolverFrom({
      'Secret/first': { 'values.yaml': 'tier: first\nshared: first\n' },
      'ConfigMap/second': { 'values.yaml': 'shared: second\nextra: true\n' },
    });

    const result = composeValues(
      release([ref('Secret', 'first'), ref('ConfigMap', 'second')], { tier: 'inline' }),
      resolver
    );

    expect(result.values).toEqual({ tier: 'inline', shared: 'second', extra: true });
    expect(result.layers).toEqual([
      { source: 'valuesFrom', label: 'Secret/first[values.yaml]', applied: true },
      { source: 'valuesFrom', label: 'ConfigMap/second[values.yaml]', applied: true },
      { source: 'values', label: 'inline', applied: true },
    ]);
  });

  it('should set the raw string at targetPath', () => {
    const resolver = resolverFrom({ 'Secret/db': { password: 'test-secret' } });

    const result = composeValues(
      release([ref('Secret', 'db', { valuesKey: 'password', targetPath: 'global.psql.password' })]),
      resolver
    );

    expect(result.values).toEqual({ global: { psql: { password: 'test-secret' } } });
  });

  it('should reject target paths that cannot be set', () => {
    const resolver = resolverFrom({ 'Secret/db': { password: 'test-secret' } });

    for (const [targetPath, message] of [
      ['[0]', 'Secret "db": Path "[0]" must start with a mapping key'],
      ['a[50000000]', 'Secret "db": List index 50000000 in path "a[50000000]" exceeds 65536'],
      ['a[]', 'Secret "db": Invalid list index in path "a[]" at position 1'],
    ]) {
      try {
        composeValues(
          release([ref('Secret', 'db', { valuesKey: 'password', targetPath, optional: true })]),
          resolver
        );
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(ValuesResolutionError);
        expect(err).toMatchObject({ message, reason: 'invalid-content' });
      }
    }
  });

  it('should fail when a required reference is missing', () => {
    const compose = () => composeValues(release([ref('Secret', 'absent')]), resolverFrom({}));

    expect(compose).toThrow(ValuesResolutionError);
    expect(compose).toThrow('Secret "absent" not found');
  });

  it('should fail when a required key is missing', () => {
    try {
      composeValues(
        release([ref('ConfigMap', 'cfg', { valuesKey: 'other.yaml' })]),
        resolverFrom({ 'ConfigMap/cfg': { 'values.yaml': 'a: 1' } })
      );
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ValuesResolutionError);
      expect(err instanceof ValuesResolutionError && err.reason).toBe('missing-key');
    }
  });

  it('should skip optional references that are missing', () => {
    const result = composeValues(
      release([ref('ConfigMap', 'absent', { optional: true })], { a: 1 }),
      resolverFrom({})
    );

    expect(result.values).toEqual({ a: 1 });
    expect(result.layers[0]).toEqual({
      source: 'valuesFrom',
      label: 'ConfigMap/absent[values.yaml]',
      applied: false,
      skipped: 'not-found',
    });
  });

  it('should fail on content that is not a mapping, even when optional', () => {
    const compose = () =>
      composeValues(
        release([ref('ConfigMap', 'cfg', { optional: true })]),
        resolverFrom({ 'ConfigMap/cfg': { 'values.yaml': '- a\n- b\n' } })
      );

    expect(compose).toThrow('ConfigMap "cfg" key "values.yaml" must hold a mapping');
  });

  it('should treat empty content as no values', () => {
    const result = composeValues(
      release([ref('ConfigMap', 'cfg')], { a: 1 }),
      resolverFrom({ 'ConfigMap/cfg': { 'values.yaml': '' } })
    );

    expect(result.values).toEqual({ a: 1 });
  });

  it('should be deterministic', () => {
    const resolver = resolverFrom({ 'Secret/s': { 'values.yaml': 'a: {b: 1}' } });
    const doc = release([ref('Secret', 's')], { a: { c: 2 } });

    expect(composeValues(doc, resolver)).toEqual(composeValues(doc, resolver));
  });
});

describe('bundleResolver', () => {
  it('should decode base64 data and let stringData win', () => {
    const bundle = buildBundle([
      {
        file: 'secret.yaml',
        index: 0,
        kind: 'Secret',
        raw: {
          apiVersion: 'v1',
          kind: 'Secret',
          metadata: { name: 's', namespace: 'apps' },
          data: {
            'values.yaml': Buffer.from('from: data\n').toString('base64'),
            'other.yaml': Buffer.from('kept: true\n').toString('base64'),
          },
          stringData: { 'values.yaml': 'from: stringData\n' },
        },
      },
    ]);

    const resolve = bundleResolver(bundle);

    expect(resolve(ref('Secret', 's'), 'apps')).toEqual({
      'values.yaml': 'from: stringData\n',
      'other.yaml': 'kept: true\n',
    });
    expect(resolve(ref('Secret', 's'), 'other-namespace')).toBeUndefined();
    expect(resolve(ref('ConfigMap', 's'), 'apps')).toBeUndefined();
  });

  it('should compose the fixture release from its Secret', () => {
    const bundle = loadBundle([fixturesDir]);
    const result = composeReleaseValues(bundle, 'gitlab/gitlab');

    expect(result.values.global).toMatchObject({
      hosts: { domain: 'example.io', https: true },
      psql: { host: 'db.example.internal', port: 5432 },
    });
    expect(result.values.gitlab).toMatchObject({ webservice: { minReplicas: 4, maxReplicas: 16 } });
    expect(result.layers).toEqual([
      { source: 'valuesFrom', label: 'Secret/gitlab-secrets[values.yaml]', applied: true },
      {
        source: 'valuesFrom',
        label: 'ConfigMap/gitlab-ses-config[values.yaml]',
        applied: false,
        skipped: 'not-found',
      },
      { source: 'values', label: 'inline', applied: true },
    ]);
  });

  it('should report unknown releases', () => {
    const bundle = loadBundle([fixturesDir]);

    expect(() => composeReleaseValues(bundle, 'gitlab/missing')).toThrow('Release "gitlab/missing" not found');
  });
});
