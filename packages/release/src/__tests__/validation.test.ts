import { describe, it, expect } from 'vitest';
import {
  validateHelmRepository,
  validateHelmRelease,
  validateSecret,
  formatIssuePath,
} from '../validation.js';

function repository(spec: Record<string, unknown>, metadata: Record<string, unknown> = {}) {
  return {
    apiVersion: 'source.toolkit.fluxcd.io/v1beta2',
    kind: 'HelmRepository',
    metadata: { name: 'charts', namespace: 'apps', ...metadata },
    spec,
  };
}

function release(spec: Record<string, unknown>) {
  return {
    apiVersion: 'helm.toolkit.fluxcd.io/v2beta1',
    kind: 'HelmRelease',
    metadata: { name: 'app', namespace: 'apps' },
    spec: {
      interval: '10m',
      chart: { spec: { chart: 'app', version: '1.2.3', sourceRef: { kind: 'HelmRepository', name: 'charts' } } },
      ...spec,
    },
  };
}

describe('validateHelmRepository', () => {
  it('should pass with a valid repository', () => {
    const result = validateHelmRepository(repository({ interval: '10m', url: 'https://charts.example.io' }));

    expect(result.valid).toBe(true);
    expect(result.errors).toHaveLength(0);
  });

  it('should fail when interval is missing', () => {
    const result = validateHelmRepository(repository({ url: 'https://charts.example.io' }));

    expect(result.valid).toBe(false);
    expect(result.errors).toContainEqual({ path: 'spec.interval', message: 'interval is required' });
  });

  it('should fail when interval is not positive', () => {
    const result = validateHelmRepository(repository({ interval: '0s', url: 'https://charts.example.io' }));

    expect(result.errors).toContainEqual({
      path: 'spec.interval',
      message: 'interval must be a positive duration such as 10m or 1h30m',
      value: '0s',
    });
  });

  it('should fail when url is not a repository endpoint', () => {
    const result = validateHelmRepository(repository({ interval: '10m', url: 'ftp://charts.example.io' }));

    expect(result.errors).toContainEqual({
      path: 'spec.url',
      message: 'url must be an http, https or oci repository endpoint',
      value: 'ftp://charts.example.io',
    });
  });

  it('should require type oci for oci urls', () => {
    const missing = validateHelmRepository(repository({ interval: '10m', url: 'oci://registry.example.io/charts' }));
    const declared = validateHelmRepository(
      repository({ interval: '10m', url: 'oci://registry.example.io/charts', type: 'oci' })
    );

    expect(missing.errors.map(e => e.path)).toEqual(['spec.type']);
    expect(declared.valid).toBe(true);
  });

  it('should fail when metadata is incomplete or malformed', () => {
    const result = validateHelmRepository(
      repository({ interval: '10m', url: 'https://charts.example.io' }, { name: 'Charts', namespace: undefined })
    );

    expect(result.errors).toContainEqual({ path: 'metadata.namespace', message: 'namespace is required' });
    expect(result.errors).toContainEqual({
      path: 'metadata.name',
      message: 'name must be lowercase alphanumeric with hyphens or dots',
      value: 'Charts',
    });
  });

  it('should reject unsupported api versions', () => {
    const result = validateHelmRepository({
      ...repository({ interval: '10m', url: 'https://charts.example.io' }),
      apiVersion: 'source.toolkit.fluxcd.io/v2',
    });

    expect(result.errors.map(e => e.path)).toEqual(['apiVersion']);
  });
});

describe('interval whitespace', () => {
  it('should reject an interval with surrounding spaces', () => {
    const result = validateHelmRepository(repository({ interval: ' 10m ', url: 'https://charts.example.io' }));

    expect(result.valid).toBe(false);
    expect(result.errors.map(e => e.path)).toEqual(['spec.interval']);
  });
});

describe('validateHelmRelease', () => {
  it('should apply defaults to valuesFrom entries and values', () => {
    const result = validateHelmRelease(release({ valuesFrom: [{ kind: 'Secret', name: 'app-values' }] }));

    expect(result.valid).toBe(true);
    if (!result.valid) return;
    expect(result.document.spec.valuesFrom).toEqual([
      { kind: 'Secret', name: 'app-values', valuesKey: 'values.yaml', optional: false },
    ]);
    expect(result.document.spec.values).toEqual({});
  });

  it('should keep unknown fields', () => {
    const result = validateHelmRelease(release({ install: { remediation: { retries: 3 } } }));

    expect(result.valid && result.document.spec).toMatchObject({ install: { remediation: { retries: 3 } } });
  });

  it('should fail on unknown reference kinds', () => {
    const result = validateHelmRelease(release({ valuesFrom: [{ kind: 'Vault', name: 'app-values' }] }));

    expect(result.errors).toContainEqual({
      path: 'spec.valuesFrom[0].kind',
      message: 'kind must be Secret or ConfigMap',
      value: 'Vault',
    });
  });

  it('should fail when the chart name is missing', () => {
    const result = validateHelmRelease(
      release({ chart: { spec: { sourceRef: { kind: 'HelmRepository', name: 'charts' } } } })
    );

    expect(result.errors).toContainEqual({ path: 'spec.chart.spec.chart', message: 'chart is required' });
  });

  it('should fail when values is not a mapping', () => {
    const result = validateHelmRelease(release({ values: ['a'] }));

    expect(result.errors).toContainEqual({ path: 'spec.values', message: 'values must be a mapping' });
  });
});

describe('validateSecret', () => {
  it('should require string data values', () => {
    const result = validateSecret({
      apiVersion: 'v1',
      kind: 'Secret',
      metadata: { name: 's', namespace: 'apps' },
      stringData: { 'values.yaml': 42 },
    });

    expect(result.errors.map(e => e.path)).toEqual(['stringData.values.yaml']);
  });

  it('should require base64 data values', () => {
    const secret = (data: Record<string, string>) => ({
      apiVersion: 'v1',
      kind: 'Secret',
      metadata: { name: 's', namespace: 'apps' },
      data,
    });

    expect(validateSecret(secret({ token: 'dGVzdC1zZWNyZXQ=', empty: '' })).valid).toBe(true);
    expect(validateSecret(secret({ token: 'not base64!' })).errors).toEqual([
      { path: 'data.token', message: 'data values must be base64 encoded', value: 'not base64!' },
    ]);
  });
});

describe('formatIssuePath', () => {
  it('should join keys with dots and indices with brackets', () => {
    expect(formatIssuePath(['spec', 'valuesFrom', 1, 'kind'])).toBe('spec.valuesFrom[1].kind');
    expect(formatIssuePath([])).toBe('');
  });
});
