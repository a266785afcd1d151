/**
 * Release-level checks: chart source, version pin and external references
 */

import { documentIdentity, locate } from '../identity.js';
import { describeReference } from '../values/merger.js';
import type { Check, Finding } from './types.js';

const EXACT_SEMVER = /^v?\d+\.\d+\.\d+(-[0-9A-Za-z.-]+)?(\+[0-9A-Za-z.-]+)?$/;

export const checkSourceRef: Check = ({ bundle }) => {
  const findings: Finding[] = [];

  for (const { source, document } of bundle.releases) {
    const ref = document.spec.chart.spec.sourceRef;
    const namespace = ref.namespace ?? document.metadata.namespace;

    const declared =
      ref.kind === 'HelmRepository'
        ? bundle.repositories.some(
            r => r.document.metadata.name === ref.name && r.document.metadata.namespace === namespace
          )
        : bundle.other.some(other => {
            const identity = documentIdentity(other);
            return (
              identity?.kind === ref.kind &&
              identity.name === ref.name &&
              identity.namespace === namespace
            );
          });

    if (!declared) {
      findings.push({
        rule: 'source-ref',
        document: locate(source),
        path: 'spec.chart.spec.sourceRef',
        message: `${ref.kind} "${namespace}/${ref.name}" is not declared in the loaded documents`,
      });
    }
  }

  return findings;
};

export const checkChartVersion: Check = ({ bundle }) =>
  bundle.releases.flatMap(({ source, document }): Finding[] => {
    const { chart, version } = document.spec.chart.spec;

    if (version === undefined) {
      return [
        {
          rule: 'chart-version',
          document: locate(source),
          path: 'spec.chart.spec.version',
          message: `chart "${chart}" has no version pin; the latest release will be installed`,
        },
      ];
    }

    if (!EXACT_SEMVER.test(version)) {
      return [
        {
          rule: 'chart-version',
          document: locate(source),
          path: 'spec.chart.spec.version',
          message: `chart "${chart}" version "${version}" is a range, not an exact version`,
        },
      ];
    }

    return [];
  });

export const checkSecretOptional: Check = ({ bundle }) =>
  bundle.releases.flatMap(({ source, document }) =>
    document.spec.valuesFrom.flatMap((reference, i): Finding[] =>
      reference.kind === 'Secret' && reference.optional
        ? [
            {
              rule: 'secret-optional',
              document: locate(source),
              path: `spec.valuesFrom[${i}].optional`,
              message: `Secret "${reference.name}" is optional; a missing secret will be skipped silently`,
            },
          ]
        : []
    )
  );

export const checkReferenceExpectations: Check = ({ bundle, config }) => {
  const findings: Finding[] = [];
  if (bundle.releases.length === 0) return findings;

  for (const expected of config.references) {
    let declared = false;

    for (const { source, document } of bundle.releases) {
      for (const [i, reference] of document.spec.valuesFrom.entries()) {
        if (reference.kind !== expected.kind || reference.name !== expected.name) continue;
        declared = true;

        if (expected.optional !== undefined && reference.optional !== expected.optional) {
          findings.push({
            rule: 'reference-expectations',
            document: locate(source),
            path: `spec.valuesFrom[${i}].optional`,
            message: `${expected.kind} "${expected.name}" must be ${expected.optional ? 'optional' : 'required'}`,
          });
        }
      }
    }

    if (!declared) {
      const first = bundle.releases[0];
      findings.push({
        rule: 'reference-expectations',
        document: locate(first.source),
        path: 'spec.valuesFrom',
        message: `no release references ${expected.kind} "${expected.name}"`,
      });
    }
  }

  return findings;
};

export const checkDuplicateValuesSources: Check = ({ bundle }) =>
  bundle.releases.flatMap(({ source, document }) => {
    const findings: Finding[] = [];
    const seen = new Map<string, number>();

    document.spec.valuesFrom.forEach((reference, i) => {
      const key = describeReference(reference);
      const first = seen.get(key);
      if (first === undefined) {
        seen.set(key, i);
        return;
      }
      findings.push({
        rule: 'duplicate-values-source',
        document: locate(source),
        path: `spec.valuesFrom[${i}]`,
        message: `${key} is already listed at spec.valuesFrom[${first}]`,
      });
    });

    return findings;
  });
