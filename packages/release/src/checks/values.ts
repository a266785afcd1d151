/**
 * Checks over a release's inline values tree
 */

import { locate } from '../identity.js';
import { compareQuantities, parseQuantity } from '../quantity.js';
import type { ValuesNode } from '../schema.js';
import { formatValuesPath, isValuesTree, walkValues, type PathSegment } from '../values/paths.js';
import type { Check, Finding } from './types.js';

const VALUES_ROOT: PathSegment[] = ['spec', 'values'];

interface Placement {
  value: string;
  path: string;
}

export const checkNodeSelectors: Check = ({ bundle, config }) => {
  const findings: Finding[] = [];
  const keys = config.placementKeys;

  for (const { source, document } of bundle.releases) {
    const first = new Map<string, Placement>();

    walkValues(document.spec.values, ({ path, key, node }) => {
      if (key !== 'nodeSelector' || !isValuesTree(node)) return;

      for (const [label, value] of Object.entries(node)) {
        if (keys && !keys.includes(label)) continue;

        const labelPath = formatValuesPath([...VALUES_ROOT, ...path, label]);
        const rendered = typeof value === 'string' ? value : JSON.stringify(value);
        const seen = first.get(label);

        if (!seen) {
          first.set(label, { value: rendered, path: labelPath });
        } else if (seen.value !== rendered) {
          findings.push({
            rule: 'node-selector-consistency',
            document: locate(source),
            path: labelPath,
            message: `node selector "${label}" is "${rendered}" here but "${seen.value}" at ${seen.path}`,
          });
        }
      }
    });
  }

  return findings;
};

export const checkResourceBounds: Check = ({ bundle }) => {
  const findings: Finding[] = [];

  for (const { source, document } of bundle.releases) {
    walkValues(document.spec.values, ({ path, key, node }) => {
      if (key !== 'resources' || !isValuesTree(node)) return;

      const { requests, limits } = node;
      const base = [...VALUES_ROOT, ...path];

      for (const [section, quantities] of [['requests', requests], ['limits', limits]] as const) {
        if (!isValuesTree(quantities)) continue;
        for (const [resource, quantity] of Object.entries(quantities)) {
          if (!isQuantityLike(quantity) || parseQuantity(quantity) === null) {
            findings.push({
              rule: 'resource-bounds',
              document: locate(source),
              path: formatValuesPath([...base, section, resource]),
              message: `${resource} ${section.slice(0, -1)} ${JSON.stringify(quantity)} is not a valid quantity`,
            });
          }
        }
      }

      if (!isValuesTree(requests) || !isValuesTree(limits)) return;

      for (const [resource, request] of Object.entries(requests)) {
        const limit = limits[resource];
        if (!isQuantityLike(request) || !isQuantityLike(limit)) continue;

        const diff = compareQuantities(request, limit);
        if (diff !== null && diff > 0) {
          findings.push({
            rule: 'resource-bounds',
            document: locate(source),
            path: formatValuesPath([...base, 'requests', resource]),
            message: `${resource} request ${request} exceeds limit ${limit}`,
          });
        }
      }
    });
  }

  return findings;
};

export const checkReplicaBounds: Check = ({ bundle }) => {
  const findings: Finding[] = [];

  for (const { source, document } of bundle.releases) {
    const visit = (node: ValuesNode, path: PathSegment[]) => {
      if (!isValuesTree(node)) return;
      const { minReplicas, maxReplicas } = node;

      if (typeof minReplicas === 'number' && typeof maxReplicas === 'number' && minReplicas > maxReplicas) {
        findings.push({
          rule: 'replica-bounds',
          document: locate(source),
          path: formatValuesPath([...VALUES_ROOT, ...path, 'minReplicas']),
          message: `minReplicas ${minReplicas} is greater than maxReplicas ${maxReplicas}`,
        });
      }
    };

    visit(document.spec.values, []);
    walkValues(document.spec.values, ({ path, node }) => visit(node, path));
  }

  return findings;
};

function isQuantityLike(value: ValuesNode | undefined): value is string | number {
  return typeof value === 'string' || typeof value === 'number';
}
