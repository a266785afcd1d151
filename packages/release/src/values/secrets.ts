/**
 * Secrets named from inside a values tree
 */

import type { ValuesTree } from '../schema.js';
import { formatValuesPath, isValuesTree, walkValues } from './paths.js';

export interface ValueSecretRef {
  secret: string;
  key?: string;
  path: string;
}

/**
 * Find `{ secret, key }` pairs and `secretName` strings anywhere in the tree.
 * These are read by the chart at render time, not merged by the controller.
 */
export function collectValueSecretRefs(values: ValuesTree): ValueSecretRef[] {
  const refs: ValueSecretRef[] = [];

  walkValues(values, ({ path, key, node }) => {
    if (key === 'secretName' && typeof node === 'string' && node !== '') {
      refs.push({ secret: node, path: formatValuesPath(path) });
      return;
    }

    if (isValuesTree(node) && typeof node.secret === 'string' && node.secret !== '') {
      refs.push({
        secret: node.secret,
        ...(typeof node.key === 'string' && { key: node.key }),
        path: formatValuesPath(path),
      });
    }
  });

  return refs;
}
