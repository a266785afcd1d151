/**
 * Path helpers for values trees
 */

import type { ValuesNode, ValuesTree } from '../schema.js';

export type PathSegment = string | number;

/** Largest list index a target path may address, as in Helm's strvals */
export const MAX_LIST_INDEX = 65536;

export function isValuesTree(node: ValuesNode | undefined): node is ValuesTree {
  return typeof node === 'object' && node !== null && !Array.isArray(node);
}

/**
 * Parse a dotted target path (`a.b[0].c`, `annotations.example\.io/x`)
 */
export function parseTargetPath(path: string): PathSegment[] {
  const segments: PathSegment[] = [];
  let current = '';

  for (let i = 0; i < path.length; i++) {
    const char = path[i];

    if (char === '\\' && i + 1 < path.length) {
      current += path[++i];
    } else if (char === '.') {
      if (current) segments.push(current);
      current = '';
    } else if (char === '[') {
      const close = path.indexOf(']', i);
      const digits = close === -1 ? '' : path.slice(i + 1, close);
      if (!/^\d+$/.test(digits)) {
        throw new Error(`Invalid list index in path "${path}" at position ${i}`);
      }
      const index = Number(digits);
      if (index > MAX_LIST_INDEX) {
        throw new Error(`List index ${index} in path "${path}" exceeds ${MAX_LIST_INDEX}`);
      }
      if (segments.length === 0 && !current) {
        throw new Error(`Path "${path}" must start with a mapping key`);
      }
      if (current) segments.push(current);
      current = '';
      segments.push(index);
      i = close;
    } else {
      current += char;
    }
  }

  if (current) segments.push(current);
  if (segments.length === 0) {
    throw new Error(`Empty path "${path}"`);
  }
  return segments;
}

export function getAtPath(tree: ValuesNode, segments: PathSegment[]): ValuesNode | undefined {
  let current: ValuesNode | undefined = tree;
  for (const segment of segments) {
    if (typeof segment === 'number') {
      if (!Array.isArray(current)) return undefined;
      current = current[segment];
    } else {
      if (!isValuesTree(current)) return undefined;
      current = current[segment];
    }
  }
  return current;
}

/**
 * Return a copy of `tree` with `value` set at `segments`, creating
 * intermediate mappings and lists as needed. Lists are padded with null.
 */
export function setAtPath(tree: ValuesTree, segments: PathSegment[], value: ValuesNode): ValuesTree {
  const result = setNode(tree, segments, value);
  if (!isValuesTree(result)) {
    throw new Error('Path must start with a mapping key');
  }
  return result;
}

function setNode(node: ValuesNode | undefined, segments: PathSegment[], value: ValuesNode): ValuesNode {
  if (segments.length === 0) return value;
  const [head, ...rest] = segments;

  if (typeof head === 'number') {
    const list: ValuesNode[] = Array.isArray(node) ? [...node] : [];
    while (list.length < head) list.push(null);
    list[head] = setNode(list[head], rest, value);
    return list;
  }

  const mapping: ValuesTree = isValuesTree(node) ? { ...node } : {};
  mapping[head] = setNode(mapping[head], rest, value);
  return mapping;
}

/**
 * Render a path for messages: `gitlab.webservice.nodeSelector["example.io/pool"]`
 */
export function formatValuesPath(segments: PathSegment[]): string {
  return segments.reduce<string>((acc, segment) => {
    if (typeof segment === 'number') return `${acc}[${segment}]`;
    if (/^[A-Za-z0-9_-]+$/.test(segment)) return acc ? `${acc}.${segment}` : segment;
    return `${acc}[${JSON.stringify(segment)}]`;
  }, '');
}

export interface VisitedNode {
  path: PathSegment[];
  key: PathSegment;
  node: ValuesNode;
  parent: ValuesTree | ValuesNode[];
}

/**
 * Depth-first walk over every node below the root, in key order
 */
export function walkValues(tree: ValuesTree, visit: (entry: VisitedNode) => void): void {
  const walk = (node: ValuesTree | ValuesNode[], path: PathSegment[]) => {
    const entries: Array<[PathSegment, ValuesNode]> = Array.isArray(node)
      ? node.map((child, i): [PathSegment, ValuesNode] => [i, child])
      : Object.entries(node);

    for (const [key, child] of entries) {
      const childPath = [...path, key];
      visit({ path: childPath, key, node: child, parent: node });
      if (Array.isArray(child) || isValuesTree(child)) {
        walk(child, childPath);
      }
    }
  };

  walk(tree, []);
}
