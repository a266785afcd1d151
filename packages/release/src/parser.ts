/**
 * fluxlint document loader
 * Reads multi-document YAML files and sorts them into a release bundle
 */

import { existsSync, readdirSync, readFileSync, statSync } from 'fs';
import { join, resolve } from 'path';
import * as yaml from 'js-yaml';
import type { DocumentBundle, LoadedDocument } from './schema.js';
import {
  validateConfigMap,
  validateHelmRelease,
  validateHelmRepository,
  validateSecret,
} from './validation.js';

const DOCUMENT_EXTENSIONS = ['.yaml', '.yml'];
const SKIPPED_DIRECTORIES = ['node_modules'];

/**
 * Raised when a file is not valid YAML
 */
export class DocumentParseError extends Error {
  file: string;
  line?: number;

  constructor(message: string, file: string, line?: number) {
    super(line === undefined ? `${file}: ${message}` : `${file}:${line}: ${message}`);
    this.name = 'DocumentParseError';
    this.file = file;
    this.line = line;
  }
}

/**
 * Recursively list YAML files under a directory, sorted by path
 */
export function findDocumentFiles(dir: string): string[] {
  const files: string[] = [];

  for (const entry of readdirSync(dir, { withFileTypes: true })) {
    if (entry.name.startsWith('.')) continue;
    const fullPath = join(dir, entry.name);

    if (entry.isDirectory()) {
      if (SKIPPED_DIRECTORIES.includes(entry.name)) continue;
      files.push(...findDocumentFiles(fullPath));
    } else if (DOCUMENT_EXTENSIONS.some(ext => entry.name.endsWith(ext))) {
      files.push(fullPath);
    }
  }

  return files.sort();
}

/**
 * Split YAML content into documents. Empty documents are dropped but keep
 * their slot in the index numbering.
 */
export function parseDocumentString(content: string, file: string): LoadedDocument[] {
  let parsed: unknown[];
  try {
    parsed = yaml.loadAll(content, null, { schema: yaml.CORE_SCHEMA, filename: file });
  } catch (err) {
    if (err instanceof yaml.YAMLException) {
      throw new DocumentParseError(err.reason, file, err.mark.line + 1);
    }
    throw err;
  }

  const documents: LoadedDocument[] = [];
  parsed.forEach((raw, index) => {
    if (raw === null || raw === undefined) return;
    documents.push({
      file,
      index,
      apiVersion: readStringField(raw, 'apiVersion'),
      kind: readStringField(raw, 'kind'),
      raw,
    });
  });

  return documents;
}

/**
 * Parse every document in a file, or in every YAML file under a directory
 */
export function parseDocuments(path: string): LoadedDocument[] {
  const target = resolve(path);
  if (!existsSync(target)) {
    throw new Error(`Path not found: ${path}`);
  }

  const files = statSync(target).isDirectory() ? findDocumentFiles(target) : [target];

  return files.flatMap(file => parseDocumentString(readFileSync(file, 'utf-8'), file));
}

/**
 * Validate loaded documents and sort them by kind
 */
export function buildBundle(documents: LoadedDocument[]): DocumentBundle {
  const bundle: DocumentBundle = {
    repositories: [],
    releases: [],
    secrets: [],
    configMaps: [],
    other: [],
    invalid: [],
  };

  for (const source of documents) {
    switch (source.kind) {
      case 'HelmRepository': {
        const result = validateHelmRepository(source.raw);
        if (result.valid) bundle.repositories.push({ source, document: result.document });
        else bundle.invalid.push({ source, errors: result.errors });
        break;
      }
      case 'HelmRelease': {
        const result = validateHelmRelease(source.raw);
        if (result.valid) bundle.releases.push({ source, document: result.document });
        else bundle.invalid.push({ source, errors: result.errors });
        break;
      }
      case 'Secret': {
        const result = validateSecret(source.raw);
        if (result.valid) bundle.secrets.push({ source, document: result.document });
        else bundle.invalid.push({ source, errors: result.errors });
        break;
      }
      case 'ConfigMap': {
        const result = validateConfigMap(source.raw);
        if (result.valid) bundle.configMaps.push({ source, document: result.document });
        else bundle.invalid.push({ source, errors: result.errors });
        break;
      }
      case undefined:
        bundle.invalid.push({
          source,
          errors: [
            typeof source.raw === 'object' && !Array.isArray(source.raw)
              ? { path: 'kind', message: 'kind is required' }
              : { path: '(root)', message: 'document must be a mapping' },
          ],
        });
        break;
      default:
        bundle.other.push(source);
    }
  }

  return bundle;
}

/**
 * Load and classify every document under the given paths
 */
export function loadBundle(paths: string[]): DocumentBundle {
  return buildBundle(paths.flatMap(path => parseDocuments(path)));
}

function readStringField(raw: unknown, field: string): string | undefined {
  if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) return undefined;
  const value: unknown = Reflect.get(raw, field);
  return typeof value === 'string' ? value : undefined;
}
