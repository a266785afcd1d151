/**
 * Document-level checks: schema failures and duplicate identities
 */

import { documentIdentity, formatIdentity, identityKey, locate } from '../identity.js';
import type { DocumentBundle, LoadedDocument } from '../schema.js';
import type { Check, Finding } from './types.js';

export const checkSchema: Check = ({ bundle }) =>
  bundle.invalid.flatMap(({ source, errors }) =>
    errors.map(error => ({
      rule: 'schema' as const,
      document: locate(source),
      path: error.path,
      message:
        error.value === undefined
          ? error.message
          : `${error.message} (got ${JSON.stringify(error.value)})`,
    }))
  );

export const checkDuplicateResources: Check = ({ bundle }) => {
  const findings: Finding[] = [];
  const seen = new Map<string, LoadedDocument>();

  for (const source of allDocuments(bundle)) {
    const identity = documentIdentity(source);
    if (!identity) continue;

    const key = identityKey(identity);
    const first = seen.get(key);
    if (first) {
      findings.push({
        rule: 'duplicate-resource',
        document: locate(source),
        path: 'metadata.name',
        message: `duplicate ${formatIdentity(identity)} (also defined at ${first.file}#${first.index})`,
      });
    } else {
      seen.set(key, source);
    }
  }

  return findings;
};

/**
 * Every loaded document in file order, valid or not
 */
export function allDocuments(bundle: DocumentBundle): LoadedDocument[] {
  return [
    ...bundle.repositories.map(r => r.source),
    ...bundle.releases.map(r => r.source),
    ...bundle.secrets.map(s => s.source),
    ...bundle.configMaps.map(c => c.source),
    ...bundle.other,
    ...bundle.invalid.map(i => i.source),
  ].sort((a, b) => a.file.localeCompare(b.file) || a.index - b.index);
}
