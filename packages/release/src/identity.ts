/**
 * Kind/namespace/name identity of a loaded document
 */

import type { DocumentLocation, LoadedDocument } from './schema.js';

export interface DocumentIdentity {
  kind: string;
  name: string;
  namespace?: string;
}

export function documentIdentity(source: LoadedDocument): DocumentIdentity | null {
  if (!source.kind) return null;

  const metadata = readField(source.raw, 'metadata');
  const name = readField(metadata, 'name');
  const namespace = readField(metadata, 'namespace');
  if (typeof name !== 'string' || name === '') return null;

  return {
    kind: source.kind,
    name,
    ...(typeof namespace === 'string' && namespace !== '' && { namespace }),
  };
}

export function identityKey(identity: DocumentIdentity): string {
  return `${identity.kind}/${identity.namespace ?? ''}/${identity.name}`;
}

export function formatIdentity(identity: DocumentIdentity): string {
  return identity.namespace
    ? `${identity.kind} ${identity.namespace}/${identity.name}`
    : `${identity.kind} ${identity.name}`;
}

export function locate(source: LoadedDocument): DocumentLocation {
  const identity = documentIdentity(source);
  return {
    file: source.file,
    index: source.index,
    ...(source.kind ? { kind: source.kind } : {}),
    ...(identity ? { name: identity.name } : {}),
    ...(identity?.namespace ? { namespace: identity.namespace } : {}),
  };
}

function readField(raw: unknown, field: string): unknown {
  if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) return undefined;
  return Reflect.get(raw, field);
}
