import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'url';
import { collectValueSecretRefs } from '../values/secrets.js';
import { loadBundle } from '../parser.js';

const fixturePath = fileURLToPath(new URL('./fixtures/gitlab-release.yaml', import.meta.url));

describe('collectValueSecretRefs', () => {
  it('should find secret/key pairs and secretName fields', () => {
    const refs = collectValueSecretRefs({
      db: { password: { secret: 'db-credentials', key: 'password' } },
      ingress: { tls: { secretName: 'tls-web' } },
    });

    expect(refs).toEqual([
      { secret: 'db-credentials', key: 'password', path: 'db.password' },
      { secret: 'tls-web', path: 'ingress.tls.secretName' },
    ]);
  });

  it('should ignore empty and non-string names', () => {
    expect(
      collectValueSecretRefs({ a: { secretName: '' }, b: { secret: true }, c: { secret: { name: 'x' } } })
    ).toEqual([]);
  });

  it('should list the secrets the fixture release reads at render time', () => {
    const [release] = loadBundle([fixturePath]).releases;

    expect(collectValueSecretRefs(release.document.spec.values)).toEqual([
      { secret: 'gitlab-secrets', key: 'postgres-password', path: 'global.psql.password' },
      { secret: 'tls-gitlab-minio', path: 'minio.ingress.tls.secretName' },
    ]);
  });
});
