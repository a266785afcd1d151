import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { tmpdir } from 'os';
import { createLintCommand } from '../commands/lint.js';

vi.mock('../logger.js', () => ({
  createCommandLogger: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    command: vi.fn(),
  }),
}));

const REPOSITORY = `apiVersion: source.toolkit.fluxcd.io/v1
kind: HelmRepository
metadata:
  name: charts
  namespace: apps
spec:
  interval: 1h
  url: https://charts.example.io
`;

function releaseYaml(chartSpec: string, values: string): string {
  return `apiVersion: helm.toolkit.fluxcd.io/v2
kind: HelmRelease
metadata:
  name: app
  namespace: apps
spec:
  interval: 10m
  chart:
    spec:
      chart: app
${chartSpec}      sourceRef:
        kind: HelmRepository
        name: charts
  values:
${values}`;
}

const PINNED = '      version: 1.0.0\n';

class ExitCalled extends Error {
  code: number | string | null | undefined;

  constructor(code: number | string | null | undefined) {
    super(`process.exit(${code})`);
    this.code = code;
  }
}

async function createTempDir(): Promise<string> {
  const tempDir = path.join(tmpdir(), `fluxlint-lint-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  await fs.mkdir(tempDir, { recursive: true });
  return tempDir;
}

describe('fluxlint lint exit codes', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir();
    await fs.writeFile(path.join(tempDir, 'repository.yaml'), REPOSITORY);
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(process, 'exit').mockImplementation(code => {
      throw new ExitCalled(code);
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  async function writeRelease(chartSpec: string, values: string): Promise<void> {
    await fs.writeFile(path.join(tempDir, 'release.yaml'), releaseYaml(chartSpec, values));
  }

  function run(args: string[]): Promise<unknown> {
    return createLintCommand().exitOverride().parseAsync(args, { from: 'user' });
  }

  it('should not exit for a clean bundle', async () => {
    await writeRelease(PINNED, '    replicas: 2\n');

    await run([tempDir, '--json']);

    expect(process.exit).not.toHaveBeenCalled();
  });

  it('should exit 1 when errors are found', async () => {
    await writeRelease(PINNED, '    minReplicas: 5\n    maxReplicas: 2\n');

    await expect(run([tempDir, '--json'])).rejects.toMatchObject({ code: 1 });
  });

  it('should exit 1 on warnings only in strict mode', async () => {
    await writeRelease('', '    replicas: 2\n');

    await run([tempDir]);
    expect(process.exit).not.toHaveBeenCalled();

    await expect(run([tempDir, '--strict'])).rejects.toMatchObject({ code: 1 });
  });

  it('should exit 2 when documents cannot be loaded', async () => {
    await expect(run([path.join(tempDir, 'missing')])).rejects.toMatchObject({ code: 2 });
  });

  it('should exit 2 when the lint config is invalid', async () => {
    await writeRelease(PINNED, '    replicas: 2\n');
    const configPath = path.join(tempDir, 'lint.json');
    await fs.writeFile(configPath, JSON.stringify({ rules: { bogus: 'error' } }));

    await expect(run([tempDir, '-c', configPath])).rejects.toMatchObject({ code: 2 });
  });
});
