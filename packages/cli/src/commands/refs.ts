/**
 * fluxlint refs
 *
 * List the Secrets and ConfigMaps each release depends on
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { createCommandLogger } from '../logger.js';
import { collectReleaseReferences, loadReleaseBundle } from '../services/release.service.js';
import { EXIT_LOAD_ERROR, fail } from './errors.js';
import type { ReleaseReferences } from '../services/release.service.js';

export const refsCommand = new Command('refs')
  .description('List external references of each release')
  .argument('<paths...>', 'YAML files or directories to read')
  .option('--json', 'Output as JSON')
  .action((paths: string[], options: { json?: boolean }) => {
    const log = createCommandLogger('refs');
    log.command('refs', { paths, ...options });

    let releases: ReleaseReferences[];
    try {
      releases = collectReleaseReferences(loadReleaseBundle(paths));
    } catch (error) {
      fail(log, 'Failed to load documents', error, EXIT_LOAD_ERROR);
    }

    if (options.json) {
      console.log(JSON.stringify(releases, null, 2));
      return;
    }

    if (releases.length === 0) {
      console.log(chalk.gray('\n  No HelmRelease documents found.\n'));
      return;
    }

    for (const release of releases) {
      console.log(chalk.bold(`\n  ${release.release}`) + chalk.gray(` (${release.file})`));

      if (release.valuesFrom.length) {
        console.log(chalk.cyan('    valuesFrom:'));
        release.valuesFrom.forEach((ref, i) => {
          const flag = ref.optional ? chalk.yellow('optional') : chalk.green('required');
          const target = ref.targetPath ? chalk.gray(` -> ${ref.targetPath}`) : '';
          const state = ref.declared ? '' : chalk.gray(' (not in loaded documents)');
          console.log(
            chalk.white(`      ${i}. ${ref.kind}/${ref.name}[${ref.valuesKey}]`) + target + ` ${flag}` + state
          );
        });
      }

      if (release.valueSecrets.length) {
        console.log(chalk.cyan('    secrets in values:'));
        release.valueSecrets.forEach(ref => {
          const key = ref.key ? `[${ref.key}]` : '';
          console.log(chalk.white(`      - ${ref.secret}${key}`) + chalk.gray(` at spec.values.${ref.path}`));
        });
      }
    }

    console.log('');
  });
