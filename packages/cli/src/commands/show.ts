/**
 * fluxlint show
 *
 * Summarize the repositories and releases found under the given paths
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { createCommandLogger } from '../logger.js';
import { loadReleaseBundle } from '../services/release.service.js';
import { EXIT_LOAD_ERROR, fail } from './errors.js';
import type { DocumentBundle } from '@fluxlint/release';

export const showCommand = new Command('show')
  .description('Summarize chart repositories and releases')
  .argument('<paths...>', 'YAML files or directories to read')
  .action((paths: string[]) => {
    const log = createCommandLogger('show');
    log.command('show', { paths });

    let bundle: DocumentBundle;
    try {
      bundle = loadReleaseBundle(paths);
    } catch (error) {
      fail(log, 'Failed to load documents', error, EXIT_LOAD_ERROR);
    }

    if (bundle.repositories.length === 0 && bundle.releases.length === 0) {
      console.log(chalk.gray('\n  No HelmRepository or HelmRelease documents found.\n'));
      return;
    }

    if (bundle.repositories.length) {
      console.log(chalk.cyan('\n  Repositories:'));
      bundle.repositories.forEach(({ document }) => {
        const { metadata, spec } = document;
        console.log(
          chalk.white(`    - ${metadata.namespace}/${metadata.name}`) +
            chalk.gray(` ${spec.url} (every ${spec.interval})`)
        );
      });
    }

    if (bundle.releases.length) {
      console.log(chalk.cyan('\n  Releases:'));
      bundle.releases.forEach(({ document }) => {
        const { metadata, spec } = document;
        const chart = spec.chart.spec;
        const source = `${chart.sourceRef.kind}/${chart.sourceRef.namespace ?? metadata.namespace}/${chart.sourceRef.name}`;

        console.log(
          chalk.white(`    - ${metadata.namespace}/${metadata.name}`) +
            chalk.gray(` ${chart.chart}@${chart.version ?? 'latest'} from ${source}`)
        );
        spec.valuesFrom.forEach(reference => {
          console.log(
            chalk.gray(`        valuesFrom ${reference.kind}/${reference.name}`) +
              (reference.optional ? chalk.yellow(' (optional)') : '')
          );
        });
      });
    }

    if (bundle.invalid.length) {
      console.log(
        chalk.yellow(`\n  ${bundle.invalid.length} document(s) failed validation; run \`fluxlint lint\` for details.`)
      );
    }

    console.log('');
  });
