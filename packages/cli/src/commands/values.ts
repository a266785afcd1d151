/**
 * fluxlint values
 *
 * Print the values a release hands to its chart
 */

import { Command } from 'commander';
import { composeReleaseValues, type ComposedValues, type DocumentBundle } from '@fluxlint/release';
import { createCommandLogger } from '../logger.js';
import { loadReleaseBundle, renderComposedValues } from '../services/release.service.js';
import { EXIT_FAILED, EXIT_LOAD_ERROR, fail } from './errors.js';

interface ValuesOptions {
  release: string;
  json?: boolean;
}

export const valuesCommand = new Command('values')
  .description('Compose the effective values of a release')
  .argument('<paths...>', 'YAML files or directories holding the release and its Secrets/ConfigMaps')
  .requiredOption('-r, --release <namespace/name>', 'Release to compose')
  .option('--json', 'Output as JSON, with the applied layers')
  .action((paths: string[], options: ValuesOptions) => {
    const log = createCommandLogger('values');
    log.command('values', { paths, ...options });

    let bundle: DocumentBundle;
    try {
      bundle = loadReleaseBundle(paths);
    } catch (error) {
      fail(log, 'Failed to load documents', error, EXIT_LOAD_ERROR);
    }

    let composed: ComposedValues;
    try {
      composed = composeReleaseValues(bundle, options.release);
    } catch (error) {
      fail(log, `Failed to compose values for ${options.release}`, error, EXIT_FAILED);
    }

    log.debug('Composed values', composed.layers);
    console.log(renderComposedValues(composed, options.json ? 'json' : 'yaml'));
  });
