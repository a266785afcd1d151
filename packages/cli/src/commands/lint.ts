/**
 * fluxlint lint
 *
 * Validate release documents and run the lint rules over them
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import {
  formatDiagnostic,
  hasErrors,
  lintBundle,
  resolveLintConfig,
  type Diagnostic,
  type LintConfig,
  type LintReport,
} from '@fluxlint/release';
import { createCommandLogger } from '../logger.js';
import { loadReleaseBundle } from '../services/release.service.js';
import { EXIT_FAILED, EXIT_LOAD_ERROR, fail } from './errors.js';

interface LintOptions {
  config?: string;
  strict?: boolean;
  json?: boolean;
}

function printDiagnostics(title: string, diagnostics: Diagnostic[], color: (text: string) => string): void {
  if (diagnostics.length === 0) return;

  console.log(color(`\n  ${title}:`));
  for (const diagnostic of diagnostics) {
    console.log(color('    - ') + chalk.white(formatDiagnostic(diagnostic)));
  }
}

export function createLintCommand(): Command {
  return new Command('lint')
    .description('Validate and lint HelmRepository and HelmRelease documents')
    .argument('<paths...>', 'YAML files or directories to check')
    .option('-c, --config <file>', 'Lint config file (default: .fluxlintrc.json or .fluxlintrc.yaml)')
    .option('--strict', 'Fail on warnings as well as errors')
    .option('--json', 'Output the report as JSON')
    .action((paths: string[], options: LintOptions) => {
      const log = createCommandLogger('lint');
      log.command('lint', { paths, ...options });

      let config: LintConfig;
      try {
        config = resolveLintConfig(process.cwd(), options.config);
      } catch (error) {
        fail(log, 'Failed to load lint config', error, EXIT_LOAD_ERROR);
      }

      const spinner = ora({ text: 'Loading documents...', isSilent: options.json === true }).start();

      let report: LintReport;
      try {
        report = lintBundle(loadReleaseBundle(paths), config);
      } catch (error) {
        spinner.fail('Could not load documents');
        fail(log, 'Failed to load documents', error, EXIT_LOAD_ERROR);
      }
      spinner.stop();

      log.info('Lint finished', {
        documents: report.documentCount,
        errors: report.errorCount,
        warnings: report.warningCount,
      });

      const failed = hasErrors(report, { strict: options.strict });

      if (options.json) {
        console.log(JSON.stringify(report, null, 2));
      } else {
        printDiagnostics('Errors', report.diagnostics.filter(d => d.severity === 'error'), chalk.red);
        printDiagnostics('Warnings', report.diagnostics.filter(d => d.severity === 'warning'), chalk.yellow);

        const summary = `${report.documentCount} document(s) checked: ${report.errorCount} error(s), ${report.warningCount} warning(s)`;
        console.log('\n  ' + (failed ? chalk.red(summary) : chalk.green(summary)) + '\n');
      }

      if (failed) {
        process.exit(EXIT_FAILED);
      }
    });
}

export const lintCommand = createLintCommand();
