/**
 * fluxlint rule runner and report formatting
 */

import { checkDuplicateResources, checkSchema } from './checks/documents.js';
import {
  checkChartVersion,
  checkDuplicateValuesSources,
  checkReferenceExpectations,
  checkSecretOptional,
  checkSourceRef,
} from './checks/release.js';
import type { Check } from './checks/types.js';
import { checkNodeSelectors, checkReplicaBounds, checkResourceBounds } from './checks/values.js';
import { DEFAULT_LINT_CONFIG, ruleSeverity, type LintConfig } from './config.js';
import type { Diagnostic, DocumentBundle, LintReport, RuleId, Severity } from './schema.js';

interface RuleDefinition {
  id: RuleId;
  severity: Severity;
  check: Check;
}

export const RULES: RuleDefinition[] = [
  { id: 'schema', severity: 'error', check: checkSchema },
  { id: 'duplicate-resource', severity: 'error', check: checkDuplicateResources },
  { id: 'source-ref', severity: 'warning', check: checkSourceRef },
  { id: 'chart-version', severity: 'warning', check: checkChartVersion },
  { id: 'node-selector-consistency', severity: 'error', check: checkNodeSelectors },
  { id: 'resource-bounds', severity: 'error', check: checkResourceBounds },
  { id: 'replica-bounds', severity: 'error', check: checkReplicaBounds },
  { id: 'secret-optional', severity: 'warning', check: checkSecretOptional },
  { id: 'reference-expectations', severity: 'error', check: checkReferenceExpectations },
  { id: 'duplicate-values-source', severity: 'warning', check: checkDuplicateValuesSources },
];

/**
 * Run every enabled rule over a bundle
 */
export function lintBundle(bundle: DocumentBundle, config: LintConfig = DEFAULT_LINT_CONFIG): LintReport {
  const diagnostics: Diagnostic[] = [];

  for (const rule of RULES) {
    const setting = ruleSeverity(config, rule.id, rule.severity);
    if (setting === 'off') continue;

    for (const finding of rule.check({ bundle, config })) {
      diagnostics.push({ ...finding, severity: setting });
    }
  }

  diagnostics.sort(
    (a, b) =>
      a.document.file.localeCompare(b.document.file) ||
      a.document.index - b.document.index ||
      a.path.localeCompare(b.path)
  );

  return {
    diagnostics,
    errorCount: diagnostics.filter(d => d.severity === 'error').length,
    warningCount: diagnostics.filter(d => d.severity === 'warning').length,
    documentCount:
      bundle.repositories.length +
      bundle.releases.length +
      bundle.secrets.length +
      bundle.configMaps.length +
      bundle.other.length +
      bundle.invalid.length,
  };
}

export function hasErrors(report: LintReport, options: { strict?: boolean } = {}): boolean {
  return report.errorCount > 0 || (options.strict === true && report.warningCount > 0);
}

export function formatDiagnostic(diagnostic: Diagnostic): string {
  const { document } = diagnostic;
  const subject = document.kind && document.name
    ? `${document.kind} ${document.namespace ? `${document.namespace}/` : ''}${document.name}`
    : `document ${document.index}`;
  return `${document.file} (${subject}) ${diagnostic.path}: ${diagnostic.message} [${diagnostic.rule}]`;
}

/**
 * Format a report for display
 */
export function formatReport(report: LintReport): string {
  const lines: string[] = [];

  const errors = report.diagnostics.filter(d => d.severity === 'error');
  const warnings = report.diagnostics.filter(d => d.severity === 'warning');

  if (errors.length > 0) {
    lines.push('Errors:');
    for (const error of errors) {
      lines.push(`  - ${formatDiagnostic(error)}`);
    }
  }

  if (warnings.length > 0) {
    lines.push('Warnings:');
    for (const warning of warnings) {
      lines.push(`  - ${formatDiagnostic(warning)}`);
    }
  }

  lines.push(
    `${report.documentCount} document(s) checked: ${report.errorCount} error(s), ${report.warningCount} warning(s)`
  );

  return lines.join('\n');
}
