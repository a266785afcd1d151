/**
 * fluxlint lint configuration
 * Reads and validates .fluxlintrc.json / .fluxlintrc.yaml
 */

import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { RULE_IDS, type RuleId, type RuleSetting, type ValidationError } from './schema.js';
import { toValidationErrors } from './validation.js';

const CONFIG_FILENAMES = ['.fluxlintrc.json', '.fluxlintrc.yaml', 'fluxlint.config.json'];

export interface ReferenceExpectation {
  kind: 'Secret' | 'ConfigMap';
  name: string;
  /** When set, the reference's optional flag must equal this */
  optional?: boolean;
}

export interface LintConfig {
  rules: Partial<Record<RuleId, RuleSetting>>;
  references: ReferenceExpectation[];
  /** Node selector keys checked for consistency; every key when unset */
  placementKeys?: string[];
}

export const DEFAULT_LINT_CONFIG: LintConfig = {
  rules: {},
  references: [],
};

export class LintConfigError extends Error {
  file: string;
  issues: ValidationError[];

  constructor(file: string, issues: ValidationError[]) {
    super(
      `Invalid lint config ${file}:\n` +
        issues.map(issue => `  - ${issue.path}: ${issue.message}`).join('\n')
    );
    this.name = 'LintConfigError';
    this.file = file;
    this.issues = issues;
  }
}

const ruleSettingSchema = z.enum(['error', 'warning', 'off']);

const lintConfigSchema = z
  .object({
    rules: z
      .record(z.enum(RULE_IDS), ruleSettingSchema)
      .refine(rules => rules.schema !== 'off', 'the schema rule cannot be turned off')
      .default({}),
    references: z
      .array(
        z
          .object({
            kind: z.enum(['Secret', 'ConfigMap']),
            name: z.string().min(1),
            optional: z.boolean().optional(),
          })
          .strict()
      )
      .default([]),
    placementKeys: z.array(z.string().min(1)).min(1).optional(),
  })
  .strict();

/**
 * Find the lint config file in the given directory
 */
export function findLintConfigFile(dir: string): string | null {
  for (const filename of CONFIG_FILENAMES) {
    const filepath = resolve(dir, filename);
    if (existsSync(filepath)) {
      return filepath;
    }
  }
  return null;
}

/**
 * Read and validate a lint config file (JSON or YAML)
 */
export function loadLintConfig(configPath: string): LintConfig {
  if (!existsSync(configPath)) {
    throw new Error(`Config file not found: ${configPath}`);
  }

  const content = readFileSync(configPath, 'utf-8');

  let parsed: unknown;
  try {
    parsed = configPath.endsWith('.json')
      ? JSON.parse(content)
      : yaml.load(content, { schema: yaml.CORE_SCHEMA });
  } catch (err) {
    throw new LintConfigError(configPath, [
      { path: '(root)', message: err instanceof Error ? err.message : String(err) },
    ]);
  }

  return parseLintConfig(parsed ?? {}, configPath);
}

export function parseLintConfig(raw: unknown, file = '(inline)'): LintConfig {
  const result = lintConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new LintConfigError(file, toValidationErrors(result.error, raw));
  }
  return result.data;
}

/**
 * Use an explicit config path, else look in `dir`, else fall back to defaults
 */
export function resolveLintConfig(dir: string, explicitPath?: string): LintConfig {
  if (explicitPath) return loadLintConfig(explicitPath);
  const found = findLintConfigFile(dir);
  return found ? loadLintConfig(found) : DEFAULT_LINT_CONFIG;
}

export function ruleSeverity(config: LintConfig, rule: RuleId, fallback: RuleSetting): RuleSetting {
  return config.rules[rule] ?? fallback;
}
