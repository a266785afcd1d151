import type { LintConfig } from '../config.js';
import type { DocumentBundle, DocumentLocation, RuleId } from '../schema.js';

export interface CheckContext {
  bundle: DocumentBundle;
  config: LintConfig;
}

/**
 * A rule hit before the configured severity is applied
 */
export interface Finding {
  rule: RuleId;
  document: DocumentLocation;
  path: string;
  message: string;
}

export type Check = (context: CheckContext) => Finding[];
