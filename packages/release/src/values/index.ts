/**
 * fluxlint values module
 * Compose the effective values of a release from its ordered layers
 */

export {
  mergeValues,
  composeValues,
  bundleResolver,
  describeReference,
  ValuesResolutionError,
  type ValuesResolver,
  type ValuesResolutionReason,
  type ValuesLayer,
  type ComposedValues,
} from './merger.js';

export {
  MAX_LIST_INDEX,
  isValuesTree,
  parseTargetPath,
  getAtPath,
  setAtPath,
  formatValuesPath,
  walkValues,
  type PathSegment,
  type VisitedNode,
} from './paths.js';

export { collectValueSecretRefs, type ValueSecretRef } from './secrets.js';
