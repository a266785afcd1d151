/**
 * fluxlint CLI commands
 */

export { lintCommand } from './lint.js';
export { showCommand } from './show.js';
export { refsCommand } from './refs.js';
export { valuesCommand } from './values.js';
