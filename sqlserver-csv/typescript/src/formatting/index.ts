/**
 * Formatting module exports.
 * @module formatting
 */

export {
  formatValue,
  formatDefault,
  formatUniqueIdentifier,
  encodeUniqueIdentifier,
} from './value.js';
export { renderHeader, renderColumnLabel } from './header.js';
