/**
 * Column header rendering.
 * @module formatting/header
 */

import { MAX_LENGTH_SENTINELS } from '../types/index.js';
import type { ColumnDescriptor } from '../types/index.js';

/**
 * Renders one descriptive label per column, in order.
 *
 * A label reads `[name] TYPE(size) NULL`, e.g. `[id] INT NOT NULL` or
 * `[note] NVARCHAR(max) NULL`. Only `]` in the name is escaped (doubled).
 */
export function renderHeader(columns: readonly ColumnDescriptor[]): string[] {
  return columns.map(renderColumnLabel);
}

/**
 * Renders the label for a single column.
 */
export function renderColumnLabel(column: ColumnDescriptor): string {
  let label = `[${column.name.replace(/\]/g, ']]')}] ${column.databaseTypeName}`;

  if (column.length !== undefined) {
    label += MAX_LENGTH_SENTINELS.has(column.length) ? '(max)' : `(${column.length})`;
  } else if (column.decimalSize !== undefined) {
    label += `(${column.decimalSize.precision},${column.decimalSize.scale})`;
  }

  if (column.nullable !== undefined) {
    label += column.nullable ? ' NULL' : ' NOT NULL';
  }

  return label;
}
