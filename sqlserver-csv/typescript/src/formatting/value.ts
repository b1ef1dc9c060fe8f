/**
 * Cell value formatting.
 *
 * Maps a decoded cell to its CSV field text according to the column's
 * SQL Server type tag.
 * @module formatting/value
 */

import { MalformedIdentifierError } from '../errors/index.js';
import type { ColumnDescriptor, RawCellValue } from '../types/index.js';

/**
 * Byte order of a UNIQUEIDENTIFIER on the wire, as indexes into the
 * canonical big-endian layout. The first three groups are little-endian.
 */
const GUID_WIRE_ORDER = [3, 2, 1, 0, 5, 4, 7, 6, 8, 9, 10, 11, 12, 13, 14, 15] as const;

const GUID_TEXT_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/**
 * Formats one cell for CSV output.
 *
 * The result is unescaped; quoting is the sink's job.
 *
 * DECIMAL is formatted like MONEY. The driver decodes both to doubles, so
 * values past 2^53 lose digits and very large ones come out in exponent form.
 *
 * @param column - Column the cell belongs to
 * @param value - Decoded cell value
 * @param nullLiteral - Text written for SQL NULL, used verbatim
 * @throws {MalformedIdentifierError} If a UNIQUEIDENTIFIER cell cannot be decoded
 */
export function formatValue(
  column: ColumnDescriptor,
  value: RawCellValue,
  nullLiteral: string
): string {
  if (value.kind === 'null') {
    return nullLiteral;
  }

  switch (column.databaseTypeName) {
    case 'UNIQUEIDENTIFIER':
      return formatUniqueIdentifier(value);
    case 'DECIMAL':
    case 'MONEY':
      return formatDriverText(value);
    case 'BIT':
      if (value.kind === 'boolean') {
        return value.value ? '1' : '0';
      }
      return formatDefault(value);
    default:
      return formatDefault(value);
  }
}

/**
 * Renders a GUID in canonical lower-case hyphenated form.
 *
 * Accepts the 16-byte wire layout or the driver's textual rendering.
 */
export function formatUniqueIdentifier(value: RawCellValue): string {
  switch (value.kind) {
    case 'bytes': {
      const bytes = value.value;
      if (bytes.length !== 16) {
        throw new MalformedIdentifierError(`invalid UUID (got ${bytes.length} bytes)`);
      }
      let hex = '';
      for (const index of GUID_WIRE_ORDER) {
        hex += (bytes[index] ?? 0).toString(16).padStart(2, '0');
      }
      return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`;
    }
    case 'text':
      if (!GUID_TEXT_PATTERN.test(value.value)) {
        throw new MalformedIdentifierError(`invalid UUID format: ${JSON.stringify(value.value)}`);
      }
      return value.value.toLowerCase();
    default:
      throw new MalformedIdentifierError(`unexpected ${value.kind} value`);
  }
}

/**
 * Encodes a canonical GUID string into the 16-byte wire layout.
 *
 * @throws {MalformedIdentifierError} If the text is not a GUID
 */
export function encodeUniqueIdentifier(guid: string): Uint8Array {
  if (!GUID_TEXT_PATTERN.test(guid)) {
    throw new MalformedIdentifierError(`invalid UUID format: ${JSON.stringify(guid)}`);
  }
  const canonical = Buffer.from(guid.replace(/-/g, ''), 'hex');
  const wire = new Uint8Array(16);
  GUID_WIRE_ORDER.forEach((canonicalIndex, wireIndex) => {
    wire[wireIndex] = canonical[canonicalIndex] ?? 0;
  });
  return wire;
}

/**
 * Renders a value the driver pre-rendered as ASCII digits without numeric
 * reformatting.
 */
function formatDriverText(value: RawCellValue): string {
  if (value.kind === 'bytes') {
    return Buffer.from(value.value).toString('utf8');
  }
  return formatDefault(value);
}

/**
 * Default textual representation of a non-null value.
 */
export function formatDefault(value: RawCellValue): string {
  switch (value.kind) {
    case 'null':
      return '';
    case 'boolean':
      return value.value ? 'true' : 'false';
    case 'integer':
      return value.value.toString(10);
    case 'float':
      return String(value.value);
    case 'bytes':
      return `0x${Buffer.from(value.value).toString('hex')}`;
    case 'text':
      return value.value;
    case 'datetime':
      return formatDateTime(value.value);
    default: {
      const exhaustive: never = value;
      return exhaustive;
    }
  }
}

function formatDateTime(date: Date): string {
  if (Number.isNaN(date.getTime())) {
    return String(date);
  }
  return date.toISOString();
}
