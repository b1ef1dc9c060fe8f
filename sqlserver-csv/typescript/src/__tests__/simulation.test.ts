/**
 * Tests for the simulated connection.
 */

import { SimulatedConnection, normalizeQuery, RawCellValue } from '../index.js';

describe('SimulatedConnection', () => {
  it('should match batches on normalized text', async () => {
    const connection = new SimulatedConnection().respondTo('SELECT  1\r\n', {
      resultSets: [{ columns: [{ name: '', databaseTypeName: 'INT' }], rows: [[RawCellValue.integer(1)]] }],
    });

    const cursor = await connection.query('\r\nSELECT 1', new AbortController().signal);

    expect(cursor.columns).toEqual([{ name: '', databaseTypeName: 'INT' }]);
    expect(normalizeQuery(' a \r\n b ')).toBe('a b');
  });

  it('should reject unscripted batches', async () => {
    await expect(new SimulatedConnection().query('SELECT 2', new AbortController().signal)).rejects.toThrow(
      'no simulated response for: SELECT 2'
    );
  });

  it('should reject queries after close', async () => {
    const connection = new SimulatedConnection().respondToAny({});
    await connection.close();

    await expect(connection.query('SELECT 1', new AbortController().signal)).rejects.toThrow('connection is closed');
  });

  it('should fail on a result set boundary after its last row', async () => {
    const connection = new SimulatedConnection().respondToAny({
      resultSets: [{ columns: [{ name: 'x', databaseTypeName: 'INT' }], rows: [[RawCellValue.integer(1)]] }],
      rowFailure: { resultSet: 0, afterRows: 1, error: new Error('late') },
    });
    const cursor = await connection.query('q', new AbortController().signal);

    const rows = [];
    for await (const row of cursor.rows()) {
      rows.push(row);
    }

    expect(rows).toHaveLength(1);
    expect(await cursor.nextResultSet()).toBe(false);
    await expect(cursor.close()).rejects.toThrow('late');
  });
});
