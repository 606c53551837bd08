import { Table } from './table.js';

test('toDebugStr()', () => {
  let table: Table<number> = Table.init(2, 3, () => 0);
  table.setCell(1, 1, 354);
  expect('\n' + table.toDebugStr()).toEqual('\n  0    0  0\n  0  354  0\n');
});

test('addRow() fills cells by column', () => {
  const table = new Table<string>(3);
  expect(table.addRow((col) => `c${col}`)).toBe(0);
  expect(table.addRow(() => '')).toBe(1);
  expect(table.getRow(0)).toEqual(['c0', 'c1', 'c2']);
  expect(table.numRows).toBe(2);
});

test('rejects cells outside the table', () => {
  const table = Table.init(1, 1, () => 0);
  expect(() => table.getCell(1, 0)).toThrow(
    'TableIndexError: Invalid row 1. Must be between 0 and 1 exclusive'
  );
  expect(() => table.setCell(0, 2, 5)).toThrow(
    'TableIndexError: Invalid col 2. Must be between 0 and 1 exclusive'
  );
});
