import type { IHaveDebugStr } from '../debug.js';

export interface ConstTable<D> extends IHaveDebugStr {
  readonly numRows: number;
  readonly numCols: number;
  getCell(row: number, col: number): D;
  getRow(row: number): readonly D[];
}

export interface MutTable<D> extends ConstTable<D> {
  /**
   * Add a row to the table where each cell is filled with the given value.
   * @returns the index of the new row
   */
  addRow(value: (col: number) => D): number;

  /**
   * Set the value of the cell at the given row/col to the given value.
   */
  setCell(row: number, col: number, value: D): void;
}

/**
 * A table with a fixed number of columns that grows by rows.
 */
export class Table<D> implements MutTable<D> {
  private rows: D[][] = [];
  readonly numCols: number;

  constructor(numCols: number) {
    this.numCols = numCols;
  }

  get numRows() {
    return this.rows.length;
  }

  static init<D>(numRows: number, numCols: number, value: () => D) {
    const table = new Table<D>(numCols);
    for (let row = 0; row < numRows; row++) {
      table.addRow(value);
    }
    return table;
  }

  addRow(value: (col: number) => D) {
    const cols: D[] = [];
    for (let c = 0; c < this.numCols; c++) {
      cols.push(value(c));
    }
    this.rows.push(cols);
    return this.rows.length - 1;
  }

  private checkRow(row: number) {
    if (row < 0 || row >= this.rows.length) {
      throw new RangeError(
        `TableIndexError: Invalid row ${row}. Must be between 0 and ${this.rows.length} exclusive`
      );
    }
  }

  private checkIndex(row: number, col: number) {
    this.checkRow(row);
    if (col < 0 || col >= this.numCols) {
      throw new RangeError(
        `TableIndexError: Invalid col ${col}. Must be between 0 and ${this.numCols} exclusive`
      );
    }
  }

  setCell(row: number, col: number, value: D) {
    this.checkIndex(row, col);
    this.rows[row][col] = value;
  }

  /**
   * @returns The value of the cell with the given row/col
   */
  getCell(row: number, col: number): D {
    this.checkIndex(row, col);
    return this.rows[row][col];
  }

  getRow(row: number): readonly D[] {
    this.checkRow(row);
    return this.rows[row];
  }

  /**
   * Render the table with every column right aligned to its widest cell.
   */
  toDebugStr() {
    const minWidths: number[] = [];
    for (let ci = 0; ci < this.numCols; ci++) {
      let minWidth = 1;
      for (let ri = 0; ri < this.numRows; ri++) {
        minWidth = Math.max(minWidth, `${this.rows[ri][ci]}`.length);
      }
      minWidths.push(minWidth);
    }

    let out = '';
    for (const row of this.rows) {
      out += row
        .map((cell, col) => `${cell}`.padStart(minWidths[col] + 2))
        .join('');
      out += '\n';
    }
    return out;
  }
}
