/**
 * @fileoverview The bot's knowledge of the opponent's grid.
 */

import type { Cell, ShotResult } from '@broadside/protocol';
import { BOARD_SIZE } from './FleetBoard.js';

export type ObservedCell = 'unknown' | 'hit' | 'miss' | 'sunk';

export class ObservedBoard {
  private readonly cells: ObservedCell[];

  constructor(readonly size: number = BOARD_SIZE) {
    this.cells = new Array<ObservedCell>(size * size).fill('unknown');
  }

  cellAt(row: number, col: number): ObservedCell {
    if (!this.contains({ row, col })) {
      return 'miss';
    }
    return this.cells[row * this.size + col] ?? 'unknown';
  }

  contains(cell: Cell): boolean {
    return cell.row >= 0 && cell.col >= 0 && cell.row < this.size && cell.col < this.size;
  }

  /**
   * Record the outcome of one of our shots.
   *
   * On `sunk` the struck cells in line with the final hit are marked sunk too,
   * so they stop attracting follow-up shots.
   */
  mark(row: number, col: number, result: ShotResult): void {
    if (!this.contains({ row, col })) {
      return;
    }
    this.set(row, col, result);
    if (result === 'sunk') {
      this.sinkLine(row, col);
    }
  }

  /**
   * Cells not shot at yet, row by row.
   */
  legalCells(): Cell[] {
    const legal: Cell[] = [];
    for (let row = 0; row < this.size; row++) {
      for (let col = 0; col < this.size; col++) {
        if (this.cellAt(row, col) === 'unknown') {
          legal.push({ row, col });
        }
      }
    }
    return legal;
  }

  /**
   * Struck cells whose ship is still afloat.
   */
  openHits(): Cell[] {
    const hits: Cell[] = [];
    for (let row = 0; row < this.size; row++) {
      for (let col = 0; col < this.size; col++) {
        if (this.cellAt(row, col) === 'hit') {
          hits.push({ row, col });
        }
      }
    }
    return hits;
  }

  private set(row: number, col: number, value: ObservedCell): void {
    this.cells[row * this.size + col] = value;
  }

  private sinkLine(row: number, col: number): void {
    const horizontal = this.cellAt(row, col - 1) === 'hit' || this.cellAt(row, col + 1) === 'hit';
    const dRow = horizontal ? 0 : 1;
    const dCol = horizontal ? 1 : 0;

    for (const sign of [-1, 1]) {
      let r = row + dRow * sign;
      let c = col + dCol * sign;
      while (this.cellAt(r, c) === 'hit') {
        this.set(r, c, 'sunk');
        r += dRow * sign;
        c += dCol * sign;
      }
    }
  }
}
