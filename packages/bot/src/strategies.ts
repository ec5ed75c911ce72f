/**
 * @fileoverview Shot selection for the bot.
 *
 * A strategy only ever sees the observed board and the cells still open, so
 * any decision function with the same signature can be plugged in.
 */

import type { Cell } from '@broadside/protocol';
import type { ObservedBoard } from './ObservedBoard.js';

export interface ShotStrategy {
  readonly name: string;
  chooseShot(observed: ObservedBoard, legalCells: readonly Cell[]): Cell;
}

export type StrategyName = 'random' | 'hunt';

export function isStrategyName(value: unknown): value is StrategyName {
  return value === 'random' || value === 'hunt';
}

/**
 * Pick a random element.
 * @throws {Error} if the list is empty
 */
function pick<T>(items: readonly T[], rng: () => number): T {
  const item = items[Math.floor(rng() * items.length)];
  if (item === undefined) {
    throw new Error('No cells left to shoot at');
  }
  return item;
}

/**
 * Uniformly random among the open cells.
 */
export class RandomShotStrategy implements ShotStrategy {
  readonly name = 'random';

  constructor(private readonly rng: () => number = Math.random) {}

  chooseShot(_observed: ObservedBoard, legalCells: readonly Cell[]): Cell {
    return pick(legalCells, this.rng);
  }
}

const NEIGHBOUR_OFFSETS: readonly Cell[] = [
  { row: -1, col: 0 },
  { row: 1, col: 0 },
  { row: 0, col: -1 },
  { row: 0, col: 1 },
];

/**
 * Hunt on a checkerboard until something is hit, then work outward from the hits.
 * Two hits in a row narrow the follow-up to that line.
 */
export class HuntTargetStrategy implements ShotStrategy {
  readonly name = 'hunt';

  constructor(private readonly rng: () => number = Math.random) {}

  chooseShot(observed: ObservedBoard, legalCells: readonly Cell[]): Cell {
    const open = new Set(legalCells.map((c) => `${c.row},${c.col}`));
    const isOpen = (cell: Cell) => open.has(`${cell.row},${cell.col}`);

    const hits = observed.openHits();
    if (hits.length > 0) {
      const inLine = this.lineTargets(observed, hits).filter(isOpen);
      if (inLine.length > 0) {
        return pick(inLine, this.rng);
      }

      const around = hits
        .flatMap((hit) => NEIGHBOUR_OFFSETS.map((d) => ({ row: hit.row + d.row, col: hit.col + d.col })))
        .filter(isOpen);
      if (around.length > 0) {
        return pick(around, this.rng);
      }
    }

    const parity = legalCells.filter((c) => (c.row + c.col) % 2 === 0);
    return pick(parity.length > 0 ? parity : legalCells, this.rng);
  }

  /**
   * Cells extending a run of two or more adjacent hits.
   */
  private lineTargets(observed: ObservedBoard, hits: readonly Cell[]): Cell[] {
    const targets: Cell[] = [];
    for (const hit of hits) {
      for (const d of NEIGHBOUR_OFFSETS) {
        if (observed.cellAt(hit.row + d.row, hit.col + d.col) !== 'hit') continue;
        // Walk past the end of the run in this direction
        let row = hit.row + d.row;
        let col = hit.col + d.col;
        while (observed.cellAt(row, col) === 'hit') {
          row += d.row;
          col += d.col;
        }
        targets.push({ row, col });
      }
    }
    return targets;
  }
}

export function createStrategy(name: StrategyName, rng: () => number = Math.random): ShotStrategy {
  switch (name) {
    case 'random':
      return new RandomShotStrategy(rng);
    case 'hunt':
      return new HuntTargetStrategy(rng);
  }
}
