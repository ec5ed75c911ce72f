/**
 * @fileoverview The bot's own grid: ship placement and incoming shot resolution.
 */

import type { Cell, Orientation, ShipPlacement, ShotResult } from '@broadside/protocol';

export const BOARD_SIZE = 10;

export interface ShipClass {
  readonly name: string;
  readonly length: number;
}

/**
 * Carrier, battleship, cruiser, submarine, destroyer.
 */
export const CLASSIC_FLEET: readonly ShipClass[] = [
  { name: 'carrier', length: 5 },
  { name: 'battleship', length: 4 },
  { name: 'cruiser', length: 3 },
  { name: 'submarine', length: 3 },
  { name: 'destroyer', length: 2 },
];

const MAX_PLACEMENT_ATTEMPTS = 1000;

/**
 * Cells covered by a placement, bow first.
 */
export function shipCells(ship: ShipPlacement): Cell[] {
  const cells: Cell[] = [];
  for (let i = 0; i < ship.length; i++) {
    cells.push(
      ship.orientation === 'horizontal'
        ? { row: ship.row, col: ship.col + i }
        : { row: ship.row + i, col: ship.col }
    );
  }
  return cells;
}

function cellKey(cell: Cell): string {
  return `${cell.row},${cell.col}`;
}

interface PlacedShip {
  readonly placement: ShipPlacement;
  readonly cells: ReadonlySet<string>;
  readonly hits: Set<string>;
}

export class FleetBoard {
  private readonly ships: PlacedShip[];
  private readonly occupied = new Map<string, PlacedShip>();

  private constructor(
    placements: readonly ShipPlacement[],
    readonly size: number
  ) {
    this.ships = placements.map((placement) => ({
      placement,
      cells: new Set(shipCells(placement).map(cellKey)),
      hits: new Set<string>(),
    }));
    for (const ship of this.ships) {
      for (const key of ship.cells) {
        this.occupied.set(key, ship);
      }
    }
  }

  // ============ Static Constructors ============

  /**
   * Place the fleet at random, non-overlapping positions.
   * @param rng - Source of randomness in [0, 1)
   */
  static random(
    rng: () => number = Math.random,
    fleet: readonly ShipClass[] = CLASSIC_FLEET,
    size: number = BOARD_SIZE
  ): FleetBoard {
    const placements: ShipPlacement[] = [];
    const taken = new Set<string>();

    for (const shipClass of fleet) {
      let placed = false;
      for (let attempt = 0; attempt < MAX_PLACEMENT_ATTEMPTS && !placed; attempt++) {
        const orientation: Orientation = rng() < 0.5 ? 'horizontal' : 'vertical';
        const rowSpan = orientation === 'vertical' ? size - shipClass.length + 1 : size;
        const colSpan = orientation === 'horizontal' ? size - shipClass.length + 1 : size;
        const candidate: ShipPlacement = {
          name: shipClass.name,
          length: shipClass.length,
          orientation,
          row: Math.floor(rng() * rowSpan),
          col: Math.floor(rng() * colSpan),
        };

        const keys = shipCells(candidate).map(cellKey);
        if (keys.every((key) => !taken.has(key))) {
          for (const key of keys) taken.add(key);
          placements.push(candidate);
          placed = true;
        }
      }
      if (!placed) {
        throw new Error(`Could not place ${shipClass.name} on a ${size}x${size} board`);
      }
    }

    return new FleetBoard(placements, size);
  }

  /**
   * Build a board from explicit placements.
   * @throws {Error} if a ship leaves the grid or overlaps another
   */
  static fromPlacements(placements: readonly ShipPlacement[], size: number = BOARD_SIZE): FleetBoard {
    const taken = new Set<string>();
    for (const ship of placements) {
      for (const cell of shipCells(ship)) {
        if (cell.row < 0 || cell.col < 0 || cell.row >= size || cell.col >= size) {
          throw new Error(`Ship ${ship.name} leaves the board`);
        }
        const key = cellKey(cell);
        if (taken.has(key)) {
          throw new Error(`Ship ${ship.name} overlaps another ship`);
        }
        taken.add(key);
      }
    }
    return new FleetBoard(placements, size);
  }

  // ============ Queries ============

  get placements(): ShipPlacement[] {
    return this.ships.map((s) => s.placement);
  }

  isOccupied(cell: Cell): boolean {
    return this.occupied.has(cellKey(cell));
  }

  allSunk(): boolean {
    return this.ships.every((ship) => ship.hits.size === ship.cells.size);
  }

  // ============ Shots ============

  /**
   * Resolve an incoming shot. A repeated shot on a struck cell reports a hit again.
   */
  receiveShot(row: number, col: number): ShotResult {
    const key = cellKey({ row, col });
    const ship = this.occupied.get(key);
    if (!ship) {
      return 'miss';
    }
    if (ship.hits.has(key)) {
      return 'hit';
    }

    ship.hits.add(key);
    return ship.hits.size === ship.cells.size ? 'sunk' : 'hit';
  }
}
