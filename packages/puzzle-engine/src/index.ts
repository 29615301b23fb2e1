export const SIZE = 4;
const TILE_COUNT = SIZE * SIZE - 1;
export const SHUFFLE_SWAPS = 50;
export const BLANK_WALK_STEPS = 50;

export type Cell = { kind: "empty" } | { kind: "tile"; value: number };

export type Grid = ReadonlyArray<ReadonlyArray<Cell>>;

export type Position = {
  x: number;
  y: number;
};

// Direction the blank travels; the neighbouring tile slides the other way.
export type Direction = "up" | "down" | "left" | "right";

export type Rng = () => number;

export type ShuffleOptions = {
  seed?: string;
  rng?: Rng;
};

export const DIRECTIONS: readonly Direction[] = ["up", "down", "left", "right"];

const OFFSETS: Record<Direction, Position> = {
  up: { x: 0, y: -1 },
  down: { x: 0, y: 1 },
  left: { x: -1, y: 0 },
  right: { x: 1, y: 0 },
};

export const OPPOSITE: Record<Direction, Direction> = {
  up: "down",
  down: "up",
  left: "right",
  right: "left",
};

/** Thrown when a caller hands over a grid that breaks the board's shape or tile rules. */
export class InvalidGridError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidGridError";
  }
}

/** A grid owned by {@link PuzzleState} lost its single blank. Always a bug. */
export class GridInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "GridInvariantError";
  }
}

const EMPTY: Cell = { kind: "empty" };

const tile = (value: number): Cell => ({ kind: "tile", value });

const mulberry32 = (seed: number): Rng => {
  let t = seed >>> 0;
  return () => {
    t += 0x6d2b79f5;
    let r = Math.imul(t ^ (t >>> 15), 1 | t);
    r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
};

const hashSeed = (seed: string): number => {
  let h = 1779033703 ^ seed.length;
  for (let i = 0; i < seed.length; i++) {
    h = Math.imul(h ^ seed.charCodeAt(i), 3432918353);
    h = (h << 13) | (h >>> 19);
  }
  return (h ^ (h >>> 16)) >>> 0;
};

const deriveSeed = (seed?: string) => {
  if (seed && seed.trim().length > 0) return seed.trim();
  if (typeof crypto !== "undefined" && typeof crypto.randomUUID === "function") {
    return crypto.randomUUID().slice(0, 8);
  }
  return `seed-${Math.random().toString(36).slice(2, 10)}`;
};

const pickIndex = (rng: Rng, length: number) => Math.floor(rng() * length) % length;

const toRows = (cells: Cell[]): Cell[][] =>
  Array.from({ length: SIZE }, (_, y) => cells.slice(y * SIZE, (y + 1) * SIZE));

const cloneRows = (grid: Grid): Cell[][] => grid.map((row) => row.map((cell) => ({ ...cell })));

const inBounds = ({ x, y }: Position) => x >= 0 && x < SIZE && y >= 0 && y < SIZE;

const solvedRows = (): Cell[][] =>
  toRows([...Array.from({ length: TILE_COUNT }, (_, i) => tile(i + 1)), EMPTY]);

/**
 * Transposes tile slots only. Every real transposition flips the tiles'
 * permutation parity, so an even count keeps the blank-in-the-corner layout
 * solvable. A self-pair swaps nothing, so it is redrawn rather than counted.
 */
const transposedRows = (rng: Rng): Cell[][] => {
  const values = Array.from({ length: TILE_COUNT }, (_, i) => i + 1);
  let swaps = 0;
  while (swaps < SHUFFLE_SWAPS) {
    const a = pickIndex(rng, TILE_COUNT);
    const b = pickIndex(rng, TILE_COUNT);
    if (a === b) continue;
    [values[a], values[b]] = [values[b], values[a]];
    swaps++;
  }
  return toRows([...values.map(tile), EMPTY]);
};

/** Builds a grid from numbers, `0` marking the blank. */
export const gridFromNumbers = (rows: ReadonlyArray<ReadonlyArray<number>>): Grid =>
  rows.map((row) => row.map((value) => (value === 0 ? EMPTY : tile(value))));

export const solvedGrid = (): Grid => solvedRows();

/** Known solvable layout, four moves away from solved: right, down, down, right. */
export const demoGrid = (): Grid =>
  gridFromNumbers([
    [1, 2, 3, 4],
    [5, 0, 6, 8],
    [9, 10, 7, 12],
    [13, 14, 11, 15],
  ]);

export const validateGrid = (grid: Grid): void => {
  if (grid.length !== SIZE) {
    throw new InvalidGridError(`Grid must have ${SIZE} rows, got ${grid.length}.`);
  }
  const seen = new Set<number>();
  let blanks = 0;
  grid.forEach((row, y) => {
    if (row.length !== SIZE) {
      throw new InvalidGridError(`Row ${y} must have ${SIZE} cells, got ${row.length}.`);
    }
    for (const cell of row) {
      if (cell.kind === "empty") {
        blanks++;
        continue;
      }
      if (!Number.isInteger(cell.value) || cell.value < 1 || cell.value > TILE_COUNT) {
        throw new InvalidGridError(`Tile value ${cell.value} is outside 1-${TILE_COUNT}.`);
      }
      if (seen.has(cell.value)) {
        throw new InvalidGridError(`Tile ${cell.value} appears more than once.`);
      }
      seen.add(cell.value);
    }
  });
  if (blanks !== 1) {
    throw new InvalidGridError(`Grid must have exactly one blank, got ${blanks}.`);
  }
};

export const isSolvedGrid = (grid: Grid): boolean =>
  grid
    .flat()
    .every((cell, i) => (i === TILE_COUNT ? cell.kind === "empty" : cell.kind === "tile" && cell.value === i + 1));

/**
 * Inversion-parity test for an even-width board: solvable exactly when the
 * tile inversions plus the blank's row counted from the bottom (1-based) is odd.
 */
export const isSolvable = (grid: Grid): boolean => {
  validateGrid(grid);
  const values: number[] = [];
  let blankRowFromBottom = 0;
  grid.forEach((row, y) => {
    for (const cell of row) {
      if (cell.kind === "tile") values.push(cell.value);
      else blankRowFromBottom = SIZE - y;
    }
  });
  let inversions = 0;
  for (let i = 0; i < values.length; i++) {
    for (let j = i + 1; j < values.length; j++) {
      if (values[i] > values[j]) inversions++;
    }
  }
  return (inversions + blankRowFromBottom) % 2 === 1;
};

export const formatGrid = (grid: Grid): string =>
  grid
    .map((row) => row.map((cell) => (cell.kind === "empty" ? "__" : String(cell.value).padStart(2, "0"))).join(" "))
    .join("\n");

export class PuzzleState {
  private grid: Cell[][];
  /** Seed of the last shuffle; null for fixed layouts or a caller-supplied generator. */
  seed: string | null = null;

  private constructor(grid: Cell[][]) {
    this.grid = grid;
  }

  static shuffled(options: ShuffleOptions = {}): PuzzleState {
    const state = new PuzzleState(solvedRows());
    state.restart(options);
    return state;
  }

  static solved(): PuzzleState {
    return new PuzzleState(solvedRows());
  }

  static fromGrid(grid: Grid): PuzzleState {
    validateGrid(grid);
    return new PuzzleState(cloneRows(grid));
  }

  /** Throws away the current grid and deals a fresh solvable one. */
  restart(options: ShuffleOptions = {}): void {
    const seed = deriveSeed(options.seed);
    const rng = options.rng ?? mulberry32(hashSeed(seed));
    this.grid = transposedRows(rng);
    // Sliding the blank around keeps parity intact while moving it off the corner.
    for (let i = 0; i < BLANK_WALK_STEPS; i++) {
      this.applyMove(DIRECTIONS[pickIndex(rng, DIRECTIONS.length)]);
    }
    this.seed = options.rng ? null : seed;
  }

  isSolved(): boolean {
    return isSolvedGrid(this.grid);
  }

  findBlank(): Position {
    let found: Position | null = null;
    for (let y = 0; y < SIZE; y++) {
      for (let x = 0; x < SIZE; x++) {
        if (this.grid[y][x].kind !== "empty") continue;
        if (found) {
          throw new GridInvariantError(`Second blank at (${x}, ${y}); first at (${found.x}, ${found.y}).`);
        }
        found = { x, y };
      }
    }
    if (!found) {
      throw new GridInvariantError("Grid has no blank cell.");
    }
    return found;
  }

  /** Moves the blank one step. Returns false, leaving the grid untouched, when that would leave the board. */
  applyMove(direction: Direction): boolean {
    const blank = this.findBlank();
    const offset = OFFSETS[direction];
    const target = { x: blank.x + offset.x, y: blank.y + offset.y };
    if (!inBounds(target)) return false;
    this.grid[blank.y][blank.x] = this.grid[target.y][target.x];
    this.grid[target.y][target.x] = EMPTY;
    return true;
  }

  cellAt(position: Position): Cell {
    if (!inBounds(position)) {
      throw new RangeError(`Position (${position.x}, ${position.y}) is off the board.`);
    }
    return { ...this.grid[position.y][position.x] };
  }

  cells(): Grid {
    return cloneRows(this.grid);
  }
}
