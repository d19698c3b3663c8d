/**
 * ASCII Dungeon Renderer
 *
 * Text form of a tile grid, one character per tile and one line per row,
 * plus a debug renderer for finished dungeons.
 *
 * @example
 * ```typescript
 * import { generate, printDungeon } from "@delve/procgen";
 *
 * const result = generate({ width: 60, height: 40, seed: 12345 });
 * if (result.success) {
 *   printDungeon(result.artifact);
 * }
 * ```
 */

import { Grid, Tile } from "../core/grid";
import type { DungeonArtifact } from "../pipeline/types";

// =============================================================================
// TILE CODEC
// =============================================================================

const TILE_CHARS: Readonly<Record<Tile, string>> = {
  [Tile.BLOCKER]: "%",
  [Tile.WALL]: "#",
  [Tile.ROOM]: "_",
  [Tile.DOORWAY]: "d",
  [Tile.CORRIDOR]: "c",
  [Tile.CORRIDOR_NEIGHBOR]: "@",
  [Tile.EMPTY]: ".",
};

/**
 * Character for a tile
 */
export function tileToChar(tile: Tile): string {
  return TILE_CHARS[tile];
}

/**
 * Tile for a character. Unknown characters read as EMPTY.
 */
export function charToTile(char: string): Tile {
  switch (char) {
    case "%":
      return Tile.BLOCKER;
    case "#":
      return Tile.WALL;
    case "_":
      return Tile.ROOM;
    case "d":
      return Tile.DOORWAY;
    case "c":
      return Tile.CORRIDOR;
    case "@":
      return Tile.CORRIDOR_NEIGHBOR;
    default:
      return Tile.EMPTY;
  }
}

/**
 * Format a grid as text. Every row ends with a newline.
 */
export function formatGrid(grid: Grid): string {
  let out = "";
  for (let y = 0; y < grid.height; y++) {
    for (let x = 0; x < grid.width; x++) {
      out += TILE_CHARS[grid.get(x, y)];
    }
    out += "\n";
  }
  return out;
}

/**
 * Parse text produced by {@link formatGrid}.
 *
 * Width is the longest line; short lines are padded with EMPTY.
 *
 * @throws {Error} When the text holds no rows
 */
export function parseGrid(text: string): Grid {
  const lines = text.split("\n");
  if (lines.length > 0 && lines[lines.length - 1] === "") {
    lines.pop();
  }

  const width = lines.reduce((max, line) => Math.max(max, line.length), 0);
  if (lines.length === 0 || width === 0) {
    throw new Error("Cannot parse a grid with no tiles");
  }

  const tiles: Tile[] = [];
  for (const line of lines) {
    for (let x = 0; x < width; x++) {
      tiles.push(x < line.length ? charToTile(line.charAt(x)) : Tile.EMPTY);
    }
  }

  return Grid.fromTiles(width, lines.length, tiles);
}

// =============================================================================
// DEBUG RENDERING
// =============================================================================

/**
 * Render options
 */
export interface RenderOptions {
  /** Show room indices at the top-left corner of each room */
  readonly showRoomIds?: boolean;
  /** Show coordinates on edges */
  readonly showCoordinates?: boolean;
  /** Color output (ANSI escape codes) */
  readonly useColors?: boolean;
}

const ANSI = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  cyan: "\x1b[36m",
  white: "\x1b[37m",
} as const;

function colorize(text: string, ...codes: string[]): string {
  return codes.join("") + text + ANSI.reset;
}

function tileColor(tile: Tile): string {
  switch (tile) {
    case Tile.BLOCKER:
      return ANSI.dim + ANSI.blue;
    case Tile.WALL:
      return ANSI.blue;
    case Tile.ROOM:
      return ANSI.dim + ANSI.white;
    case Tile.DOORWAY:
      return ANSI.green;
    case Tile.CORRIDOR:
      return ANSI.yellow;
    case Tile.CORRIDOR_NEIGHBOR:
      return ANSI.red;
    default:
      return ANSI.white;
  }
}

/**
 * Render a dungeon as ASCII art
 */
export function renderDungeon(
  dungeon: DungeonArtifact,
  options: RenderOptions = {},
): string {
  const {
    showRoomIds = false,
    showCoordinates = false,
    useColors = false,
  } = options;
  const { grid, width, height } = dungeon;

  const labels = new Map<number, string>();
  if (showRoomIds) {
    dungeon.dungeon.rooms.forEach((room, index) => {
      const { x, y } = room.bounds;
      labels.set(y * width + x, (index % 36).toString(36));
    });
  }

  const lines: string[] = [];

  if (showCoordinates) {
    let coordLine = "    ";
    for (let x = 0; x < width; x += 10) {
      coordLine += x.toString().padEnd(10);
    }
    lines.push(coordLine);
  }

  for (let y = 0; y < height; y++) {
    let line = showCoordinates ? `${y.toString().padStart(3)} ` : "";
    for (let x = 0; x < width; x++) {
      const tile = grid.get(x, y);
      const label = labels.get(y * width + x);
      if (label !== undefined) {
        line += useColors ? colorize(label, ANSI.bold, ANSI.cyan) : label;
      } else {
        const char = TILE_CHARS[tile];
        line += useColors ? colorize(char, tileColor(tile)) : char;
      }
    }
    lines.push(line);
  }

  return lines.join("\n");
}

/**
 * Print dungeon to console
 */
export function printDungeon(
  dungeon: DungeonArtifact,
  options: RenderOptions = {},
): void {
  console.log(renderDungeon(dungeon, options));
}

/**
 * Print dungeon with stats
 */
export function printDungeonWithStats(
  dungeon: DungeonArtifact,
  options: RenderOptions = {},
): void {
  const ascii = renderDungeon(dungeon, options);
  const inner = Math.max(dungeon.width, 24);

  console.log(`╔${"═".repeat(inner + 2)}╗`);
  console.log(
    `${`║ Dungeon ${dungeon.width}×${dungeon.height}`.padEnd(inner + 3)}║`,
  );
  console.log(`╠${"═".repeat(inner + 2)}╣`);

  for (const line of ascii.split("\n")) {
    console.log(`║ ${line.padEnd(inner)} ║`);
  }

  console.log(`╠${"═".repeat(inner + 2)}╣`);
  console.log(
    `${`║ Rooms: ${dungeon.dungeon.rooms.length}`.padEnd(inner + 3)}║`,
  );
  console.log(
    `${`║ Corridors: ${dungeon.corridors.length}`.padEnd(inner + 3)}║`,
  );
  console.log(
    `${`║ Mazes: ${dungeon.mazeRooms.length}`.padEnd(inner + 3)}║`,
  );
  console.log(
    `${`║ Checksum: ${dungeon.checksum}`.padEnd(inner + 3)}║`,
  );
  console.log(`╚${"═".repeat(inner + 2)}╝`);
}
