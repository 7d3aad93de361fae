/**
 * Frame renderer
 *
 * Turns a simulation snapshot into the lines of one terminal frame:
 * a status bar, then the visible window inside a thick border titled
 * " Cave! " with the key help along the bottom edge.
 */

import type { SimulationSnapshot } from "@cavern/engine";
import { renderSpans, type Span, spansWidth, STYLE } from "./ansi";

export interface TerminalSize {
  readonly columns: number;
  readonly rows: number;
}

export interface FrameOptions {
  readonly color: boolean;
}

/** Columns per world cell, so cells look roughly square */
export const CELL_COLUMNS = 2;

/** Status bar plus top and bottom border */
const CHROME_ROWS = 3;

const GLYPH = {
  filled: "██",
  empty: "  ",
  cursor: "[]",
} as const;

const BORDER = {
  topLeft: "┏",
  topRight: "┓",
  bottomLeft: "┗",
  bottomRight: "┛",
  horizontal: "━",
  vertical: "┃",
} as const;

const KEY = STYLE.blue + STYLE.bold;

const TITLE: readonly Span[] = [{ text: " Cave! ", style: STYLE.bold }];

const HELP: readonly Span[] = [
  { text: " Move " },
  { text: "←↑↓→", style: KEY },
  { text: "  Toggle " },
  { text: "<Space>", style: KEY },
  { text: "  Run " },
  { text: "<P>", style: KEY },
  { text: "  Step " },
  { text: "<S>", style: KEY },
  { text: "  Mode " },
  { text: "<1-3>", style: KEY },
  { text: "  Regen " },
  { text: "<R>", style: KEY },
  { text: "  New " },
  { text: "<N>", style: KEY },
  { text: "  Clear " },
  { text: "<C>", style: KEY },
  { text: "  Quit " },
  { text: "<Q>", style: KEY },
  { text: " " },
];

/**
 * World cells that fit in a terminal of the given size.
 */
export function viewportFor(size: TerminalSize): {
  viewWidth: number;
  viewHeight: number;
} {
  return {
    viewWidth: Math.max(1, Math.floor((size.columns - 2) / CELL_COLUMNS)),
    viewHeight: Math.max(1, size.rows - CHROME_ROWS),
  };
}

export function statusSpans(snapshot: SimulationSnapshot): Span[] {
  return [
    { text: " Cursor Position: " },
    { text: String(snapshot.cursor.x), style: STYLE.yellow },
    { text: " " },
    { text: String(snapshot.cursor.y), style: STYLE.blue },
    { text: "  Mode: " },
    { text: snapshot.modeLabel, style: STYLE.bold },
    { text: `  Seed: ${snapshot.seed}` },
    { text: `  Running: ${snapshot.running ? "yes" : "no"}` },
    { text: `  World: ${snapshot.world.width}x${snapshot.world.height}` },
    { text: `  Gen: ${snapshot.generation}` },
  ];
}

function borderLine(
  left: string,
  right: string,
  label: readonly Span[],
  width: number,
  color: boolean,
): string {
  const inner = width - 2;
  const labelWidth = Math.min(inner, spansWidth(label));
  const before = Math.floor((inner - labelWidth) / 2);
  const after = inner - labelWidth - before;

  return (
    left +
    BORDER.horizontal.repeat(before) +
    renderSpans(label, inner, color) +
    BORDER.horizontal.repeat(after) +
    right
  );
}

function gridRow(
  snapshot: SimulationSnapshot,
  row: number,
  inner: number,
  color: boolean,
): string {
  const { grid, view, cursor } = snapshot;
  let body = "";
  let used = 0;

  if (row < view.height) {
    const y = view.y + row;
    const end = view.x + view.width;
    for (let x = view.x; x < end && used + CELL_COLUMNS <= inner; x++) {
      let glyph: string = grid.get(x, y) ? GLYPH.filled : GLYPH.empty;
      if (x === cursor.x && y === cursor.y) {
        glyph = color
          ? `${STYLE.reverse}${glyph}${STYLE.reset}`
          : GLYPH.cursor;
      }
      body += glyph;
      used += CELL_COLUMNS;
    }
  }

  return BORDER.vertical + body + " ".repeat(inner - used) + BORDER.vertical;
}

/**
 * Lines of one frame, top to bottom. Never wider than `size.columns`
 * visible columns (2 at the least) and exactly `size.rows` lines when
 * there is room for at least one grid row.
 */
export function renderFrame(
  snapshot: SimulationSnapshot,
  size: TerminalSize,
  options: FrameOptions,
): string[] {
  const width = Math.max(2, size.columns);
  const inner = width - 2;
  const gridRows = Math.max(1, size.rows - CHROME_ROWS);

  const { color } = options;

  const lines = [renderSpans(statusSpans(snapshot), width, color)];
  lines.push(
    borderLine(BORDER.topLeft, BORDER.topRight, TITLE, width, color),
  );
  for (let row = 0; row < gridRows; row++) {
    lines.push(gridRow(snapshot, row, inner, color));
  }
  lines.push(
    borderLine(BORDER.bottomLeft, BORDER.bottomRight, HELP, width, color),
  );

  return lines;
}
