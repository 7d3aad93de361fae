/**
 * ANSI escape sequences used by the terminal host.
 */

const ESC = "\x1b";
const CSI = `${ESC}[`;

export const T = {
  altOn: `${CSI}?1049h`,
  altOff: `${CSI}?1049l`,
  clear: `${CSI}2J${CSI}H`,
  pos: (row: number, col: number) => `${CSI}${row};${col}H`,
  clearLine: `${CSI}2K`,
  hideCursor: `${CSI}?25l`,
  showCursor: `${CSI}?25h`,
} as const;

export const STYLE = {
  reset: `${CSI}0m`,
  bold: `${CSI}1m`,
  reverse: `${CSI}7m`,
  yellow: `${CSI}33m`,
  blue: `${CSI}34m`,
} as const;

/**
 * A run of text with an optional style. Width is the text length:
 * every glyph the host draws is one column wide.
 */
export interface Span {
  readonly text: string;
  readonly style?: string;
}

/**
 * Join spans into one line, cut to `width` visible columns.
 * Styles are emitted only when `color` is set.
 */
export function renderSpans(
  spans: readonly Span[],
  width: number,
  color: boolean,
): string {
  let out = "";
  let remaining = width;

  for (const span of spans) {
    if (remaining <= 0) break;
    const text = span.text.slice(0, remaining);
    remaining -= text.length;
    out += color && span.style ? `${span.style}${text}${STYLE.reset}` : text;
  }

  return out;
}

export function spansWidth(spans: readonly Span[]): number {
  return spans.reduce((sum, span) => sum + span.text.length, 0);
}
