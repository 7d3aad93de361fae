/**
 * Raw keyboard decoding
 *
 * Splits a chunk read from stdin in raw mode into input events. A chunk
 * can hold several keys when keys repeat faster than the loop reads.
 */

import { type Direction, type InputEvent, modeForSlot } from "@cavern/engine";

const ESC = "\x1b";
const CTRL_C = "\x03";

const ARROWS: Readonly<Record<string, Direction>> = {
  A: "up",
  B: "down",
  C: "right",
  D: "left",
};

const VI_KEYS: Readonly<Record<string, Direction>> = {
  h: "left",
  j: "down",
  k: "up",
  l: "right",
};

const COMMANDS: Readonly<Record<string, InputEvent>> = {
  " ": { type: "toggle-cell" },
  c: { type: "clear" },
  r: { type: "regenerate" },
  n: { type: "regenerate-new-seed" },
  p: { type: "toggle-run" },
  s: { type: "step" },
  q: { type: "quit" },
  Q: { type: "quit" },
  [CTRL_C]: { type: "quit" },
};

/**
 * Length of the escape sequence starting at `start`, ending at its final
 * byte (a letter or `~`). Returns the rest of the chunk if unterminated.
 */
function sequenceLength(chunk: string, start: number): number {
  for (let i = start + 2; i < chunk.length; i++) {
    if (/[A-Za-z~]/.test(chunk.charAt(i))) return i - start + 1;
  }
  return chunk.length - start;
}

interface Decoded {
  event?: InputEvent;
  length: number;
}

function decodeEscape(chunk: string, start: number): Decoded {
  const next = chunk.charAt(start + 1);

  // Bare ESC
  if (next !== "[" && next !== "O") {
    return { event: { type: "quit" }, length: 1 };
  }

  const length = sequenceLength(chunk, start);
  const direction = length === 3 ? ARROWS[chunk.charAt(start + 2)] : undefined;
  return { event: direction ? { type: "move", direction } : undefined, length };
}

export function decodeKeys(chunk: string): InputEvent[] {
  const events: InputEvent[] = [];
  let i = 0;

  while (i < chunk.length) {
    const ch = chunk.charAt(i);

    if (ch === ESC) {
      const { event, length } = decodeEscape(chunk, i);
      if (event) events.push(event);
      i += length;
      continue;
    }

    const vi = VI_KEYS[ch];
    const mode = /[1-9]/.test(ch) ? modeForSlot(Number(ch)) : undefined;
    const command = COMMANDS[ch];

    if (vi) {
      events.push({ type: "move", direction: vi });
    } else if (mode) {
      events.push({ type: "select-mode", mode });
    } else if (command) {
      events.push(command);
    }
    i++;
  }

  return events;
}
