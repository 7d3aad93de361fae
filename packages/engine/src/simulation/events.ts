/**
 * Input events
 *
 * What an input adapter hands to the simulation. Each event maps to one
 * controller operation; adapters drop anything they do not recognise
 * instead of inventing an event for it.
 */

import type { Direction } from "../core/geometry/types";
import type { SimulationMode } from "./modes";

export type InputEvent =
  | { readonly type: "move"; readonly direction: Direction }
  | { readonly type: "toggle-cell" }
  | { readonly type: "clear" }
  | { readonly type: "regenerate" }
  | { readonly type: "regenerate-new-seed" }
  | { readonly type: "toggle-run" }
  | { readonly type: "step" }
  | { readonly type: "select-mode"; readonly mode: SimulationMode }
  | {
      readonly type: "resize";
      readonly viewWidth: number;
      readonly viewHeight: number;
    }
  | { readonly type: "quit" };
