/**
 * Simulation modes.
 */

import { SIMULATION_MODES, type SimulationModeName } from "@cavern/contracts";

export type SimulationMode = SimulationModeName;

/**
 * Display names, as shown in the status bar
 */
export const MODE_LABELS: Readonly<Record<SimulationMode, string>> = {
  paint: "Paint",
  life: "Life",
  "drunk-walk": "DrunkWalk",
};

/**
 * Mode bound to a 1-based selector key, or undefined when none is.
 */
export function modeForSlot(slot: number): SimulationMode | undefined {
  return SIMULATION_MODES[slot - 1];
}

/**
 * Modes that evolve the grid on their own and start paused on entry.
 */
export function isAutonomous(mode: SimulationMode): boolean {
  return mode !== "paint";
}
