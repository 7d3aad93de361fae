import type { SimulationConfig } from "@cavern/contracts";
import { renderAscii, SIMPLE_CHARSET, Simulation } from "@cavern/engine";

/**
 * Regenerate one world from `config` and return it as plain text,
 * `#` for wall and `.` for open, one line per row.
 */
export function asciiWorld(config: SimulationConfig): string {
  const simulation = new Simulation(config);
  simulation.regenerate();
  return `${renderAscii(simulation.grid, { charset: SIMPLE_CHARSET })}\n`;
}
