export type { InputEvent } from "./events";
export {
  isAutonomous,
  MODE_LABELS,
  modeForSlot,
  type SimulationMode,
} from "./modes";
export { Simulation } from "./simulation";
export { type SimulationSnapshot, visibleCells } from "./snapshot";
