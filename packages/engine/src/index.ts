/**
 * Cave grid engine: storage, Life evolution, generators, camera and
 * the mode controller that ties them together.
 */

export { Camera, Cursor, followAxis } from "./camera";
export {
  clamp,
  type Dimensions,
  type Direction,
  DIRECTION_VECTORS,
  DIRECTIONS_4,
  DIRECTIONS_8,
  type Point,
  type Rect,
} from "./core/geometry/types";
export {
  type CellVisitor,
  Grid,
  type MutableGrid,
  type ReadonlyGrid,
} from "./core/grid";
export {
  type DrunkWalkOptions,
  type DrunkWalkReport,
  genDrunkWalk,
  type RandomFillReport,
  regenRandom,
} from "./generators";
export {
  type InputEvent,
  isAutonomous,
  MODE_LABELS,
  modeForSlot,
  Simulation,
  type SimulationMode,
  type SimulationSnapshot,
  visibleCells,
} from "./simulation";
export {
  type AsciiCharset,
  DEFAULT_CHARSET,
  type RenderOptions,
  renderAscii,
  renderAsciiLines,
  SIMPLE_CHARSET,
} from "./utils/ascii-renderer";
