export { Grid } from "./grid";
export type { CellVisitor, MutableGrid, ReadonlyGrid } from "./types";
