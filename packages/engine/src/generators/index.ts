export {
  type DrunkWalkOptions,
  type DrunkWalkReport,
  genDrunkWalk,
} from "./drunk-walk";
export { type RandomFillReport, regenRandom } from "./random-fill";
