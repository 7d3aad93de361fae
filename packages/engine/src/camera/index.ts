export { Camera, followAxis } from "./camera";
export { Cursor } from "./cursor";
