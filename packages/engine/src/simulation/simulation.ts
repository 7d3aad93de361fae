/**
 * Simulation controller
 *
 * Owns the grid, cursor and camera, tracks the active mode and run state,
 * and turns input events and clock ticks into grid updates.
 */

import {
  nextSeed,
  type Seed,
  type SimulationConfig,
  type SimulationConfigInput,
  validateConfig,
} from "@cavern/contracts";
import type { Dimensions, Direction } from "../core/geometry/types";
import { Grid } from "../core/grid";
import { Camera, Cursor } from "../camera";
import { genDrunkWalk, regenRandom } from "../generators";
import type { InputEvent } from "./events";
import { isAutonomous, MODE_LABELS, type SimulationMode } from "./modes";
import type { SimulationSnapshot } from "./snapshot";

export class Simulation {
  readonly grid: Grid;
  readonly cursor = new Cursor();
  readonly camera = new Camera();
  readonly config: SimulationConfig;

  private _mode: SimulationMode;
  private _running = false;
  private _seed: Seed;
  private _generation = 0;
  private _exitRequested = false;
  private lastStepAt: number;

  /**
   * @param now - clock reading the first autonomous step is timed from
   */
  constructor(config: SimulationConfig, now = 0) {
    this.config = config;
    this.grid = new Grid(config.worldWidth, config.worldHeight);
    this._mode = config.initialMode;
    this._seed = config.seed;
    this.lastStepAt = now;
  }

  /**
   * Validate raw configuration and build a simulation from it.
   * Throws the CaveError from validation on bad input.
   */
  static create(input: SimulationConfigInput = {}, now = 0): Simulation {
    return new Simulation(validateConfig(input).getOrThrow(), now);
  }

  // ===========================================================================
  // STATE
  // ===========================================================================

  get world(): Dimensions {
    return { width: this.grid.width, height: this.grid.height };
  }

  get mode(): SimulationMode {
    return this._mode;
  }

  get running(): boolean {
    return this._running;
  }

  get seed(): Seed {
    return this._seed;
  }

  get generation(): number {
    return this._generation;
  }

  get exitRequested(): boolean {
    return this._exitRequested;
  }

  // ===========================================================================
  // EDITING
  // ===========================================================================

  moveCursor(direction: Direction): void {
    this.cursor.move(direction, this.world);
    this.camera.follow(this.cursor, this.world);
  }

  toggleCell(): void {
    this.grid.toggle(this.cursor.x, this.cursor.y);
  }

  clear(): void {
    this.grid.clear();
  }

  /**
   * Rebuild the grid from the current seed with the generator that fits
   * the mode: drunk walk in DrunkWalk mode, random fill otherwise.
   */
  regenerate(): void {
    if (this._mode === "drunk-walk") {
      this.carve();
    } else {
      regenRandom(this.grid, this._seed, this.config.fillProbability);
    }
  }

  regenerateWithNewSeed(): void {
    this._seed = nextSeed(this._seed);
    this.regenerate();
  }

  // ===========================================================================
  // MODES AND STEPPING
  // ===========================================================================

  /**
   * Switch mode. Life and DrunkWalk start paused, and the next
   * autonomous step waits a full interval from `now`.
   */
  setMode(mode: SimulationMode, now: number): void {
    this._mode = mode;
    if (isAutonomous(mode)) {
      this._running = false;
      this.lastStepAt = now;
    }
  }

  /**
   * Pause or resume autonomous stepping. Resuming restarts the interval.
   */
  toggleRun(now: number): void {
    this._running = !this._running;
    if (this._running) {
      this.lastStepAt = now;
    }
  }

  /**
   * One step of the active mode, whether or not the simulation is running.
   */
  stepOnce(): void {
    this.stepActive();
  }

  /**
   * Step if running and at least one interval has passed since the last
   * autonomous step.
   *
   * @returns whether a step was taken
   */
  tick(now: number): boolean {
    if (!this._running) return false;
    if (now - this.lastStepAt < this.config.tickIntervalMs) return false;

    this.lastStepAt = now;
    this.stepActive();
    return true;
  }

  private stepActive(): void {
    switch (this._mode) {
      case "paint":
        return;
      case "life":
        this.grid.stepLife();
        break;
      case "drunk-walk":
        this._seed = nextSeed(this._seed);
        this.carve();
        this.recenter();
        break;
    }
    this._generation++;
  }

  private carve(): void {
    genDrunkWalk(this.grid, this._seed, this.config.walkRatio, {
      maxSteps: this.config.maxWalkSteps,
    });
  }

  /**
   * Cursor to the middle of the world, camera centred on it.
   */
  private recenter(): void {
    const world = this.world;
    this.cursor.moveTo(
      Math.floor(world.width / 2),
      Math.floor(world.height / 2),
      world,
    );
    this.camera.centerOn(this.cursor, world);
    this.camera.follow(this.cursor, world);
  }

  // ===========================================================================
  // VIEWPORT
  // ===========================================================================

  resize(viewWidth: number, viewHeight: number): void {
    this.camera.resize(viewWidth, viewHeight, this.world);
    this.camera.follow(this.cursor, this.world);
  }

  // ===========================================================================
  // EVENTS
  // ===========================================================================

  requestExit(): void {
    this._exitRequested = true;
  }

  dispatch(event: InputEvent, now: number): void {
    switch (event.type) {
      case "move":
        this.moveCursor(event.direction);
        break;
      case "toggle-cell":
        this.toggleCell();
        break;
      case "clear":
        this.clear();
        break;
      case "regenerate":
        this.regenerate();
        break;
      case "regenerate-new-seed":
        this.regenerateWithNewSeed();
        break;
      case "toggle-run":
        this.toggleRun(now);
        break;
      case "step":
        this.stepOnce();
        break;
      case "select-mode":
        this.setMode(event.mode, now);
        break;
      case "resize":
        this.resize(event.viewWidth, event.viewHeight);
        break;
      case "quit":
        this.requestExit();
        break;
      default: {
        const unhandled: never = event;
        throw new Error(`Unhandled input event: ${JSON.stringify(unhandled)}`);
      }
    }
  }

  snapshot(): SimulationSnapshot {
    return {
      grid: this.grid,
      world: this.world,
      view: this.camera.visibleRect(),
      cursor: { x: this.cursor.x, y: this.cursor.y },
      mode: this._mode,
      modeLabel: MODE_LABELS[this._mode],
      seed: this._seed,
      running: this._running,
      generation: this._generation,
    };
  }
}
