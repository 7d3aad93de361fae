/**
 * Interactive control loop
 *
 * Wires stdin key events, a tick timer and terminal resizes to a
 * Simulation and redraws after every change.
 */

import type { Simulation } from "@cavern/engine";
import { STYLE, T } from "./terminal/ansi";
import { decodeKeys } from "./terminal/keys";
import {
  renderFrame,
  type TerminalSize,
  viewportFor,
} from "./terminal/renderer";
import { WarningBuffer } from "./terminal/warnings";

type ErrorListener = (error: Error) => void;

export interface KeySource {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
  setEncoding(encoding: BufferEncoding): unknown;
  resume(): unknown;
  pause(): unknown;
  on(event: "data", listener: (chunk: string) => void): unknown;
  on(event: "end", listener: () => void): unknown;
  on(event: "error", listener: ErrorListener): unknown;
  off(event: "data", listener: (chunk: string) => void): unknown;
  off(event: "end", listener: () => void): unknown;
  off(event: "error", listener: ErrorListener): unknown;
}

export interface Screen {
  columns?: number;
  rows?: number;
  /** Set once the stream is torn down; nothing more can be written */
  readonly destroyed?: boolean;
  write(text: string): boolean;
  on(event: "resize", listener: () => void): unknown;
  on(event: "error", listener: ErrorListener): unknown;
  off(event: "resize", listener: () => void): unknown;
  off(event: "error", listener: ErrorListener): unknown;
}

export interface TerminalAppOptions {
  readonly input: KeySource;
  readonly output: Screen;
  readonly color: boolean;
  /** Milliseconds clock; Date.now unless a test supplies one */
  readonly clock?: () => number;
}

const FALLBACK_SIZE: TerminalSize = { columns: 80, rows: 24 };

export class TerminalApp {
  private readonly clock: () => number;
  private timer: ReturnType<typeof setInterval> | undefined;
  private finish: ((error?: unknown) => void) | undefined;
  private readonly warnings = new WarningBuffer();
  private restoreWarn: (() => void) | undefined;

  constructor(
    private readonly simulation: Simulation,
    private readonly options: TerminalAppOptions,
  ) {
    this.clock = options.clock ?? Date.now;
  }

  get size(): TerminalSize {
    return {
      columns: this.options.output.columns ?? FALLBACK_SIZE.columns,
      rows: this.options.output.rows ?? FALLBACK_SIZE.rows,
    };
  }

  /**
   * Run until the user quits, stdin ends or `stop` is called. Rejects,
   * after the terminal is restored, if drawing or stepping throws or
   * either stream reports an error.
   */
  run(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const { input, output } = this.options;

      const onData = (chunk: string): void => {
        this.guard(() => {
          const now = this.clock();
          for (const event of decodeKeys(chunk)) {
            this.simulation.dispatch(event, now);
            if (this.simulation.exitRequested) break;
          }
          if (this.simulation.exitRequested) {
            this.finish?.();
          } else {
            this.draw();
          }
        });
      };

      const onResize = (): void => {
        this.guard(() => {
          this.fitViewport();
          this.draw();
        });
      };

      const onEnd = (): void => this.stop();

      const onError: ErrorListener = (error) => this.finish?.(error);

      this.finish = (error?: unknown) => {
        this.finish = undefined;
        if (this.timer !== undefined) clearInterval(this.timer);
        this.timer = undefined;
        input.off("data", onData);
        input.off("end", onEnd);
        input.off("error", onError);
        output.off("resize", onResize);
        output.off("error", onError);
        try {
          this.leave();
        } catch (leaveError) {
          error ??= leaveError;
        }
        if (error === undefined) resolve();
        else reject(error);
      };

      this.guard(() => {
        input.on("error", onError);
        output.on("error", onError);

        this.enter();
        this.fitViewport();
        this.draw();

        input.on("data", onData);
        input.on("end", onEnd);
        output.on("resize", onResize);
        this.timer = setInterval(() => {
          this.guard(() => {
            if (this.simulation.tick(this.clock())) this.draw();
          });
        }, this.simulation.config.tickIntervalMs);
      });
    });
  }

  /**
   * End the loop from outside, e.g. on SIGTERM.
   */
  stop(): void {
    this.simulation.requestExit();
    this.finish?.();
  }

  private guard(fn: () => void): void {
    try {
      fn();
    } catch (error) {
      this.finish?.(error);
    }
  }

  private fitViewport(): void {
    const { viewWidth, viewHeight } = viewportFor(this.size);
    this.simulation.resize(viewWidth, viewHeight);
  }

  private draw(): void {
    const lines = renderFrame(this.simulation.snapshot(), this.size, {
      color: this.options.color,
    });
    let frame = "";
    lines.forEach((line, i) => {
      frame += T.pos(i + 1, 1) + T.clearLine + line;
    });
    this.options.output.write(frame);
  }

  private enter(): void {
    const { input, output } = this.options;

    // Warnings would scribble over the alternate screen; replay them on exit
    const warn = console.warn;
    console.warn = (...args: unknown[]) => {
      this.warnings.add(args);
    };
    this.restoreWarn = () => {
      console.warn = warn;
    };

    output.write(T.altOn + T.hideCursor + T.clear);
    if (input.isTTY) input.setRawMode?.(true);
    input.setEncoding("utf8");
    input.resume();
  }

  private leave(): void {
    const { input, output } = this.options;

    try {
      if (input.isTTY) input.setRawMode?.(false);
      input.pause();
      if (!output.destroyed) {
        output.write(STYLE.reset + T.showCursor + T.altOff);
      }
    } finally {
      this.restoreWarn?.();
      this.restoreWarn = undefined;
      this.warnings.flush((...args) => console.warn(...args));
    }
  }
}
