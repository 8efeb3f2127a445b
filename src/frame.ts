import type { Interpreter } from "./runtime.js";

export type Viewport = { width: number; height: number };

/**
 * Per-frame globals scripts read as plain identifiers:
 * `dt` (seconds since the previous frame), `frame`, `screenWidth`, `screenHeight`.
 */
export class FrameContext {
  private frame = 0;
  constructor(private interp: Interpreter, private viewport: Viewport) {}

  init(): void {
    this.frame = 0;
    this.publish(0);
  }

  /** Advances one frame. Call before triggering the frame's events. */
  tick(dt: number, viewport: Viewport = this.viewport): void {
    this.viewport = viewport;
    this.frame++;
    this.publish(dt);
  }

  get frameCount() { return this.frame; }

  private publish(dt: number) {
    this.interp.setGlobalFloat("dt", dt);
    this.interp.setGlobalInt("frame", this.frame);
    this.interp.setGlobalInt("screenWidth", this.viewport.width);
    this.interp.setGlobalInt("screenHeight", this.viewport.height);
  }
}
