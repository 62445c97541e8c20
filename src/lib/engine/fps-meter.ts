export type Clock = () => number;

/**
 * Frames per second over a rolling one-second window.
 */
export class FpsMeter {
  private startTime: number;
  private frameCount: number = 0;
  private fps: number = 0;
  private now: Clock;

  constructor(now: Clock = Date.now) {
    this.now = now;
    this.startTime = now();
  }

  update(): void {
    this.frameCount++;
    const elapsedMs = this.now() - this.startTime;
    if (elapsedMs >= 1000) {
      this.fps = this.frameCount / (elapsedMs / 1000);
      this.frameCount = 0;
      this.startTime = this.now();
    }
  }

  getFps(): number {
    return Math.round(this.fps * 100) / 100;
  }

  reset(): void {
    this.startTime = this.now();
    this.frameCount = 0;
    this.fps = 0;
  }
}
