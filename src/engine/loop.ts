import { logger } from '../logger.js';
import type { FrameSource } from '../capture/frame-source.js';
import type { EventGate } from '../detection/event-gate.js';
import type { CommandChannel } from '../state/command-channel.js';
import type { SessionStore } from '../state/session-store.js';
import type { DeathEvent, Frame, QueuedCommand, Region } from '../types/index.js';

export interface EngineLoopOptions {
  fps: number;
  region?: Region | null;
  now?: () => number;
}

export interface EngineLoopStats {
  ticks: number;
  framesEvaluated: number;
  /** Ticks where capture produced no frame. */
  skippedFrames: number;
  events: number;
  overruns: number;
  captureErrors: number;
}

/**
 * Paced capture → match → gate loop. Each tick refreshes the extrapolated
 * timer, then, if the gate is armed, grabs one frame and publishes a death
 * command when the gate fires. The next tick is scheduled for the remainder
 * of the frame interval; a tick that overruns is followed immediately.
 */
export class EngineLoop {
  private readonly now: () => number;
  private intervalMs: number;
  private region: Region | null;
  private running = false;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private currentTick: Promise<void> | null = null;
  /** Bumped by start(); a tick chain from an earlier run stops rescheduling. */
  private generation = 0;
  private readonly counters: EngineLoopStats = {
    ticks: 0,
    framesEvaluated: 0,
    skippedFrames: 0,
    events: 0,
    overruns: 0,
    captureErrors: 0,
  };

  constructor(
    private readonly source: FrameSource | null,
    private readonly gate: EventGate,
    private readonly store: SessionStore,
    private readonly channel: CommandChannel<QueuedCommand>,
    options: EngineLoopOptions,
  ) {
    this.now = options.now ?? Date.now;
    this.intervalMs = 1000 / Math.max(1, options.fps);
    this.region = options.region ?? null;
  }

  get isRunning(): boolean {
    return this.running;
  }

  get frameIntervalMs(): number {
    return this.intervalMs;
  }

  setFps(fps: number): void {
    this.intervalMs = 1000 / Math.max(1, fps);
  }

  setRegion(region: Region | null): void {
    this.region = region;
  }

  stats(): EngineLoopStats {
    return { ...this.counters };
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    if (!this.source) logger.warn('EngineLoop: no frame source — detection disabled, timer only');
    logger.info(`EngineLoop: started at ${Math.round(1000 / this.intervalMs)} fps`);
    const generation = ++this.generation;
    // Restarted before stop() finished: let the old tick land first
    const previous = this.currentTick;
    if (previous) {
      void previous.then(() => this.schedule(0, generation));
    } else {
      this.schedule(0, generation);
    }
  }

  /** Stop scheduling and wait for an in-flight tick to finish. */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.currentTick) await this.currentTick;
    logger.info(`EngineLoop: stopped after ${this.counters.ticks} ticks`);
  }

  /** One iteration. Returns the event the gate fired, if any. */
  async tick(): Promise<DeathEvent | null> {
    this.counters.ticks++;
    this.store.advanceClock(this.now());

    if (!this.source || !this.gate.isArmed()) return null;

    const frame = await this.grab(this.source);
    if (!frame) {
      this.counters.skippedFrames++;
      return null;
    }
    this.counters.framesEvaluated++;

    const event = await this.gate.evaluate(frame, this.now());
    if (!event) return null;

    this.counters.events++;
    this.channel.publish({
      command: { type: event.boss ? 'boss-death' : 'death' },
      origin: 'detector',
    });
    return event;
  }

  private async grab(source: FrameSource): Promise<Frame | null> {
    try {
      const region = this.region;
      return region
        ? await source.grabRegion(region.x, region.y, region.width, region.height)
        : await source.grab();
    } catch (err) {
      this.counters.captureErrors++;
      logger.warn('EngineLoop: frame capture failed:', err);
      return null;
    }
  }

  private schedule(delayMs: number, generation: number): void {
    if (!this.running || generation !== this.generation) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      if (!this.running || generation !== this.generation) return;
      const tick: Promise<void> = this.runTick(generation).finally(() => {
        if (this.currentTick === tick) this.currentTick = null;
      });
      this.currentTick = tick;
    }, delayMs);
  }

  private async runTick(generation: number): Promise<void> {
    const started = this.now();
    try {
      await this.tick();
    } catch (err) {
      logger.error('EngineLoop: tick failed:', err);
    }
    const duration = Math.max(0, this.now() - started);

    if (duration > this.intervalMs) {
      this.counters.overruns++;
      logger.debug(`EngineLoop: tick took ${duration}ms (budget ${this.intervalMs.toFixed(1)}ms)`);
    }
    this.schedule(Math.max(0, this.intervalMs - duration), generation);
  }
}
