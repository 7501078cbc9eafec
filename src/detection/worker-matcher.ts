import { extname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { Worker } from 'node:worker_threads';
import { logger } from '../logger.js';
import type { Frame, MatchResult, ReferenceTemplate } from '../types/index.js';
import type { FrameMatcher } from './event-gate.js';
import { isWellFormed } from './grayscale.js';
import { DEFAULT_THRESHOLD, clampThreshold } from './matcher.js';
import { matchResponseSchema, type MatchRequest } from './match-protocol.js';

const NO_MATCH: MatchResult = Object.freeze({ matched: false, confidence: 0 });

/** The engine side of the channel to a matcher thread. */
export interface MatchPort {
  post(request: MatchRequest, transfer: ArrayBuffer[]): void;
  onMessage(listener: (message: unknown) => void): void;
  /** Called when the thread errors or exits. */
  onFailure(listener: (err: Error) => void): void;
  close(): Promise<void>;
}

export interface WorkerMatcherOptions {
  template?: ReferenceTemplate | null;
  threshold?: number;
  scale?: number;
  /** Opens a channel to a matcher thread. Defaults to spawning match-worker. */
  connect?: (scale: number) => MatchPort;
}

/** Spawn match-worker next to this module; under tsx the .ts entry is loaded through tsx. */
export function spawnMatchWorker(scale: number): MatchPort {
  const ext = extname(fileURLToPath(import.meta.url));
  const entry = new URL(`./match-worker${ext}`, import.meta.url);
  const worker = new Worker(entry, {
    workerData: { scale },
    execArgv: ext === '.ts' ? ['--import', 'tsx'] : undefined,
  });

  return {
    post: (request, transfer) => worker.postMessage(request, transfer),
    onMessage: (listener) => {
      worker.on('message', (message: unknown) => listener(message));
    },
    onFailure: (listener) => {
      worker.on('error', listener);
      worker.on('exit', (code) => listener(new Error(`match worker exited with code ${code}`)));
    },
    close: async () => {
      await worker.terminate();
    },
  };
}

/** Give the worker a buffer it can own; views into shared or larger buffers are copied. */
function transferable(data: Uint8Array): { data: Uint8Array; buffer: ArrayBuffer } {
  const { buffer } = data;
  if (buffer instanceof ArrayBuffer && data.byteOffset === 0 && data.byteLength === buffer.byteLength) {
    return { data, buffer };
  }
  const copy = new ArrayBuffer(data.byteLength);
  const view = new Uint8Array(copy);
  view.set(data);
  return { data: view, buffer: copy };
}

/**
 * Matcher that scores frames on a worker thread so the event loop keeps
 * serving hotkeys and the sync socket while a frame is searched. Frames are
 * transferred: once isMatch is called the caller must not touch frame.data.
 *
 * The thread is started on first use. If it dies, outstanding requests
 * resolve as no-match and the next frame starts a fresh one.
 */
export class WorkerMatcher implements FrameMatcher {
  private port: MatchPort | null = null;
  private nextId = 0;
  private readonly pending = new Map<number, (result: MatchResult) => void>();
  private currentTemplate: ReferenceTemplate | null;
  private currentThreshold: number;
  private readonly scale: number;
  private readonly connect: (scale: number) => MatchPort;
  private closed = false;

  constructor(options: WorkerMatcherOptions = {}) {
    const scale = options.scale ?? 1;
    this.scale = scale > 0 && scale <= 1 ? scale : 1;
    this.currentTemplate = options.template ?? null;
    this.currentThreshold = clampThreshold(options.threshold ?? DEFAULT_THRESHOLD);
    this.connect = options.connect ?? spawnMatchWorker;
  }

  get threshold(): number {
    return this.currentThreshold;
  }

  get template(): ReferenceTemplate | null {
    return this.currentTemplate;
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  reload(template: ReferenceTemplate | null, threshold: number = this.currentThreshold): void {
    this.currentTemplate = template;
    this.currentThreshold = clampThreshold(threshold);
    this.port?.post(this.reloadRequest(), []);
  }

  isMatch(frame: Frame | null): Promise<MatchResult> {
    if (this.closed || !this.currentTemplate || !isWellFormed(frame)) return Promise.resolve(NO_MATCH);

    const port = this.ensurePort();
    const id = ++this.nextId;
    const { data, buffer } = transferable(frame.data);

    return new Promise<MatchResult>((resolve) => {
      this.pending.set(id, resolve);
      try {
        port.post(
          { type: 'match', id, frame: { width: frame.width, height: frame.height, channels: frame.channels, data } },
          [buffer],
        );
      } catch (err) {
        this.handleFailure(port, err instanceof Error ? err : new Error(String(err)));
      }
    });
  }

  /** Stop the thread. Outstanding requests resolve as no-match. */
  async close(): Promise<void> {
    this.closed = true;
    const port = this.port;
    this.port = null;
    this.settlePending();
    if (port) await port.close();
  }

  private ensurePort(): MatchPort {
    if (this.port) return this.port;

    const port = this.connect(this.scale);
    port.onMessage((message) => this.handleMessage(port, message));
    port.onFailure((err) => this.handleFailure(port, err));
    port.post(this.reloadRequest(), []);
    this.port = port;
    logger.info('WorkerMatcher: match worker started');
    return port;
  }

  private reloadRequest(): MatchRequest {
    return { type: 'reload', template: this.currentTemplate, threshold: this.currentThreshold };
  }

  private handleMessage(port: MatchPort, message: unknown): void {
    if (port !== this.port) return;
    const parsed = matchResponseSchema.safeParse(message);
    if (!parsed.success) {
      logger.warn('WorkerMatcher: discarding malformed reply');
      return;
    }
    const { id, matched, confidence } = parsed.data;
    const resolve = this.pending.get(id);
    if (!resolve) return;
    this.pending.delete(id);
    resolve({ matched, confidence });
  }

  private handleFailure(port: MatchPort, err: Error): void {
    if (port !== this.port) return;
    logger.error('WorkerMatcher: match worker failed — restarting on next frame:', err);
    this.port = null;
    this.settlePending();
    port.close().catch((closeErr: unknown) => {
      logger.warn('WorkerMatcher: error stopping failed worker:', closeErr);
    });
  }

  private settlePending(): void {
    const waiting = [...this.pending.values()];
    this.pending.clear();
    for (const resolve of waiting) resolve(NO_MATCH);
  }
}
