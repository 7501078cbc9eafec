import type { Frame } from '../types/index.js';

/**
 * Pixel-capture backend. Implementations resolve to null when no frame is
 * available (window minimised, capture denied, transient failure) and must
 * not throw for those cases.
 */
export interface FrameSource {
  grab(): Promise<Frame | null>;
  grabRegion(x: number, y: number, width: number, height: number): Promise<Frame | null>;
}
