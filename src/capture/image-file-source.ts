import sharp from 'sharp';
import { logger } from '../logger.js';
import type { Frame } from '../types/index.js';
import type { FrameSource } from './frame-source.js';

/**
 * Frame source that decodes a still image on every grab. An external
 * capture tool keeps overwriting the file; this side only reads it.
 */
export class ImageFileFrameSource implements FrameSource {
  private failures = 0;

  constructor(private readonly path: string) {}

  grab(): Promise<Frame | null> {
    return this.decode(sharp(this.path));
  }

  grabRegion(x: number, y: number, width: number, height: number): Promise<Frame | null> {
    if (width <= 0 || height <= 0) return Promise.resolve(null);
    return this.decode(sharp(this.path).extract({ left: x, top: y, width, height }));
  }

  private async decode(pipeline: sharp.Sharp): Promise<Frame | null> {
    try {
      const { data, info } = await pipeline.removeAlpha().raw().toBuffer({ resolveWithObject: true });
      if (this.failures > 0) {
        logger.info(`ImageFileFrameSource: "${this.path}" readable again after ${this.failures} failure(s)`);
        this.failures = 0;
      }
      return {
        width: info.width,
        height: info.height,
        channels: info.channels,
        data: new Uint8Array(data.buffer, data.byteOffset, data.byteLength),
      };
    } catch (err) {
      // Log the first failure of a streak only; the file is rewritten constantly.
      if (this.failures === 0) {
        logger.warn(`ImageFileFrameSource: cannot read "${this.path}":`, err);
      }
      this.failures++;
      return null;
    }
  }
}
