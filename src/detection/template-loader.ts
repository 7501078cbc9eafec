import sharp from 'sharp';
import { logger } from '../logger.js';
import type { ReferenceTemplate } from '../types/index.js';
import { toGray } from './grayscale.js';

/**
 * Decode an image file into a single-channel reference template.
 * Throws if the file cannot be read or decoded; callers decide whether
 * running without a template is acceptable.
 */
export async function loadTemplate(path: string): Promise<ReferenceTemplate> {
  const { data, info } = await sharp(path)
    .removeAlpha()
    .greyscale()
    .raw()
    .toBuffer({ resolveWithObject: true });

  const gray = toGray({
    width: info.width,
    height: info.height,
    channels: info.channels,
    data: new Uint8Array(data.buffer, data.byteOffset, data.byteLength),
  });

  logger.debug(`Template loader: decoded "${path}" → ${gray.width}x${gray.height}`);
  return Object.freeze({
    width: gray.width,
    height: gray.height,
    gray: gray.data,
    source: path,
  });
}
