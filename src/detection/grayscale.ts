import type { Frame } from '../types/index.js';

/** Plane of 8-bit intensities, row-major. */
export interface GrayImage {
  width: number;
  height: number;
  data: Uint8Array;
}

export function isWellFormed(frame: Frame | null | undefined): frame is Frame {
  if (!frame) return false;
  const { width, height, channels, data } = frame;
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    return false;
  }
  return data.length === width * height * channels;
}

/**
 * Reduce a frame to one intensity channel (ITU-R BT.601 luma for colour
 * input; alpha is ignored). Single-channel frames are returned as-is.
 */
export function toGray(frame: Frame): GrayImage {
  const { width, height, channels, data } = frame;
  if (channels === 1) return { width, height, data };

  const out = new Uint8Array(width * height);
  for (let i = 0, p = 0; i < out.length; i++, p += channels) {
    if (channels === 2) {
      out[i] = data[p];
    } else {
      out[i] = Math.round(0.299 * data[p] + 0.587 * data[p + 1] + 0.114 * data[p + 2]);
    }
  }
  return { width, height, data: out };
}

export const calculateDownscaleDimensions = (width: number, height: number, scale: number) => {
  if (width === 0 || height === 0) {
    throw new Error('Cannot downscale image with zero dimension');
  }
  if (scale >= 1) {
    return { width, height, downscaled: false };
  }
  return {
    width: Math.max(1, Math.round(width * scale)),
    height: Math.max(1, Math.round(height * scale)),
    downscaled: true,
  };
};

/** Nearest-neighbour resample by a factor in (0, 1]. */
export function downscale(image: GrayImage, scale: number): GrayImage {
  const dims = calculateDownscaleDimensions(image.width, image.height, scale);
  if (!dims.downscaled) return image;

  const out = new Uint8Array(dims.width * dims.height);
  const xRatio = image.width / dims.width;
  const yRatio = image.height / dims.height;
  for (let y = 0; y < dims.height; y++) {
    const srcRow = Math.min(image.height - 1, Math.floor(y * yRatio)) * image.width;
    for (let x = 0; x < dims.width; x++) {
      out[y * dims.width + x] = image.data[srcRow + Math.min(image.width - 1, Math.floor(x * xRatio))];
    }
  }
  return { width: dims.width, height: dims.height, data: out };
}
