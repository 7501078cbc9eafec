/**
 * Fixed-template matcher: zero-mean normalized cross-correlation between the
 * intensity plane of a frame and one reference template. When the frame is
 * larger than the template the template slides over it and the best window
 * wins. Scores lie in [-1, 1]; identical inputs always score identically.
 *
 * Synchronous and CPU-bound; the service calls it through WorkerMatcher.
 */

import { logger } from '../logger.js';
import type { Frame, MatchResult, ReferenceTemplate } from '../types/index.js';
import { downscale, isWellFormed, toGray, type GrayImage } from './grayscale.js';

export const DEFAULT_THRESHOLD = 0.75;
export const THRESHOLD_RANGE = { min: 0.5, max: 0.95 } as const;

export function clampThreshold(value: number): number {
  if (!Number.isFinite(value)) return DEFAULT_THRESHOLD;
  return Math.min(THRESHOLD_RANGE.max, Math.max(THRESHOLD_RANGE.min, value));
}

/** Frames are reduced until their short side is at most this many pixels. */
export const MATCH_SHORT_SIDE = 180;
/** Auto-reduction never shrinks the template's short side below this. */
const MIN_TEMPLATE_SIDE = 8;
/** Searches up to this many multiply-adds run exhaustively. */
const EXHAUSTIVE_BUDGET = 2_000_000;
const MAX_COARSE_FACTOR = 4;
const COARSE_CANDIDATES = 5;

interface PreparedTemplate {
  width: number;
  height: number;
  /** Template intensities minus their mean. */
  centered: Float64Array;
  /** Sum of squared centered values. */
  energy: number;
  /** Box-averaged copy searched first on large frames. */
  coarse: { factor: number; template: PreparedTemplate } | null;
}

/** Everything isMatch reads, swapped as one reference by reload(). */
interface MatcherSnapshot {
  readonly template: ReferenceTemplate | null;
  /** Template at full size; null when missing or flat. */
  readonly prepared: PreparedTemplate | null;
  /** Prepared copies keyed by effective scale. */
  readonly scaled: Map<number, PreparedTemplate | null>;
  readonly threshold: number;
}

export interface MatcherOptions {
  template?: ReferenceTemplate | null;
  threshold?: number;
  /** Downsample factor in (0, 1] applied to frame and template before matching. */
  scale?: number;
}

export interface ProbeResult {
  score: number;
  threshold: number;
  matched: boolean;
}

interface IntegralImages {
  sum: Float64Array;
  sq: Float64Array;
  stride: number;
}

interface Candidate {
  x: number;
  y: number;
  score: number;
}

function isUsableTemplate(template: ReferenceTemplate | null | undefined): template is ReferenceTemplate {
  if (!template) return false;
  const { width, height, gray } = template;
  return width > 0 && height > 0 && gray.length === width * height;
}

function center(image: GrayImage): PreparedTemplate | null {
  const n = image.width * image.height;
  let sum = 0;
  for (let i = 0; i < n; i++) sum += image.data[i];
  const mean = sum / n;

  const centered = new Float64Array(n);
  let energy = 0;
  for (let i = 0; i < n; i++) {
    const v = image.data[i] - mean;
    centered[i] = v;
    energy += v * v;
  }
  // A flat template correlates with nothing
  if (energy === 0) return null;
  return { width: image.width, height: image.height, centered, energy, coarse: null };
}

function prepare(template: ReferenceTemplate, scale: number): PreparedTemplate | null {
  const image = downscale({ width: template.width, height: template.height, data: template.gray }, scale);
  const prepared = center(image);
  if (!prepared) return null;

  const factor = Math.min(MAX_COARSE_FACTOR, Math.floor(Math.min(image.width, image.height) / 4));
  if (factor >= 2) {
    const coarse = center(boxDownscale(image, factor));
    if (coarse) prepared.coarse = { factor, template: coarse };
  }
  return prepared;
}

/** Mean of each factor x factor block; trailing partial blocks are dropped. */
function boxDownscale(image: GrayImage, factor: number): GrayImage {
  const width = Math.floor(image.width / factor);
  const height = Math.floor(image.height / factor);
  const out = new Uint8Array(width * height);
  const area = factor * factor;
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      let total = 0;
      for (let dy = 0; dy < factor; dy++) {
        const row = (y * factor + dy) * image.width + x * factor;
        for (let dx = 0; dx < factor; dx++) total += image.data[row + dx];
      }
      out[y * width + x] = Math.round(total / area);
    }
  }
  return { width, height, data: out };
}

/** Summed-area tables for window sums of values and squared values. */
function integralImages(image: GrayImage): IntegralImages {
  const stride = image.width + 1;
  const sum = new Float64Array(stride * (image.height + 1));
  const sq = new Float64Array(stride * (image.height + 1));
  for (let y = 0; y < image.height; y++) {
    let rowSum = 0;
    let rowSq = 0;
    for (let x = 0; x < image.width; x++) {
      const v = image.data[y * image.width + x];
      rowSum += v;
      rowSq += v * v;
      const idx = (y + 1) * stride + (x + 1);
      sum[idx] = sum[idx - stride] + rowSum;
      sq[idx] = sq[idx - stride] + rowSq;
    }
  }
  return { sum, sq, stride };
}

function scoreAt(image: GrayImage, table: IntegralImages, tpl: PreparedTemplate, ox: number, oy: number): number {
  const { sum, sq, stride } = table;
  const n = tpl.width * tpl.height;
  const a = oy * stride + ox;
  const b = oy * stride + ox + tpl.width;
  const c = (oy + tpl.height) * stride + ox;
  const d = (oy + tpl.height) * stride + ox + tpl.width;
  const windowSum = sum[d] - sum[b] - sum[c] + sum[a];
  const windowSq = sq[d] - sq[b] - sq[c] + sq[a];
  const variance = windowSq - (windowSum * windowSum) / n;
  if (variance <= 1e-9) return 0;

  // The template is zero-mean, so the window mean drops out of the numerator.
  let cross = 0;
  for (let ty = 0; ty < tpl.height; ty++) {
    const rowStart = (oy + ty) * image.width + ox;
    const tplRow = ty * tpl.width;
    for (let tx = 0; tx < tpl.width; tx++) {
      cross += image.data[rowStart + tx] * tpl.centered[tplRow + tx];
    }
  }
  return cross / Math.sqrt(variance * tpl.energy);
}

/** Best score over offsets [x0, x1] x [y0, y1], inclusive. */
function bestInRange(
  image: GrayImage,
  table: IntegralImages,
  tpl: PreparedTemplate,
  x0: number,
  y0: number,
  x1: number,
  y1: number,
): number {
  let best = -Infinity;
  for (let oy = y0; oy <= y1; oy++) {
    for (let ox = x0; ox <= x1; ox++) {
      const score = scoreAt(image, table, tpl, ox, oy);
      if (score > best) best = score;
    }
  }
  return best;
}

function topCandidates(image: GrayImage, tpl: PreparedTemplate, count: number): Candidate[] {
  const table = integralImages(image);
  const top: Candidate[] = [];
  for (let oy = 0; oy + tpl.height <= image.height; oy++) {
    for (let ox = 0; ox + tpl.width <= image.width; ox++) {
      const score = scoreAt(image, table, tpl, ox, oy);
      if (top.length === count && score <= top[count - 1].score) continue;
      let i = top.length;
      while (i > 0 && top[i - 1].score < score) i--;
      top.splice(i, 0, { x: ox, y: oy, score });
      if (top.length > count) top.pop();
    }
  }
  return top;
}

/**
 * Best ZNCC of the template over every offset in the image. Large searches
 * rank offsets on box-averaged copies first, then rescore the neighbourhood
 * of the best few at full resolution.
 */
function correlate(image: GrayImage, tpl: PreparedTemplate): number {
  if (tpl.width > image.width || tpl.height > image.height) return 0;

  const table = integralImages(image);
  const maxX = image.width - tpl.width;
  const maxY = image.height - tpl.height;
  const cost = (maxX + 1) * (maxY + 1) * tpl.width * tpl.height;

  let best: number;
  const coarse = tpl.coarse;
  const small = coarse && cost > EXHAUSTIVE_BUDGET ? boxDownscale(image, coarse.factor) : null;
  if (coarse && small && coarse.template.width <= small.width && coarse.template.height <= small.height) {
    const { factor } = coarse;
    best = -Infinity;
    for (const candidate of topCandidates(small, coarse.template, COARSE_CANDIDATES)) {
      const x = candidate.x * factor;
      const y = candidate.y * factor;
      const score = bestInRange(
        image,
        table,
        tpl,
        Math.max(0, x - factor),
        Math.max(0, y - factor),
        Math.min(maxX, x + factor),
        Math.min(maxY, y + factor),
      );
      if (score > best) best = score;
    }
  } else {
    best = bestInRange(image, table, tpl, 0, 0, maxX, maxY);
  }

  if (!Number.isFinite(best)) return 0;
  return Math.min(1, Math.max(-1, best));
}

export class Matcher {
  private current: MatcherSnapshot;
  private readonly scale: number;

  constructor(options: MatcherOptions = {}) {
    const scale = options.scale ?? 1;
    this.scale = scale > 0 && scale <= 1 ? scale : 1;
    this.current = this.buildSnapshot(options.template ?? null, options.threshold ?? DEFAULT_THRESHOLD);
  }

  get threshold(): number {
    return this.current.threshold;
  }

  get template(): ReferenceTemplate | null {
    return this.current.template;
  }

  /**
   * Replace template and threshold together. Callers holding the previous
   * snapshot finish against it; the next isMatch sees the new pair.
   */
  reload(template: ReferenceTemplate | null, threshold: number = this.current.threshold): void {
    this.current = this.buildSnapshot(template, threshold);
    logger.info(
      `Matcher: loaded template ${template ? `"${template.source}" (${template.width}x${template.height})` : '(none)'}` +
      ` threshold=${this.current.threshold}`,
    );
  }

  /** Similarity of a frame against a template, in [-1, 1]. Malformed input scores 0. */
  score(frame: Frame | null, template: ReferenceTemplate | null): number {
    if (!isWellFormed(frame) || !isUsableTemplate(template)) return 0;
    const snap = this.current;
    const scale = this.effectiveScale(frame, template);
    const prepared = template === snap.template ? this.cached(snap, scale) : prepare(template, scale);
    if (!prepared) return 0;
    return correlate(downscale(toGray(frame), scale), prepared);
  }

  isMatch(frame: Frame | null): MatchResult {
    const snap = this.current;
    if (!snap.template || !snap.prepared || !isWellFormed(frame)) {
      return { matched: false, confidence: 0 };
    }
    const confidence = this.score(frame, snap.template);
    return { matched: confidence >= snap.threshold, confidence };
  }

  /** Calibration helper: raw score and decision, no side effects. */
  probe(frame: Frame | null): ProbeResult {
    const snap = this.current;
    const score = this.score(frame, snap.template);
    return { score, threshold: snap.threshold, matched: snap.template !== null && score >= snap.threshold };
  }

  /**
   * The configured scale, lowered further so the frame's short side fits
   * MATCH_SHORT_SIDE while the template keeps MIN_TEMPLATE_SIDE pixels.
   */
  private effectiveScale(frame: Frame, template: ReferenceTemplate): number {
    const fit = MATCH_SHORT_SIDE / Math.min(frame.width, frame.height);
    const floor = MIN_TEMPLATE_SIDE / Math.min(template.width, template.height);
    const scale = Math.min(this.scale, Math.max(fit, floor));
    return scale >= 1 ? 1 : scale;
  }

  private cached(snap: MatcherSnapshot, scale: number): PreparedTemplate | null {
    if (scale === 1) return snap.prepared;
    const hit = snap.scaled.get(scale);
    if (hit !== undefined) return hit;
    if (!snap.template) return null;
    const prepared = prepare(snap.template, scale);
    snap.scaled.set(scale, prepared);
    return prepared;
  }

  private buildSnapshot(template: ReferenceTemplate | null, threshold: number): MatcherSnapshot {
    const usable = isUsableTemplate(template) ? template : null;
    if (template && !usable) {
      logger.warn(`Matcher: template "${template.source}" has inconsistent dimensions — ignoring it`);
    }
    return Object.freeze({
      template: usable,
      prepared: usable ? prepare(usable, 1) : null,
      scaled: new Map<number, PreparedTemplate | null>(),
      threshold: clampThreshold(threshold),
    });
  }
}
