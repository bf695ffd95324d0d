import { DEFAULT_BINARIZATION_THRESHOLD, GRAYSCALE_LEVELS } from '../constants/ocr.constants';

/**
 * Counts intensities of the first channel of interleaved raw pixel data.
 */
export function buildGrayHistogram(pixels: Uint8Array, channels: number): number[] {
  const histogram = new Array<number>(GRAYSCALE_LEVELS).fill(0);
  const step = Math.max(1, channels);
  for (let i = 0; i < pixels.length; i += step) {
    histogram[pixels[i]] += 1;
  }
  return histogram;
}

/**
 * Otsu's method: picks the split that maximises between-class variance.
 * Returns the lowest intensity of the bright class, i.e. the value to pass to
 * an "x >= threshold is white" binarizer. Histograms with fewer than two
 * populated intensities have no split and get the default threshold.
 */
export function otsuThreshold(histogram: readonly number[]): number {
  let total = 0;
  let weightedTotal = 0;
  histogram.forEach((count, level) => {
    total += count;
    weightedTotal += count * level;
  });
  if (total === 0) {
    return DEFAULT_BINARIZATION_THRESHOLD;
  }

  let backgroundWeight = 0;
  let backgroundSum = 0;
  let bestVariance = 0;
  let bestLevel = -1;

  for (let level = 0; level < histogram.length - 1; level++) {
    backgroundWeight += histogram[level];
    backgroundSum += histogram[level] * level;
    const foregroundWeight = total - backgroundWeight;
    if (backgroundWeight === 0) {
      continue;
    }
    if (foregroundWeight === 0) {
      break;
    }
    const backgroundMean = backgroundSum / backgroundWeight;
    const foregroundMean = (weightedTotal - backgroundSum) / foregroundWeight;
    const variance = backgroundWeight * foregroundWeight * (backgroundMean - foregroundMean) ** 2;
    if (variance > bestVariance) {
      bestVariance = variance;
      bestLevel = level;
    }
  }

  return bestLevel < 0 ? DEFAULT_BINARIZATION_THRESHOLD : bestLevel + 1;
}
