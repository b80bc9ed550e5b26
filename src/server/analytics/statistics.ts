export function mean(values: number[]): number {
  return values.length ? values.reduce((sum, value) => sum + value, 0) / values.length : 0;
}

/** Sample standard deviation (n - 1). Zero for fewer than two values. */
export function sampleStd(values: number[]): number {
  if (values.length < 2) {
    return 0;
  }
  const average = mean(values);
  const squared = values.reduce((sum, value) => sum + (value - average) ** 2, 0);
  return Math.sqrt(squared / (values.length - 1));
}

export function coefficientOfVariation(values: number[]): number {
  const average = mean(values);
  return average === 0 ? 0 : sampleStd(values) / average;
}

/** Pearson r. NaN when either series is constant or shorter than two points. */
export function pearson(xs: number[], ys: number[]): number {
  const length = Math.min(xs.length, ys.length);
  if (length < 2) {
    return Number.NaN;
  }

  const left = xs.slice(0, length);
  const right = ys.slice(0, length);
  const leftMean = mean(left);
  const rightMean = mean(right);

  let covariance = 0;
  let leftSquares = 0;
  let rightSquares = 0;
  for (let index = 0; index < length; index += 1) {
    const dx = (left[index] ?? 0) - leftMean;
    const dy = (right[index] ?? 0) - rightMean;
    covariance += dx * dy;
    leftSquares += dx * dx;
    rightSquares += dy * dy;
  }

  if (leftSquares === 0 || rightSquares === 0) {
    return Number.NaN;
  }
  return covariance / Math.sqrt(leftSquares * rightSquares);
}

/** Quantile with linear interpolation between closest ranks. */
export function quantile(values: number[], q: number): number {
  if (!values.length) {
    return 0;
  }
  const sorted = [...values].sort((left, right) => left - right);
  const position = (sorted.length - 1) * q;
  const lowerIndex = Math.floor(position);
  const lower = sorted[lowerIndex] ?? 0;
  const upper = sorted[Math.min(lowerIndex + 1, sorted.length - 1)] ?? lower;
  return lower + (upper - lower) * (position - lowerIndex);
}
