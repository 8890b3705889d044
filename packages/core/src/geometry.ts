/**
 * Along-line geometry from projected (x, y) trace positions.
 */

/**
 * Cumulative Euclidean distance from the first trace.
 * Coincident neighbours contribute a zero-length segment.
 */
export function cumulativeDistance(x: ArrayLike<number>, y: ArrayLike<number>): Float64Array {
  if (x.length !== y.length) {
    throw new RangeError(`X count (${x.length}) does not match Y count (${y.length}).`);
  }
  const distances = new Float64Array(x.length);
  for (let i = 1; i < x.length; i++) {
    distances[i] = distances[i - 1] + Math.hypot(x[i] - x[i - 1], y[i] - y[i - 1]);
  }
  return distances;
}

/** Total line length (last cumulative distance), 0 for an empty line. */
export function lineLength(distance: ArrayLike<number>): number {
  return distance.length > 0 ? distance[distance.length - 1] : 0;
}
