/**
 * Light matrix pictures and tone sequences for the 5x5 hub display.
 */

/** Lit pixel as [x, y], origin top left */
export type Pixel = readonly [number, number];

/** Tone as [frequency Hz, duration ms]; frequency 0 is a rest */
export type Note = readonly [number, number];

export const PATTERNS: Readonly<Record<string, readonly Pixel[]>> = {
  happy: [
    [1, 1], [3, 1],
    [0, 3], [4, 3],
    [1, 4], [2, 4], [3, 4],
  ],
  sad: [
    [1, 1], [3, 1],
    [1, 3], [2, 3], [3, 3],
    [0, 4], [4, 4],
  ],
  neutral: [
    [1, 1], [3, 1],
    [1, 3], [2, 3], [3, 3],
  ],
  angry: [
    [0, 0], [1, 1],
    [4, 0], [3, 1],
    [1, 3], [2, 3], [3, 3],
    [0, 4], [4, 4],
  ],
  surprised: [
    [1, 1], [3, 1],
    [1, 3], [2, 3], [3, 3],
    [1, 4], [3, 4],
    [2, 2],
  ],
  heart: [
    [1, 0], [3, 0],
    [0, 1], [2, 1], [4, 1],
    [0, 2], [4, 2],
    [1, 3], [3, 3],
    [2, 4],
  ],
  check: [
    [4, 0],
    [3, 1],
    [2, 2],
    [1, 3], [0, 2],
  ],
  x: [
    [0, 0], [4, 0],
    [1, 1], [3, 1],
    [2, 2],
    [1, 3], [3, 3],
    [0, 4], [4, 4],
  ],
};

export const MELODIES: Readonly<Record<string, readonly Note[]>> = {
  happy: [[523, 150], [659, 150], [784, 300]],
  sad: [[392, 300], [349, 300], [330, 400]],
  alert: [[880, 100], [0, 50], [880, 100]],
  success: [[523, 150], [659, 150], [784, 150], [1047, 300]],
  error: [[200, 300], [150, 300]],
  startup: [[262, 100], [330, 100], [392, 100], [523, 200]],
};

export function isPattern(name: string): boolean {
  return Object.prototype.hasOwnProperty.call(PATTERNS, name);
}
