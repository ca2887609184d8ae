export const MIN_BOARD_SIZE = 6;
export const MAX_BOARD_SIZE = 12;

export const RUNNER_MAX_DISTANCE = 3;

export const LEAPER_OFFSETS: ReadonlyArray<readonly [number, number]> = [
  [1, 2],
  [1, -2],
  [-1, 2],
  [-1, -2],
  [2, 1],
  [2, -1],
  [-2, 1],
  [-2, -1]
];
