export type Sample = {
  timestamp: number; // epoch seconds, may be fractional
  price: number;
};

export type WindowPoint = {
  timestamp: number;
  price: number; // 0 when the instant predates all retained samples
  original: boolean; // a stored sample lies within the exact-match tolerance
};

export type WindowResult = {
  sma: number;
  sum: number;
  count: number;
  // Whether the afternoon continuation walk ran.
  continued: boolean;
  // Visited trading instants in walk order; only filled when requested.
  points: WindowPoint[];
};
