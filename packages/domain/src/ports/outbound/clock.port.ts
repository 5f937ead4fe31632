export interface ClockPort {
  now(): Date;
}

export interface RandomSourcePort {
  /** Float in [0, 1). */
  next(): number;
}
