import Big from 'big.js';

export type StepRounding = 'down' | 'up';

/**
 * Aligns a value on a multiple of `step` using decimal arithmetic,
 * so a value already on the grid comes back unchanged.
 */
export const roundToStep = (value: number, step: number, option: StepRounding = 'down'): number => {
  if (step <= 0) return value;
  const roundingMode = option === 'down' ? Big.roundDown : Big.roundUp;
  return +Big(value).div(step).round(0, roundingMode).times(step);
};

export const isStepAligned = (value: number, step: number) => roundToStep(value, step) === value;
