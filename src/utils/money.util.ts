// Half-up rounding on the decimal text of a number

/**
 * Rounds half away from zero at the given number of decimals.
 * Shifts through the exponent of the decimal representation so that
 * 100.005 rounds to 100.01 instead of falling to the binary value below it.
 */
export function roundHalfUp(value: number, decimals = 2): number {
  if (!Number.isFinite(value)) {
    throw new RangeError(`Cannot round non-finite amount ${value}`);
  }

  const sign = value < 0 ? -1 : 1;
  const shifted = Math.round(shiftExponent(Math.abs(value), decimals));
  const result = sign * shiftExponent(shifted, -decimals);

  // Avoid -0 in serialized output
  return result === 0 ? 0 : result;
}

function shiftExponent(value: number, places: number): number {
  const [mantissa, exponent = '0'] = value.toString().split('e');
  return Number(`${mantissa}e${Number(exponent) + places}`);
}

export function sumRounded(amounts: number[], decimals = 2): number {
  const total = amounts.reduce((sum, amount) => sum + roundHalfUp(amount, decimals), 0);
  return roundHalfUp(total, decimals);
}
