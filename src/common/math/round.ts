/**
 * Round to `digits` decimals, ties to even (0.125 -> 0.12, 0.375 -> 0.38).
 * Never returns -0. Non-finite values pass through.
 */
export function roundTo(value: number, digits = 2): number {
  if (!Number.isFinite(value)) return value;

  const factor = 10 ** digits;
  const scaled = value * factor;
  const floor = Math.floor(scaled);
  const diff = scaled - floor;

  let whole: number;
  if (diff > 0.5) whole = floor + 1;
  else if (diff < 0.5) whole = floor;
  else whole = floor % 2 === 0 ? floor : floor + 1;

  const rounded = whole / factor;
  return rounded === 0 ? 0 : rounded;
}
