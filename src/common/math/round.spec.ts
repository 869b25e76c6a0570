import { roundTo } from './round';

describe('roundTo', () => {
  it('rounds to two decimals by default', () => {
    expect(roundTo(6.28318)).toBe(6.28);
    expect(roundTo(1950000)).toBe(1950000);
  });

  it('rounds negative values symmetrically', () => {
    expect(roundTo(-6.28318)).toBe(-6.28);
    expect(roundTo(-6.287)).toBe(-6.29);
  });

  it('rounds exact ties to the even neighbour', () => {
    expect(roundTo(0.125)).toBe(0.12);
    expect(roundTo(0.375)).toBe(0.38);
    expect(roundTo(-0.125)).toBe(-0.12);
    expect(roundTo(2.5, 0)).toBe(2);
    expect(roundTo(3.5, 0)).toBe(4);
  });

  it('never returns negative zero', () => {
    expect(roundTo(-0.001)).toBe(0);
    expect(roundTo(0 * -5)).toBe(0);
  });

  it('supports other precisions', () => {
    expect(roundTo(97.01492537, 1)).toBe(97);
    expect(roundTo(2.98507462, 1)).toBe(3);
  });

  it('passes non-finite values through', () => {
    expect(roundTo(Infinity)).toBe(Infinity);
    expect(roundTo(NaN)).toBeNaN();
  });
});
