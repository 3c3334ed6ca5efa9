import { describe, it, expect } from 'vitest';
import { addJitter, assertJitterAmount, createSeededRandom } from '../jitter';
import { ReportConfigError } from '../errorUtils';

describe('addJitter', () => {
  it('should return an unchanged copy when the amount is 0', () => {
    const values = [1, 2, 3];
    const result = addJitter(values, 0);
    expect(result).toEqual([1, 2, 3]);
    expect(result).not.toBe(values);
  });

  it('should not move values when every draw is the midpoint', () => {
    expect(addJitter([2, 4], 0.1, () => 0.5)).toEqual([2, 4]);
  });

  it('should offset by -amount/2 for a draw of 0', () => {
    const [value] = addJitter([3], 0.2, () => 0);
    expect(value).toBeCloseTo(2.9);
  });

  it('should keep every offset within half the amount', () => {
    const values = Array.from({ length: 200 }, (_, i) => (i % 5) + 1);
    const jittered = addJitter(values, 0.1, createSeededRandom(7));
    jittered.forEach((value, index) => {
      expect(Math.abs(value - values[index])).toBeLessThanOrEqual(0.05);
    });
  });

  it('should preserve order and length', () => {
    const result = addJitter([1, 5, 3], 0.1, createSeededRandom(1));
    expect(result).toHaveLength(3);
    expect(Math.round(result[0])).toBe(1);
    expect(Math.round(result[1])).toBe(5);
    expect(Math.round(result[2])).toBe(3);
  });

  it('should not mutate the input', () => {
    const values = [1, 2];
    addJitter(values, 0.5, () => 0.9);
    expect(values).toEqual([1, 2]);
  });

  it('should draw once per value', () => {
    let draws = 0;
    addJitter([1, 2, 3, 4], 0.1, () => {
      draws++;
      return 0.5;
    });
    expect(draws).toBe(4);
  });

  it('should reject negative and non-finite amounts', () => {
    expect(() => addJitter([1], -0.1)).toThrow(ReportConfigError);
    expect(() => addJitter([1], Number.NaN)).toThrow(ReportConfigError);
    expect(() => assertJitterAmount(Number.POSITIVE_INFINITY)).toThrow(
      'Jitter amount must be a finite number >= 0, got Infinity'
    );
  });
});

describe('createSeededRandom', () => {
  it('should repeat the same sequence for the same seed', () => {
    const a = createSeededRandom(42);
    const b = createSeededRandom(42);
    const first = [a(), a(), a()];
    expect([b(), b(), b()]).toEqual(first);
  });

  it('should produce different sequences for different seeds', () => {
    expect(createSeededRandom(1)()).not.toBe(createSeededRandom(2)());
  });

  it('should stay within [0, 1)', () => {
    const random = createSeededRandom(99);
    for (let i = 0; i < 500; i++) {
      const value = random();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });
});
