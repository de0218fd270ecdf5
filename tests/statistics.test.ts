import { calculateMean } from '../src/utils/statistics';

describe('Statistics', () => {
  describe('calculateMean', () => {
    test('should calculate mean correctly', () => {
      expect(calculateMean([1, 2, 3, 4, 5])).toBe(3);
      expect(calculateMean([10, 20, 30])).toBe(20);
    });

    test('should return the value itself for a single entry', () => {
      expect(calculateMean([1.06])).toBe(1.06);
    });

    test('should return 0 for empty array', () => {
      expect(calculateMean([])).toBe(0);
    });
  });
});
