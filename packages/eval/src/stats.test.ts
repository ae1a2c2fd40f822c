import { mean, percentile, rate, summarizeLatencies } from './stats';

describe('stats', () => {
  it('computes nearest-rank percentiles', () => {
    const sorted = [10, 20, 30, 40, 50, 60, 70, 80, 90, 100];
    expect(percentile(sorted, 50)).toBe(50);
    expect(percentile(sorted, 90)).toBe(90);
    expect(percentile(sorted, 99)).toBe(100);
    expect(percentile(sorted, 0)).toBe(10);
  });

  it('returns zeros for empty input', () => {
    expect(percentile([], 50)).toBe(0);
    expect(mean([])).toBe(0);
    expect(rate(3, 0)).toBe(0);
    expect(summarizeLatencies([])).toEqual({ count: 0, mean: 0, p50: 0, p90: 0, p99: 0 });
  });

  it('summarizes unsorted samples', () => {
    expect(summarizeLatencies([300, 100, 200])).toEqual({
      count: 3,
      mean: 200,
      p50: 200,
      p90: 300,
      p99: 300,
    });
  });
});
