import { residualSigma } from './residuals';

describe('residualSigma', () => {
  it('should use the population standard deviation', () => {
    // residuals 0, 2, 4 -> mean 2, variance 8/3
    const sigma = residualSigma([
      { actual: 10, estimated: 10 },
      { actual: 12, estimated: 10 },
      { actual: 14, estimated: 10 },
    ]);

    expect(sigma).toBeCloseTo(Math.sqrt(8 / 3), 10);
  });

  it('should be zero for a constant bias', () => {
    const sigma = residualSigma([
      { actual: 105, estimated: 100 },
      { actual: 95, estimated: 90 },
    ]);

    expect(sigma).toBe(0);
  });

  it('should be zero for a single pair', () => {
    expect(residualSigma([{ actual: 120, estimated: 100 }])).toBe(0);
  });

  it('should be zero for no pairs', () => {
    expect(residualSigma([])).toBe(0);
  });
});
