import { mean, variance, timingCorrelationRatio, meanObservationDelay } from '../src/timing'

describe('timing', () => {
  it('mean and population variance', () => {
    expect(mean([])).toBe(0)
    expect(mean([1, 2, 3, 4])).toBe(2.5)
    expect(variance([1, 2, 3, 4])).toBeCloseTo(1.25)
    expect(variance([])).toBe(0)
  })

  it('timingCorrelationRatio compares batched spread against direct spread', () => {
    // direct var = 125, batched var = 2500
    expect(timingCorrelationRatio([0, 10, 20, 30], [0, 0, 100, 100])).toBeCloseTo(20)
  })

  it('timingCorrelationRatio is 1 when the direct sample has no variance', () => {
    expect(timingCorrelationRatio([5, 5], [0, 100])).toBe(1)
  })

  it('meanObservationDelay averages paired delays', () => {
    expect(meanObservationDelay([0, 10], [100, 100])).toBe(95)
    expect(meanObservationDelay([], [])).toBe(0)
  })
})
