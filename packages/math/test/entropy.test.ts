import { shannonEntropy, positionEntropy, maxPositionEntropy } from '../src/entropy'

describe('entropy', () => {
  it('shannonEntropy of uniform and degenerate distributions', () => {
    expect(shannonEntropy([1, 1, 1, 1])).toBeCloseTo(2)
    expect(shannonEntropy([4, 0])).toBe(0)
    expect(shannonEntropy([])).toBe(0)
  })

  it('positionEntropy is 0 for order-preserving release', () => {
    const samples = [
      { arrival: 0, forward: 0 },
      { arrival: 1, forward: 1 },
      { arrival: 0, forward: 0 },
      { arrival: 1, forward: 1 },
    ]
    expect(positionEntropy(samples, 2)).toBe(0)
  })

  it('positionEntropy reaches log2(n) when every position is equally likely', () => {
    const samples = [
      { arrival: 0, forward: 0 },
      { arrival: 1, forward: 1 },
      { arrival: 0, forward: 1 },
      { arrival: 1, forward: 0 },
    ]
    expect(positionEntropy(samples, 2)).toBeCloseTo(1)
    expect(maxPositionEntropy(2)).toBe(1)
    expect(maxPositionEntropy(8)).toBe(3)
    expect(maxPositionEntropy(1)).toBe(0)
  })

  it('ignores out-of-range samples', () => {
    expect(positionEntropy([{ arrival: 5, forward: 0 }], 2)).toBe(0)
  })
})
