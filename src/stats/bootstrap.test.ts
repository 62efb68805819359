/**
 * Tests for bootstrap resampling and confidence intervals
 */

import { describe, it, expect } from 'vitest'
import {
  resample,
  resampleWith,
  confidenceInterval,
  DEFAULT_ITERATIONS,
} from './bootstrap.ts'
import { createRandom, randomIndex, type Random } from './random.ts'
import { geoMean, mean, median } from './aggregate.ts'
import { OutOfRangeError } from './errors.ts'

// Replays the given values in a loop
const scripted = (values: number[]): Random => {
  let i = 0
  return () => values[i++ % values.length]!
}

const sample = [12, 15, 9, 20, 17, 11, 14, 18, 10, 16]
const other = [8, 13, 7, 9, 12, 10, 6, 11]

describe('Random sources', () => {
  it('should repeat a seeded stream', () => {
    const a = createRandom(7)
    const b = createRandom(7)
    const first = [a(), a(), a()]
    expect([b(), b(), b()]).toEqual(first)
    for (const x of first) {
      expect(x).toBeGreaterThanOrEqual(0)
      expect(x).toBeLessThan(1)
    }
  })

  it('should differ between seeds', () => {
    const a = createRandom(1)
    const b = createRandom(2)
    expect([a(), a(), a()]).not.toEqual([b(), b(), b()])
  })

  it('should map onto [0, n)', () => {
    expect(randomIndex(() => 0, 5)).toBe(0)
    expect(randomIndex(() => 0.5, 5)).toBe(2)
    expect(randomIndex(() => 0.999, 5)).toBe(4)
    expect(randomIndex(() => 1, 5)).toBe(4)
  })
})

describe('Resampling', () => {
  it('should keep the sample length', () => {
    expect(resample(sample, 42)).toHaveLength(sample.length)
    expect(resample(sample)).toHaveLength(sample.length)
  })

  it('should only draw elements of the source', () => {
    for (let seed = 0; seed < 20; seed++) {
      for (const x of resample(sample, seed)) {
        expect(sample).toContain(x)
      }
    }
  })

  it('should be reproducible with a seed', () => {
    expect(resample(sample, 123)).toEqual(resample(sample, 123))
  })

  it('should pick the index chosen by the source', () => {
    expect(resampleWith([10, 20, 30], scripted([0, 0.5, 0.99]))).toEqual([10, 20, 30])
    expect(resampleWith([10, 20, 30], () => 0.9)).toEqual([30, 30, 30])
  })

  it('should not mutate the input', () => {
    const data = [3, 1, 2]
    resample(data, 5)
    expect(data).toEqual([3, 1, 2])
  })

  it('should return an empty array for empty data', () => {
    expect(resample([], 1)).toEqual([])
  })
})

describe('Confidence intervals', () => {
  describe('Validation', () => {
    it('should reject confidence levels outside (0, 100)', () => {
      for (const level of [0, 100, -5, 150, NaN]) {
        expect(() => confidenceInterval(sample, mean, level)).toThrow(OutOfRangeError)
        expect(() => confidenceInterval(sample, other, mean, level)).toThrow(OutOfRangeError)
      }
    })

    it('should reject iteration counts that are not positive integers', () => {
      expect(() => confidenceInterval(sample, mean, 95, { iterations: 0 })).toThrow(
        OutOfRangeError
      )
      expect(() => confidenceInterval(sample, mean, 95, { iterations: 2.5 })).toThrow(
        OutOfRangeError
      )
      expect(() => confidenceInterval(sample, mean, 95, { iterations: 0 })).toThrow(
        'iterations must be a positive integer, got 0'
      )
    })

    it('should name the violated bounds', () => {
      expect(() => confidenceInterval(sample, mean, 100)).toThrow(
        'confidence level must be in (0, 100), got 100'
      )
    })
  })

  describe('One sample', () => {
    it('should return (0, 0) for empty data without calling the statistic', () => {
      let calls = 0
      const counted = (s: ArrayLike<number>) => {
        calls++
        return mean(s)
      }
      expect(confidenceInterval([], counted, 95)).toEqual({ low: 0, high: 0 })
      expect(calls).toBe(0)
    })

    it('should evaluate the statistic once per iteration', () => {
      let calls = 0
      const counted = (s: ArrayLike<number>) => {
        calls++
        return mean(s)
      }
      confidenceInterval(sample, counted, 95, { seed: 1 })
      expect(calls).toBe(DEFAULT_ITERATIONS)

      calls = 0
      confidenceInterval(sample, counted, 95, { seed: 1, iterations: 10 })
      expect(calls).toBe(10)
    })

    it('should collapse to the value for constant data', () => {
      expect(confidenceInterval([5, 5, 5, 5], mean, 95, { seed: 3 })).toEqual({
        low: 5,
        high: 5,
      })
    })

    it('should bootstrap the geometric mean of long samples', () => {
      const latencies = new Array<number>(400).fill(100)
      const ci = confidenceInterval(latencies, geoMean, 95, { seed: 1, iterations: 16 })
      expect(ci.low).toBeCloseTo(100, 9)
      expect(ci.high).toBeCloseTo(100, 9)
    })

    it('should take percentiles of the bootstrap distribution', () => {
      // Resample means: 1, 2, 3, 2 -> sorted [1, 2, 2, 3]
      const random = scripted([0, 0, 0, 0.4, 0.4, 0.4, 0.8, 0.8, 0.8, 0.4, 0.4, 0.4])
      const ci = confidenceInterval([1, 2, 3], mean, 50, { iterations: 4, random })
      expect(ci).toEqual({ low: 1.75, high: 2.25 })
    })

    it('should keep low <= high and bracket the statistic', () => {
      const ci = confidenceInterval(sample, mean, 95, { seed: 11 })
      expect(ci.low).toBeLessThanOrEqual(ci.high)
      expect(ci.low).toBeLessThanOrEqual(mean(sample))
      expect(ci.high).toBeGreaterThanOrEqual(mean(sample))
    })

    it('should widen as the confidence level grows', () => {
      const levels = [50, 80, 90, 95, 99]
      const intervals = levels.map((level) =>
        confidenceInterval(sample, median, level, { seed: 7 })
      )
      for (let i = 1; i < intervals.length; i++) {
        expect(intervals[i]!.low).toBeLessThanOrEqual(intervals[i - 1]!.low)
        expect(intervals[i]!.high).toBeGreaterThanOrEqual(intervals[i - 1]!.high)
      }
    })

    it('should be reproducible with a seed', () => {
      expect(confidenceInterval(sample, mean, 90, { seed: 99 })).toEqual(
        confidenceInterval(sample, mean, 90, { seed: 99 })
      )
    })
  })

  describe('Two samples', () => {
    it('should return (0, 0) when either sample is empty', () => {
      expect(confidenceInterval([], other, mean, 95)).toEqual({ low: 0, high: 0 })
      expect(confidenceInterval(sample, [], mean, 95)).toEqual({ low: 0, high: 0 })
    })

    it('should bootstrap the difference of the statistic', () => {
      expect(confidenceInterval([10, 10, 10], [4, 4], mean, 95, { seed: 2 })).toEqual({
        low: 6,
        high: 6,
      })
    })

    it('should resample both inputs on every iteration', () => {
      // Iteration 1: [1, 1, 1] vs [10, 10] -> -9
      // Iteration 2: [3, 3, 3] vs [20, 20] -> -17
      const random = scripted([0, 0, 0, 0, 0, 0.9, 0.9, 0.9, 0.9, 0.9])
      const ci = confidenceInterval([1, 2, 3], [10, 20], mean, 90, { iterations: 2, random })
      expect(ci.low).toBeCloseTo(-16.6, 10)
      expect(ci.high).toBeCloseTo(-9.4, 10)
    })

    it('should keep low <= high for a real difference', () => {
      const ci = confidenceInterval(sample, other, mean, 95, { seed: 5 })
      expect(ci.low).toBeLessThanOrEqual(ci.high)
      expect(ci.high).toBeGreaterThan(0)
    })
  })
})
