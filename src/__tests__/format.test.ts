import { describe, it, expect } from 'vitest'
import { formatNumber } from '../util/format'

describe('formatNumber', () => {
  it('uses fixed notation for moderate magnitudes', () => {
    expect(formatNumber(0.151)).toBe('0.151')
    expect(formatNumber(0.1 + 0.2)).toBe('0.3')
    expect(formatNumber(73)).toBe('73')
    expect(formatNumber(100)).toBe('100')
    expect(formatNumber(123456)).toBe('123456')
    expect(formatNumber(0.0001)).toBe('0.0001')
    expect(formatNumber(-0.05)).toBe('-0.05')
    expect(formatNumber(0)).toBe('0')
  })

  it('switches to exponent notation outside %g range', () => {
    expect(formatNumber(0.00001)).toBe('1e-05')
    expect(formatNumber(3e-9)).toBe('3e-09')
    expect(formatNumber(1e9)).toBe('1e+09')
    expect(formatNumber(1234567)).toBe('1.23457e+06')
    expect(formatNumber(1.5e-10)).toBe('1.5e-10')
  })

  it('rejects non-finite values', () => {
    expect(() => formatNumber(Number.POSITIVE_INFINITY)).toThrow(RangeError)
  })
})
