import { describe, it, expect } from 'vitest'
import { parseMoney, formatMoney, formatPrice } from '../money'

describe('parseMoney', () => {
  it('parses decimal strings into cents', () => {
    expect(parseMoney('2499.99')).toBe(249999)
    expect(parseMoney('100')).toBe(10000)
    expect(parseMoney('0.5')).toBe(50)
    expect(parseMoney('12.30')).toBe(1230)
    expect(parseMoney(' 7.05 ')).toBe(705)
  })

  it('rejects negative, malformed and over-precise amounts', () => {
    expect(() => parseMoney('-1')).toThrow('Invalid money amount: "-1"')
    expect(() => parseMoney('1.234')).toThrow('Invalid money amount: "1.234"')
    expect(() => parseMoney('abc')).toThrow('Invalid money amount: "abc"')
    expect(() => parseMoney('')).toThrow('Invalid money amount: ""')
  })
})

describe('formatMoney', () => {
  it('renders cents with two decimals', () => {
    expect(formatMoney(40000)).toBe('400.00')
    expect(formatMoney(5)).toBe('0.05')
    expect(formatMoney(0)).toBe('0.00')
    expect(formatMoney(-150)).toBe('-1.50')
  })

  it('sums without floating point drift', () => {
    // 0.10 + 0.20 in cents
    expect(formatMoney(parseMoney('0.10') + parseMoney('0.20'))).toBe('0.30')
  })
})

describe('formatPrice', () => {
  it('prefixes the currency', () => {
    expect(formatPrice(129523, 'EUR')).toBe('EUR 1295.23')
    expect(formatPrice(999)).toBe('USD 9.99')
  })
})
