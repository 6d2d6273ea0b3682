import { describe, it, expect } from 'vitest'
import { normalizePrice } from '../price'
import { NOT_AVAILABLE } from '../../types'

const encode = (s: string) => new TextEncoder().encode(s)

describe('normalizePrice', () => {
  it('strips currency symbol and thousands separators', () => {
    expect(normalizePrice(encode('Price: $1,249.50'))).toBe('1249.50')
  })

  it('treats a multi-byte currency symbol as one character', () => {
    expect(normalizePrice(encode('List Price: ₹12,495'))).toBe('12495')
    expect(normalizePrice(encode('Was: €1,000'))).toBe('1000')
  })

  it('uses the segment after the last colon', () => {
    expect(normalizePrice('Was: Now: $7')).toBe('7')
  })

  it('accepts an already-decoded string', () => {
    expect(normalizePrice('Price: $12.99')).toBe('12.99')
  })

  describe('returns the sentinel', () => {
    it('for invalid UTF-8', () => {
      expect(normalizePrice(new Uint8Array([0xff, 0xfe, 0x3a]))).toBe(NOT_AVAILABLE)
    })

    it('when there is no colon', () => {
      expect(normalizePrice(encode('$1,249.50'))).toBe(NOT_AVAILABLE)
    })

    it('when the amount is blank', () => {
      expect(normalizePrice(encode('Price:   '))).toBe(NOT_AVAILABLE)
    })

    it('when only the currency symbol is present', () => {
      expect(normalizePrice(encode('Price: $'))).toBe(NOT_AVAILABLE)
    })

    it('when trailing text remains after the amount', () => {
      expect(normalizePrice(encode('Price: $12.99 with 20 percent savings'))).toBe(NOT_AVAILABLE)
    })

    it('when the currency is spelled out', () => {
      expect(normalizePrice(encode('Price: USD 12'))).toBe(NOT_AVAILABLE)
    })
  })

  it('only ever yields the sentinel or a canonical digit string', () => {
    const inputs = [
      'Price: $1,249.50',
      'Price: $',
      'no colon here',
      'a:b:c',
      'Deal: £3,000,000',
      'Price: $1.2.3',
      ':',
      '',
      'Price: $-5',
      'Price: $ 5',
    ]
    for (const input of inputs) {
      const out = normalizePrice(encode(input))
      expect(out === NOT_AVAILABLE || /^[0-9]+(\.[0-9]+)?$/.test(out)).toBe(true)
    }
  })
})
