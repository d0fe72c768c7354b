import { describe, it, expect } from 'vitest'
import { clampTeamSize, formatScore } from '../format'

describe('formatScore', () => {
  it('shows two decimals', () => {
    expect(formatScore(4)).toBe('4.00')
    expect(formatScore(10 / 3)).toBe('3.33')
    expect(formatScore(2.675)).toBe('2.67')
  })
})

describe('clampTeamSize', () => {
  it('keeps sizes within 1-20', () => {
    expect(clampTeamSize(0)).toBe(1)
    expect(clampTeamSize(25)).toBe(20)
    expect(clampTeamSize(7)).toBe(7)
  })

  it('rounds fractional input', () => {
    expect(clampTeamSize(3.6)).toBe(4)
  })

  it('falls back to 1 for an empty field', () => {
    expect(clampTeamSize(Number.NaN)).toBe(1)
  })
})
