/**
 * Segment 04: FuzzyDateRange Tests
 *
 * Endpoint defaulting, validation, duration, ordering and output.
 */

import { describe, it, expect } from 'vitest'
import { FuzzyDate } from '../src/fuzzy-date'
import { FuzzyDateRange } from '../src/fuzzy-date-range'
import { FieldMap } from '../src/fields'
import { createRulesRunner } from '../src/rules-runner'
import { defineRule } from '../src/rules'
import { NullArgumentError, OutOfRangeError, ValidationError } from '../src/errors'

// ============================================================================
// 1. CONSTRUCTION
// ============================================================================

describe('Construction', () => {
  it('null endpoints become unknown', () => {
    const range = new FuzzyDateRange(null, null)
    expect(range.from.equals(FuzzyDate.unknown())).toBe(true)
    expect(range.to.equals(FuzzyDate.unknown())).toBe(true)
  })

  it('omitted endpoints become unknown', () => {
    const range = new FuzzyDateRange()
    expect(range.from.isUnknown).toBe(true)
    expect(range.to.isUnknown).toBe(true)
  })

  it('keeps the given endpoints', () => {
    const from = FuzzyDate.fromYear(2018)
    const to = FuzzyDate.fromYearMonth(2019, 3)
    const range = new FuzzyDateRange(from, to)
    expect(range.from).toBe(from)
    expect(range.to).toBe(to)
  })

  it('one missing endpoint', () => {
    const range = new FuzzyDateRange(undefined, FuzzyDate.fromYear(2000))
    expect(range.from.isUnknown).toBe(true)
    expect(range.to.year).toBe(2000)
  })

  it('of builds endpoints from parts', () => {
    const range = FuzzyDateRange.of({ from: { year: 2018 }, to: { year: 2019, month: 3 } })
    expect(range.toJSON()).toEqual({ from: { year: 2018 }, to: { year: 2019, month: 3 } })
  })

  it('of validates endpoint parts', () => {
    expect(() => FuzzyDateRange.of({ from: { year: 2018, month: 13 } })).toThrow(OutOfRangeError)
  })

  it('instances are frozen', () => {
    const range = new FuzzyDateRange()
    expect(Object.isFrozen(range)).toBe(true)
    expect(Reflect.set(range, 'from', FuzzyDate.fromYear(1))).toBe(false)
  })
})

// ============================================================================
// 2. VALIDATION
// ============================================================================

describe('Validation', () => {
  it('an inverted complete range is rejected', () => {
    const from = FuzzyDate.fromCalendarDate(2020, 12, 31)
    const to = FuzzyDate.fromCalendarDate(2020, 1, 1)
    try {
      new FuzzyDateRange(from, to)
      expect.unreachable()
    } catch (e) {
      expect(e).toBeInstanceOf(ValidationError)
      if (e instanceof ValidationError) {
        expect(e.rule).toBe('rangeMustNotBeInverted')
        expect(e.message).toBe('Range end 2020/01/01 precedes start 2020/12/31')
        expect(e.value).toEqual({ from: '2020/12/31', to: '2020/01/01' })
      }
    }
  })

  it('a single-day range is fine', () => {
    const day = FuzzyDate.fromCalendarDate(2020, 5, 5)
    expect(() => new FuzzyDateRange(day, day)).not.toThrow()
  })

  it('partial endpoints may be inverted', () => {
    expect(() => new FuzzyDateRange(FuzzyDate.fromYear(2021), FuzzyDate.fromYear(2020))).not.toThrow()
  })

  it('range rules come from the given runner', () => {
    const sameYear = defineRule('fuzzyDateRange', 'sameYear', (range) =>
      range.from.year !== range.to.year ? { message: 'Endpoints must share a year' } : undefined
    )
    const runner = createRulesRunner({ rules: [sameYear] })
    const a = FuzzyDate.fromYear(2019, runner)
    const b = FuzzyDate.fromYear(2020, runner)
    expect(() => new FuzzyDateRange(a, b, runner)).toThrow('Endpoints must share a year')
    expect(() => new FuzzyDateRange(a, b)).not.toThrow()
  })
})

// ============================================================================
// 3. DURATION
// ============================================================================

describe('toDuration', () => {
  it('2020-01-01 to 2020-12-31 is 365 days', () => {
    const range = new FuzzyDateRange(
      FuzzyDate.fromCalendarDate(2020, 1, 1),
      FuzzyDate.fromCalendarDate(2020, 12, 31)
    )
    expect(range.toDuration()).toBe(365)
  })

  it('partial endpoints materialize to the 1st', () => {
    const range = new FuzzyDateRange(FuzzyDate.fromYearMonth(2020, 2), FuzzyDate.fromYearMonth(2020, 3))
    expect(range.toDuration()).toBe(29)
  })

  it('is signed', () => {
    const range = new FuzzyDateRange(FuzzyDate.fromYear(2021), FuzzyDate.fromYear(2020))
    expect(range.toDuration()).toBe(-366)
  })

  it('unknown to unknown is zero', () => {
    expect(new FuzzyDateRange().toDuration()).toBe(0)
  })
})

// ============================================================================
// 4. ORDERING
// ============================================================================

describe('compareTo', () => {
  const y = (year: number) => FuzzyDate.fromYear(year)

  it('from decides first', () => {
    const a = new FuzzyDateRange(y(1999), y(2010))
    const b = new FuzzyDateRange(y(2000), y(2005))
    expect(a.compareTo(b)).toBe(-1)
    expect(b.compareTo(a)).toBe(1)
  })

  it('to breaks ties', () => {
    const a = new FuzzyDateRange(y(2000), y(2005))
    const b = new FuzzyDateRange(y(2000), y(2003))
    expect(a.compareTo(b)).toBe(1)
  })

  it('equal ranges', () => {
    expect(new FuzzyDateRange(y(2000), y(2005)).compareTo(new FuzzyDateRange(y(2000), y(2005)))).toBe(0)
  })

  it('unknown from sorts first', () => {
    const a = new FuzzyDateRange(null, y(2000))
    const b = new FuzzyDateRange(y(1999), null)
    expect(a.compareTo(b)).toBe(-1)
  })

  it('FuzzyDateRange.compare sorts an array', () => {
    const ranges = [
      new FuzzyDateRange(y(2000), y(2005)),
      new FuzzyDateRange(y(1999), y(2010)),
      new FuzzyDateRange(y(2000), y(2003)),
      new FuzzyDateRange(null, y(2001)),
    ]
    const sorted = [...ranges].sort(FuzzyDateRange.compare).map((r) => r.toString())
    expect(sorted).toEqual(['unknown date-2001', '1999-2010', '2000-2003', '2000-2005'])
  })

  it('equals', () => {
    expect(new FuzzyDateRange(y(2000)).equals(new FuzzyDateRange(y(2000), null))).toBe(true)
    expect(new FuzzyDateRange(y(2000)).equals(new FuzzyDateRange(y(2001)))).toBe(false)
  })
})

// ============================================================================
// 5. OUTPUT
// ============================================================================

describe('Output', () => {
  it('toString joins the endpoints', () => {
    const range = new FuzzyDateRange(FuzzyDate.fromYear(2018), FuzzyDate.fromYearMonth(2019, 3))
    expect(range.toString()).toBe('2018-March 2019')
  })

  it('toString of an unknown range', () => {
    expect(new FuzzyDateRange(null, null).toString()).toBe('unknown date-unknown date')
  })

  it('writeFields writes From and To', () => {
    const from = FuzzyDate.fromYear(2018)
    const to = FuzzyDate.fromYear(2019)
    const sink = new FieldMap()
    new FuzzyDateRange(from, to).writeFields(sink)
    expect([...sink.values.keys()]).toEqual(['From', 'To'])
    expect(sink.get('From')).toBe(from)
    expect(sink.get('To')).toBe(to)
  })

  it('writeFields requires a sink', () => {
    expect(() => new FuzzyDateRange().writeFields(null)).toThrow(NullArgumentError)
  })

  it('toJSON nests endpoint JSON', () => {
    const range = new FuzzyDateRange(FuzzyDate.fromCalendarDate(2020, 1, 1), null)
    expect(JSON.stringify(range)).toBe('{"from":{"year":2020,"month":1,"day":1},"to":{}}')
  })
})
