/**
 * Tests for partial dates and entity validation.
 */

import { describe, it, expect } from 'vitest';
import {
  DateError,
  compareAtSharedPrecision,
  compareDates,
  createDate,
  dateFromParts,
  datesEqual,
  decadeOf,
  formatDateKey,
  formatLongDate,
  formatShortDate,
} from './date';
import { EntityError, createEntity, createTag, formatTag, getTagValues, hasTagName } from './models';

// =============================================================================
// Construction
// =============================================================================

describe('createDate', () => {
  it('carries the precision of the components given', () => {
    expect(createDate(1914)).toEqual({ precision: 'YEAR', year: 1914 });
    expect(createDate(1914, 6)).toEqual({ precision: 'MONTH', year: 1914, month: 6 });
    expect(createDate(1914, 6, 28)).toEqual({ precision: 'DAY', year: 1914, month: 6, day: 28 });
  });

  it('accepts the year bounds and negative years', () => {
    expect(createDate(-50000).year).toBe(-50000);
    expect(createDate(10000).year).toBe(10000);
    expect(createDate(-44, 3, 15).year).toBe(-44);
  });

  it('rejects out-of-range components', () => {
    expect(() => createDate(10001)).toThrow(DateError);
    expect(() => createDate(-50001)).toThrow('Year `-50001` is not allowed');
    expect(() => createDate(1914, 13)).toThrow('Month `13` is not allowed');
    expect(() => createDate(1914, 0)).toThrow(DateError);
    expect(() => createDate(1914, 6, 32)).toThrow('Day `32` is not allowed');
  });

  it('rejects a day without a month', () => {
    try {
      createDate(1914, null, 28);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(DateError);
      expect(error instanceof DateError ? error.reason : null).toBe('INVALID_FIELDS');
    }
  });
});

describe('dateFromParts', () => {
  it('treats all-null columns as no date', () => {
    expect(dateFromParts(null, null, null)).toBeNull();
  });

  it('rejects a month without a year', () => {
    expect(() => dateFromParts(null, 6, null)).toThrow('Day and/or month is set, but year is not');
  });

  it('builds a date from present columns', () => {
    expect(dateFromParts(1918, 11, null)).toEqual({ precision: 'MONTH', year: 1918, month: 11 });
  });
});

// =============================================================================
// Comparison
// =============================================================================

describe('compareDates', () => {
  it('sorts missing components before present ones', () => {
    const dates = [createDate(1914, 6, 28), createDate(1914), createDate(1914, 6), createDate(1913, 12, 31)];
    const sorted = [...dates].sort(compareDates).map(formatDateKey);
    expect(sorted).toEqual(['1913-12-31', '1914', '1914-06', '1914-06-28']);
  });

  it('orders BCE years numerically', () => {
    expect(compareDates(createDate(-500), createDate(-44))).toBeLessThan(0);
  });

  it('is zero only for identical dates', () => {
    expect(compareDates(createDate(1914, 6), createDate(1914, 6))).toBe(0);
    expect(datesEqual(createDate(1914, 6), createDate(1914, 6))).toBe(true);
    expect(datesEqual(createDate(1914), createDate(1914, 1))).toBe(false);
  });
});

describe('compareAtSharedPrecision', () => {
  it('ignores components only one date has', () => {
    expect(compareAtSharedPrecision(createDate(1914, 6), createDate(1914, 6, 28))).toBe(0);
    expect(compareAtSharedPrecision(createDate(1914), createDate(1914, 11, 11))).toBe(0);
    expect(compareAtSharedPrecision(createDate(1914, 7), createDate(1914, 6, 28))).toBeGreaterThan(0);
  });
});

// =============================================================================
// Formatting
// =============================================================================

describe('date formatting', () => {
  it('writes long dates with the components present', () => {
    expect(formatLongDate(createDate(1914, 6, 28))).toBe('28 Jun 1914');
    expect(formatLongDate(createDate(1914, 6))).toBe('Jun 1914');
    expect(formatLongDate(createDate(1914))).toBe('1914');
  });

  it('writes short dates with dashes for unknown components', () => {
    expect(formatShortDate(createDate(1914, 6, 28))).toBe('28 / 6 / 1914');
    expect(formatShortDate(createDate(1914))).toBe('- / - / 1914');
  });

  it('rounds years down to their decade', () => {
    expect(decadeOf(1914)).toBe(1910);
    expect(decadeOf(1910)).toBe(1910);
    expect(decadeOf(-5)).toBe(-10);
  });
});

// =============================================================================
// Entities and Tags
// =============================================================================

describe('createEntity', () => {
  it('trims the name and defaults the end to null', () => {
    const entity = createEntity({ id: 'e1', name: '  Armistice ', start: createDate(1918, 11, 11) });
    expect(entity.name).toBe('Armistice');
    expect(entity.end).toBeNull();
  });

  it('allows an end equal to the start at shared precision', () => {
    const entity = createEntity({
      id: 'e1',
      name: 'Summer',
      start: createDate(1914, 6, 28),
      end: createDate(1914, 6),
    });
    expect(entity.end).toEqual({ precision: 'MONTH', year: 1914, month: 6 });
  });

  it('rejects an end before the start', () => {
    expect(() => createEntity({
      id: 'e1',
      name: 'Backwards',
      start: createDate(1918),
      end: createDate(1914),
    })).toThrow('Entity "Backwards" ends before it starts');
  });

  it('rejects a blank name', () => {
    expect(() => createEntity({ id: 'e1', name: '   ', start: createDate(1918) })).toThrow(EntityError);
  });
});

describe('tag helpers', () => {
  const tags = [createTag('era', 'WWI'), createTag('era', 'Cold War'), createTag(null, 'famous')];

  it('reads multi-valued names', () => {
    expect(hasTagName(tags, 'era')).toBe(true);
    expect(hasTagName(tags, 'famous')).toBe(false);
    expect(getTagValues(tags, 'era')).toEqual(['WWI', 'Cold War']);
  });

  it('formats named and anonymous tags', () => {
    expect(tags.map(formatTag)).toEqual(['era:WWI', 'era:Cold War', 'famous']);
  });
});
