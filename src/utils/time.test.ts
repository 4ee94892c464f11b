import { describe, it, expect } from 'vitest';
import {
  toMinutes,
  fromMinutes,
  isValidDate,
  isValidTime,
  slotTimes,
  toLocalDate,
  toLocalDateTime,
} from './time';

describe('toMinutes', () => {
  it('converts HH:MM to minutes', () => {
    expect(toMinutes('00:00')).toBe(0);
    expect(toMinutes('12:00')).toBe(720);
    expect(toMinutes('19:30')).toBe(1170);
  });
});

describe('fromMinutes', () => {
  it('pads single digits', () => {
    expect(fromMinutes(65)).toBe('01:05');
    expect(fromMinutes(1170)).toBe('19:30');
  });
});

describe('isValidDate', () => {
  it('accepts real calendar dates', () => {
    expect(isValidDate('2024-06-01')).toBe(true);
    expect(isValidDate('2024-02-29')).toBe(true);
  });

  it('rejects dates that do not exist', () => {
    expect(isValidDate('2023-02-29')).toBe(false);
    expect(isValidDate('2024-13-01')).toBe(false);
    expect(isValidDate('2024-04-31')).toBe(false);
  });

  it('rejects malformed strings', () => {
    expect(isValidDate('invalid-date')).toBe(false);
    expect(isValidDate('2024-6-1')).toBe(false);
  });
});

describe('isValidTime', () => {
  it('checks range and shape', () => {
    expect(isValidTime('19:00')).toBe(true);
    expect(isValidTime('24:00')).toBe(false);
    expect(isValidTime('19:60')).toBe(false);
    expect(isValidTime('7pm')).toBe(false);
  });
});

describe('slotTimes', () => {
  it('lists the day on the slot grid, closing hour excluded', () => {
    expect(slotTimes(11, 13, 30)).toEqual(['11:00', '11:30', '12:00', '12:30']);
  });
});

describe('toLocalDateTime', () => {
  it('builds a local wall-clock instant', () => {
    const d = toLocalDateTime('2024-06-01', '19:30');
    expect(d.getFullYear()).toBe(2024);
    expect(d.getMonth()).toBe(5);
    expect(d.getDate()).toBe(1);
    expect(d.getHours()).toBe(19);
    expect(d.getMinutes()).toBe(30);
  });
});

describe('toLocalDate', () => {
  it('formats the local calendar date, not the UTC one', () => {
    expect(toLocalDate(new Date('2024-06-01T23:30:00'))).toBe('2024-06-01');
    expect(toLocalDate(new Date('2024-06-02T00:15:00'))).toBe('2024-06-02');
  });

  it('agrees with toLocalDateTime', () => {
    expect(toLocalDate(toLocalDateTime('2024-02-29', '21:30'))).toBe('2024-02-29');
  });
});
