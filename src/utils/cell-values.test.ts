import { describe, expect, it } from 'vitest';
import { cellBool, cellInt, cellValue, importHeader } from './cell-values';

describe('importHeader', () => {
  it.each([
    [' Group Name ', 'group_name'],
    ['Email_To', 'email_to'],
    ['day of month', 'day_of_month'],
  ])('normalises %j', (header, expected) => {
    expect(importHeader(header)).toBe(expected);
  });
});

describe('cellValue', () => {
  it('takes the first candidate that is not blank', () => {
    expect(cellValue({ group: null, name: '  ', customer: 0 }, ['group', 'name', 'customer'])).toBe(0);
  });

  it('is undefined when every candidate is blank or absent', () => {
    expect(cellValue({ group: '' }, ['group', 'name'])).toBeUndefined();
  });
});

describe('cellInt', () => {
  it.each([
    ['3', 3],
    [2.7, 2],
    [9, 6],
    [-1, 0],
    ['Tuesday', 0],
    [undefined, 0],
  ])('reads %j as %i', (value, expected) => {
    expect(cellInt(value, 0, 0, 6)).toBe(expected);
  });
});

describe('cellBool', () => {
  it.each([
    ['No', true, false],
    [' y ', false, true],
    [0, true, false],
    [2, false, true],
    [true, false, true],
    ['maybe', true, true],
    [undefined, false, false],
  ])('reads %j with fallback %s as %s', (value, fallback, expected) => {
    expect(cellBool(value, fallback)).toBe(expected);
  });
});
