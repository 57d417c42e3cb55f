import { isXsdDateTime } from './date-time';

describe('isXsdDateTime', () => {
  it.each([
    '2008-01-23T04:56:22Z',
    '2008-01-23T04:56:22',
    '2008-01-23T04:56:22.123Z',
    '2008-01-23T04:56:22+05:30',
    '2008-01-23T04:56:22-14:00',
    '2024-02-29T00:00:00Z',
    '2008-01-23T24:00:00Z',
  ])('should accept %s', (value) => {
    expect(isXsdDateTime(value)).toBe(true);
  });

  it.each([
    '2008-01-23',
    '2008-01-23 04:56:22Z',
    '2008-13-01T00:00:00Z',
    '2023-02-29T00:00:00Z',
    '2008-04-31T00:00:00Z',
    '0000-01-01T00:00:00Z',
    '2008-01-23T25:00:00Z',
    '2008-01-23T24:00:01Z',
    '2008-01-23T12:60:00Z',
    '2008-01-23T12:00:60Z',
    '2008-01-23T12:00:00+15:00',
    '2008-01-23T12:00:00+05:60',
    'not a date',
  ])('should reject %s', (value) => {
    expect(isXsdDateTime(value)).toBe(false);
  });
});
