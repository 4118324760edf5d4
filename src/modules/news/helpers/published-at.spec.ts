import { parsePublishedAt } from './published-at';

describe('parsePublishedAt', () => {
  const fallback = new Date('2026-01-01T00:00:00.000Z');

  it('reads NewsData timestamps as UTC', () => {
    expect(parsePublishedAt('2026-02-03 04:05:06', fallback).toISOString()).toBe(
      '2026-02-03T04:05:06.000Z',
    );
  });

  it('reads ISO-8601 with and without a zone', () => {
    expect(parsePublishedAt('2026-02-03T04:05:06+02:00', fallback).toISOString()).toBe(
      '2026-02-03T02:05:06.000Z',
    );
    expect(parsePublishedAt('2026-02-03T04:05:06', fallback).toISOString()).toBe(
      '2026-02-03T04:05:06.000Z',
    );
  });

  it('reads RFC 2822 dates', () => {
    expect(parsePublishedAt('Tue, 03 Feb 2026 04:05:06 GMT', fallback).toISOString()).toBe(
      '2026-02-03T04:05:06.000Z',
    );
  });

  it('falls back for empty or unreadable values', () => {
    expect(parsePublishedAt(undefined, fallback)).toBe(fallback);
    expect(parsePublishedAt('  ', fallback)).toBe(fallback);
    expect(parsePublishedAt('yesterday-ish', fallback)).toBe(fallback);
  });
});
