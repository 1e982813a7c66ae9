import { describe, it, expect, vi, beforeEach } from 'vitest';
import { writeFile } from 'fs/promises';
import { Duration } from '@js-joda/core';
import { main, runMerge } from './calendar_merger.js';
import type { MergeConfig } from './config/schema.js';

// Mock the file system operations
vi.mock('fs/promises', () => ({
  writeFile: vi.fn(),
  readFile: vi.fn()
}));

const mockFetch = vi.fn();
vi.stubGlobal('fetch', mockFetch);

const SOURCE_A = [
  'BEGIN:VCALENDAR',
  'VERSION:2.0',
  'X-WR-CALNAME:Calendar A',
  'BEGIN:VEVENT',
  'UID:E1',
  'DTSTART:20240101T000000Z',
  'SUMMARY:Party',
  'END:VEVENT',
  'END:VCALENDAR',
  '',
].join('\r\n');

const SOURCE_B = [
  'BEGIN:VCALENDAR',
  'VERSION:2.0',
  'BEGIN:VEVENT',
  'UID:E2',
  'DTSTART:20231231T000000Z',
  'SUMMARY:Eve',
  'END:VEVENT',
  'END:VCALENDAR',
  '',
].join('\r\n');

function makeConfig(overrides: Partial<MergeConfig> = {}): MergeConfig {
  return {
    name: 'Nyår',
    output: 'out/combined.ics',
    sources: [
      { url: 'https://a.example/a.ics', label: 'A' },
      { url: 'https://b.example/b.ics', label: 'B' },
    ],
    timeout: Duration.ofSeconds(5),
    retries: 0,
    userAgent: 'calendar-merge/test',
    proxy: false,
    ...overrides,
  };
}

function respondWith(documents: Record<string, string>) {
  mockFetch.mockImplementation(async (url: string) => {
    const body = documents[url];
    return body === undefined
      ? new Response('missing', { status: 404, statusText: 'Not Found' })
      : new Response(body);
  });
}

describe('runMerge', () => {
  beforeEach(() => {
    vi.resetAllMocks();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  it('writes the merged calendar in start order', async () => {
    respondWith({ 'https://a.example/a.ics': SOURCE_A, 'https://b.example/b.ics': SOURCE_B });

    const run = await runMerge(makeConfig());

    const expected = [
      'BEGIN:VCALENDAR',
      'PRODID:-//calendar-merge//merged//EN',
      'VERSION:2.0',
      'CALSCALE:GREGORIAN',
      'X-WR-CALNAME:Nyår',
      'METHOD:PUBLISH',
      'BEGIN:VEVENT',
      'UID:E2',
      'DTSTART:20231231T000000Z',
      'SUMMARY:[B] Eve',
      'END:VEVENT',
      'BEGIN:VEVENT',
      'UID:E1',
      'DTSTART:20240101T000000Z',
      'SUMMARY:[A] Party',
      'END:VEVENT',
      'END:VCALENDAR',
      '',
    ].join('\n');
    expect(run.calendar).toBe(expected);
    expect(writeFile).toHaveBeenCalledWith('out/combined.ics', expected, 'utf8');
    expect(run.report.eventsEmitted).toBe(2);
    expect(run.report.sourcesAttempted).toBe(2);
  });

  it('keeps going when a source fails', async () => {
    respondWith({ 'https://a.example/a.ics': SOURCE_A });

    const run = await runMerge(makeConfig());

    expect(run.report.sourcesMerged).toBe(1);
    expect(run.report.sourcesSkipped).toBe(1);
    expect(run.report.failures).toEqual([
      { type: 'FetchError', reason: 'HTTP 404 Not Found', url: 'https://b.example/b.ics', status: 404 },
    ]);
    expect(run.calendar).toContain('SUMMARY:[A] Party\n');
    expect(run.calendar).not.toContain('UID:E2');
    expect(console.error).toHaveBeenCalledWith('Warning: could not fetch https://b.example/b.ics: HTTP 404 Not Found');
  });

  it('skips a source whose URL does not parse', async () => {
    respondWith({ 'https://a.example/a.ics': SOURCE_A });

    const run = await runMerge(makeConfig({
      sources: [{ url: 'https://a.example/a.ics', label: 'A' }, { url: 'https//typo.example/b.ics', label: 'B' }],
    }));

    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(run.report.sourcesMerged).toBe(1);
    expect(run.report.failures).toEqual([
      { type: 'FetchError', reason: 'Invalid URL: https//typo.example/b.ics', url: 'https//typo.example/b.ics' },
    ]);
    expect(run.calendar).toContain('SUMMARY:[A] Party\n');
    expect(console.error).toHaveBeenCalledWith(
      'Warning: could not fetch https//typo.example/b.ics: Invalid URL: https//typo.example/b.ics'
    );
  });

  it('logs a summary line', async () => {
    respondWith({ 'https://a.example/a.ics': SOURCE_A, 'https://b.example/b.ics': SOURCE_B });

    await runMerge(makeConfig({ sources: [{ url: 'https://a.example/a.ics' }, { url: 'https://b.example/b.ics', label: 'B' }] }));

    expect(console.log).toHaveBeenCalledWith(
      'Wrote out/combined.ics with 2 events from 2 calendars. Labels: B'
    );
  });

  it('routes through the proxy when configured', async () => {
    process.env.PROXY_URL = 'https://proxy.example/';
    respondWith({});

    await runMerge(makeConfig({ proxy: true, sources: [{ url: 'https://a.example/a.ics' }] }));

    const [calledUrl] = mockFetch.mock.calls[0];
    expect(new URL(calledUrl).searchParams.get('url')).toBe('https://a.example/a.ics');
    delete process.env.PROXY_URL;
  });
});

describe('main', () => {
  beforeEach(() => {
    vi.resetAllMocks();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    delete process.env.CAL_LABELS;
    delete process.env.MERGE_NAME;
    delete process.env.FETCH_TIMEOUT;
    delete process.env.FETCH_RETRIES;
    delete process.env.FETCH_PROXY;
  });

  it('reads sources from the environment', async () => {
    process.env.ICS_URLS = 'https://a.example/a.ics';
    process.env.OUT_ICS = 'env.ics';
    respondWith({ 'https://a.example/a.ics': SOURCE_A });

    const run = await main([]);

    expect(run.output).toBe('env.ics');
    expect(run.calendar).toContain('SUMMARY:[Calendar A] Party\n');
    delete process.env.ICS_URLS;
    delete process.env.OUT_ICS;
  });

  it('fails without any source', async () => {
    delete process.env.ICS_URLS;

    await expect(main([])).rejects.toThrow('ICS_URLS is not set');
  });
});
