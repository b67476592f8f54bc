import { describe, it, expect, vi, afterEach } from 'vitest';
import { loadTable } from '../viewer.js';
import { getFeedVariant } from '../feed/variants.js';
import { FeedParseError } from '../feed/fetcher.js';
import { DEFAULT_CONFIG } from '../config.js';

function mockFeed(body: string) {
  const mockFetch = vi.fn().mockResolvedValue({
    ok: true,
    status: 200,
    statusText: 'OK',
    text: () => Promise.resolve(body),
  });
  global.fetch = mockFetch;
  return mockFetch;
}

describe('viewer', () => {
  const originalFetch = global.fetch;

  afterEach(() => {
    global.fetch = originalFetch;
  });

  describe('loadTable', () => {
    it('should fetch and parse the observations feed into a table', async () => {
      const mockFetch = mockFeed('#STN LAT LON\n#text deg deg\n41001 34.7 -72.7\n46050 44.6 -124.5\n');

      const table = await loadTable(getFeedVariant('observations', DEFAULT_CONFIG), DEFAULT_CONFIG);

      expect(mockFetch).toHaveBeenCalledTimes(1);
      expect(mockFetch.mock.calls[0][0]).toBe(DEFAULT_CONFIG.feeds.observationsUrl);
      expect(table.rows).toEqual([
        ['41001', '34.7', '-72.7'],
        ['46050', '44.6', '-124.5'],
      ]);
      expect(table.selected).toBeUndefined();
    });

    it('should fail on a station without coordinates', async () => {
      mockFeed('<stations><station id="x1" lon="2"/></stations>');

      await expect(loadTable(getFeedVariant('stations', DEFAULT_CONFIG), DEFAULT_CONFIG)).rejects.toThrow(
        FeedParseError
      );
    });
  });
});
