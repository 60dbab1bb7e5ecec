/**
 * utils/http.ts のユニットテスト
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { DEFAULT_TIMEOUT_MS, getJson } from '@/lib/utils/http';
import {
  MalformedPayloadError,
  RemoteRejectedError,
  RemoteUnreachableError,
} from '@/lib/utils/errors';

const URL_UNDER_TEST = 'http://localhost:8080/api/region';

describe('http.ts', () => {
  const mockFetch = vi.fn();

  beforeEach(() => {
    vi.stubGlobal('fetch', mockFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('getJson', () => {
    it('2xx ならデコード済み JSON を返す', async () => {
      mockFetch.mockResolvedValue(new Response(JSON.stringify(['BE', 'FR']), { status: 200 }));

      await expect(getJson(URL_UNDER_TEST)).resolves.toEqual(['BE', 'FR']);
    });

    it('GET を1回だけ実行し、タイムアウト用の signal を渡す', async () => {
      mockFetch.mockResolvedValue(new Response('[]', { status: 200 }));

      await getJson(URL_UNDER_TEST, { timeoutMs: 5000 });

      expect(mockFetch).toHaveBeenCalledTimes(1);
      const [calledUrl, init] = mockFetch.mock.calls[0];
      expect(calledUrl).toBe(URL_UNDER_TEST);
      expect(init.method).toBe('GET');
      expect(init.headers).toEqual({ 'Accept': 'application/json' });
      expect(init.signal).toBeInstanceOf(AbortSignal);
    });

    it('デフォルトタイムアウトは30秒', () => {
      expect(DEFAULT_TIMEOUT_MS).toBe(30000);
    });

    it('非2xxは RemoteRejectedError（ステータスコード付き）', async () => {
      mockFetch.mockResolvedValue(new Response('not found', { status: 404, statusText: 'Not Found' }));

      const error = await getJson(URL_UNDER_TEST).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RemoteRejectedError);
      expect(error).toMatchObject({
        name: 'RemoteRejectedError',
        message: 'HTTP 404: Not Found',
        statusCode: 404,
        url: URL_UNDER_TEST,
      });
    });

    it('5xx でもリトライしない', async () => {
      mockFetch.mockResolvedValue(new Response('', { status: 503, statusText: 'Service Unavailable' }));

      await expect(getJson(URL_UNDER_TEST)).rejects.toThrow(RemoteRejectedError);
      expect(mockFetch).toHaveBeenCalledTimes(1);
    });

    it('ネットワークエラーは RemoteUnreachableError（cause 付き）', async () => {
      const cause = new TypeError('fetch failed');
      mockFetch.mockRejectedValue(cause);

      const error = await getJson(URL_UNDER_TEST).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RemoteUnreachableError);
      expect(error).toMatchObject({
        message: `Request failed: ${URL_UNDER_TEST}`,
        url: URL_UNDER_TEST,
      });
      expect((error as RemoteUnreachableError).cause).toBe(cause);
      expect(mockFetch).toHaveBeenCalledTimes(1);
    });

    it('タイムアウトは RemoteUnreachableError', async () => {
      mockFetch.mockRejectedValue(Object.assign(new Error('aborted'), { name: 'TimeoutError' }));

      await expect(getJson(URL_UNDER_TEST, { timeoutMs: 5000 })).rejects.toThrow(
        `Request timed out after 5000ms: ${URL_UNDER_TEST}`
      );
    });

    it('JSON でないボディは MalformedPayloadError', async () => {
      mockFetch.mockResolvedValue(new Response('<html></html>', { status: 200 }));

      await expect(getJson(URL_UNDER_TEST)).rejects.toThrow(MalformedPayloadError);
    });
  });
});
