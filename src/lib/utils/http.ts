/**
 * HTTP GET ユーティリティ
 *
 * @description 1回だけ GET を実行し、デコード済み JSON を返す。
 * リトライは行わない（失敗は即座に呼び出し元へ）。
 */

import {
  MalformedPayloadError,
  RemoteRejectedError,
  RemoteUnreachableError,
} from './errors';

/** デフォルトタイムアウト（ミリ秒） */
export const DEFAULT_TIMEOUT_MS = 30000;

export interface GetJsonOptions {
  /** リクエストタイムアウト（ミリ秒、デフォルト: 30000） */
  timeoutMs?: number;
}

/**
 * タイムアウト起因の中断かどうかを判定
 */
function isTimeoutError(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === 'TimeoutError' || error.name === 'AbortError')
  );
}

/**
 * GET リクエストを実行して JSON を返す
 *
 * @throws {RemoteRejectedError} 非2xxステータス
 * @throws {RemoteUnreachableError} ネットワークエラー / タイムアウト
 * @throws {MalformedPayloadError} ボディが JSON でない
 *
 * @example
 * ```typescript
 * const regions = await getJson('https://example.com/api/region');
 * ```
 */
export async function getJson(url: string, options?: GetJsonOptions): Promise<unknown> {
  const timeoutMs = options?.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  let response: Response;
  try {
    response = await fetch(url, {
      method: 'GET',
      headers: {
        'Accept': 'application/json',
      },
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (error) {
    const message = isTimeoutError(error)
      ? `Request timed out after ${timeoutMs}ms: ${url}`
      : `Request failed: ${url}`;
    throw new RemoteUnreachableError(message, url, error);
  }

  if (!response.ok) {
    throw new RemoteRejectedError(
      `HTTP ${response.status}: ${response.statusText}`,
      response.status,
      url
    );
  }

  try {
    return await response.json();
  } catch (error) {
    // ボディ読み込み中のタイムアウトは到達不可として扱う
    if (isTimeoutError(error)) {
      throw new RemoteUnreachableError(`Request timed out after ${timeoutMs}ms: ${url}`, url, error);
    }
    throw new MalformedPayloadError(`Response body is not valid JSON: ${url}`, error);
  }
}
