/**
 * エラー分類
 *
 * @description 引数不正 / リモート拒否 / リモート到達不可 / ペイロード不正 の4種類。
 * いずれもリトライせず、呼び出し元にそのまま伝播させる。
 */

/**
 * 本ライブラリが投げるエラーの基底クラス
 */
export class EiopaError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EiopaError';
  }
}

/**
 * 呼び出し元の引数が不正（ネットワーク呼び出し前に検出）
 */
export class InvalidArgumentError extends EiopaError {
  constructor(
    message: string,
    public readonly argument: string
  ) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * リモートが非2xxステータスを返した
 */
export class RemoteRejectedError extends EiopaError {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly url: string
  ) {
    super(message);
    this.name = 'RemoteRejectedError';
  }
}

/**
 * ネットワーク到達不可 / タイムアウト
 */
export class RemoteUnreachableError extends EiopaError {
  constructor(
    message: string,
    public readonly url: string,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = 'RemoteUnreachableError';
  }
}

/**
 * レスポンスからテーブルを組み立てられない
 */
export class MalformedPayloadError extends EiopaError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'MalformedPayloadError';
  }
}
