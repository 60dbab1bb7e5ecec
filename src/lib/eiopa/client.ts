/**
 * EIOPA リスクフリーレート API クライアント
 *
 * @description options / with_va / no_va エンドポイントの取得と整形。
 * リトライ・キャッシュは行わず、1呼び出し1リクエスト。
 */

import { InvalidArgumentError, RemoteRejectedError } from '../utils/errors';
import { DEFAULT_TIMEOUT_MS, getJson } from '../utils/http';
import { createLogger, type LogContext, type Logger } from '../utils/logger';
import { normalizeFilter } from './filters';
import { buildOptionsPath, buildRfrPath, DEFAULT_BASE_URL } from './paths';
import {
  parseCurveKind,
  parseCurvePayload,
  parseField,
  parseOptionsPayload,
  parseRegion,
} from './schemas';
import { shapeRfr } from './shape';
import type { CurveKind, EiopaRfr, FilterInput, OptionValue } from './types';

export interface EiopaClientOptions {
  /** ベースURL（省略時は環境変数 EIOPA_API_BASE_URL、なければ既定値） */
  baseUrl?: string;
  /** リクエストタイムアウト（ミリ秒、省略時は環境変数 EIOPA_TIMEOUT_MS、なければ 30000） */
  timeoutMs?: number;
  /** ロガーコンテキスト */
  logContext?: LogContext;
}

/**
 * 環境変数からタイムアウトを読む
 */
function resolveTimeoutMs(timeoutMs: number | undefined): number {
  if (timeoutMs !== undefined) {
    if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
      throw new InvalidArgumentError('timeoutMs must be a positive integer.', 'timeoutMs');
    }
    return timeoutMs;
  }

  const raw = process.env.EIOPA_TIMEOUT_MS;
  if (!raw) {
    return DEFAULT_TIMEOUT_MS;
  }
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError(
      `Invalid EIOPA_TIMEOUT_MS: ${raw}. Must be a positive integer.`,
      'timeoutMs'
    );
  }
  return parsed;
}

/**
 * EIOPA API クライアント
 */
export class EiopaClient {
  readonly baseUrl: string;
  readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options?: EiopaClientOptions) {
    this.baseUrl = options?.baseUrl || process.env.EIOPA_API_BASE_URL || DEFAULT_BASE_URL;
    this.timeoutMs = resolveTimeoutMs(options?.timeoutMs);
    this.logger = createLogger({ module: 'eiopa-client', ...options?.logContext });
  }

  /**
   * GET を実行（失敗はログに残してそのまま投げ直す）
   */
  private async request(url: string): Promise<unknown> {
    const requestLogger = this.logger.child({ url });
    requestLogger.debug('EIOPA API request');
    const timer = requestLogger.startTimer('EIOPA API request');

    try {
      const payload = await getJson(url, { timeoutMs: this.timeoutMs });
      timer.end();
      return payload;
    } catch (error) {
      timer.endWithError(
        error,
        error instanceof RemoteRejectedError ? { statusCode: error.statusCode } : {}
      );
      throw error;
    }
  }

  /**
   * フィールドの取りうる値を取得
   *
   * @param field 'region' / 'year' / 'month' など
   * @returns 値の配列（例: ['AT', 'BE', 'FR', ...]）
   */
  async getOptions(field: string): Promise<OptionValue[]> {
    const validField = parseField(field);
    const payload = await this.request(buildOptionsPath(validField, this.baseUrl));
    return parseOptionsPayload(payload);
  }

  /**
   * リスクフリーレートのカーブを取得
   *
   * @param curveKind 'with_va'（ボラティリティ調整あり）/ 'no_va'（なし）
   * @param region 地域コード（例: 'FR'）
   * @param year 年（単一 or 配列、省略時は全期間）
   * @param month 月（単一 or 配列、省略時は全月）
   *
   * @example
   * ```typescript
   * const rfr = await client.getRfr('with_va', 'FR', [2017, 2018], 12);
   * rfr.data.columns; // ['20171231_rfr_spot_with_va_FR', '20181231_rfr_spot_with_va_FR']
   * ```
   */
  async getRfr(
    curveKind: CurveKind,
    region: string,
    year?: FilterInput,
    month?: FilterInput
  ): Promise<EiopaRfr> {
    const validRegion = parseRegion(region);
    const validKind = parseCurveKind(curveKind);

    const url = buildRfrPath(
      validKind,
      validRegion,
      normalizeFilter(year),
      normalizeFilter(month),
      this.baseUrl
    );

    const payload = await this.request(url);
    const rfr = shapeRfr(parseCurvePayload(payload), { logger: this.logger });

    this.logger.info('EIOPA curves fetched', {
      curveKind: validKind,
      region: validRegion,
      curveCount: rfr.data.columns.length,
      maturityCount: rfr.data.maturities.length,
    });

    return rfr;
  }

  /**
   * ボラティリティ調整ありのカーブを取得
   */
  async getRfrWithVa(region: string, year?: FilterInput, month?: FilterInput): Promise<EiopaRfr> {
    return this.getRfr('with_va', region, year, month);
  }

  /**
   * ボラティリティ調整なしのカーブを取得
   */
  async getRfrNoVa(region: string, year?: FilterInput, month?: FilterInput): Promise<EiopaRfr> {
    return this.getRfr('no_va', region, year, month);
  }
}

/**
 * クライアントインスタンスを作成
 */
export function createEiopaClient(options?: EiopaClientOptions): EiopaClient {
  return new EiopaClient(options);
}

// ============================================
// デフォルトクライアント
// ============================================

let defaultClient: EiopaClient | null = null;

/**
 * デフォルトクライアントを取得（初回呼び出し時に生成）
 */
export function getDefaultClient(): EiopaClient {
  if (!defaultClient) {
    defaultClient = new EiopaClient();
  }
  return defaultClient;
}

/**
 * デフォルトクライアントを破棄（テスト・環境変数変更用）
 */
export function resetDefaultClient(): void {
  defaultClient = null;
}

export function getOptions(field: string): Promise<OptionValue[]> {
  return getDefaultClient().getOptions(field);
}

export function getRfr(
  curveKind: CurveKind,
  region: string,
  year?: FilterInput,
  month?: FilterInput
): Promise<EiopaRfr> {
  return getDefaultClient().getRfr(curveKind, region, year, month);
}

export function getRfrWithVa(region: string, year?: FilterInput, month?: FilterInput): Promise<EiopaRfr> {
  return getDefaultClient().getRfrWithVa(region, year, month);
}

export function getRfrNoVa(region: string, year?: FilterInput, month?: FilterInput): Promise<EiopaRfr> {
  return getDefaultClient().getRfrNoVa(region, year, month);
}
