/**
 * リクエストパス構築
 *
 * @description options / with_va / no_va の3系統のパスを組み立てる（I/Oなし）
 */

import type { CurveKind } from './types';

/** API ベースURL */
export const DEFAULT_BASE_URL = 'https://mehdiechchelh.com/api';

/**
 * 末尾のスラッシュを除去
 */
function trimBase(baseUrl: string): string {
  return baseUrl.replace(/\/+$/, '');
}

/**
 * options エンドポイントのパス
 *
 * フィールド名の妥当性はリモート側で判定する
 *
 * @example
 * ```typescript
 * buildOptionsPath('region'); // 'https://mehdiechchelh.com/api/region'
 * ```
 */
export function buildOptionsPath(field: string, baseUrl: string = DEFAULT_BASE_URL): string {
  return `${trimBase(baseUrl)}/${field}`;
}

/**
 * リスクフリーレートのパス
 *
 * クエリは year → month の順。空のフィルタはキーも `&` も出さず、
 * 両方空なら `?` も付けない。値のカンマはエンコードしない。
 *
 * @param yearFilter カンマ区切りの年（例: "2017,2018"）または空文字
 * @param monthFilter カンマ区切りの月（例: "12"）または空文字
 */
export function buildRfrPath(
  curveKind: CurveKind,
  region: string,
  yearFilter: string = '',
  monthFilter: string = '',
  baseUrl: string = DEFAULT_BASE_URL
): string {
  const path = `${trimBase(baseUrl)}/${curveKind}/${region}`;

  const params: string[] = [];
  if (yearFilter) {
    params.push(`year=${yearFilter}`);
  }
  if (monthFilter) {
    params.push(`month=${monthFilter}`);
  }

  return params.length > 0 ? `${path}?${params.join('&')}` : path;
}
