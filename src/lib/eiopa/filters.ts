/**
 * 年/月フィルタの正規化
 *
 * @description 単一値・配列・未指定を Filter に揃え、API のカンマ区切り表現に変換する
 */

import type { Filter, FilterInput } from './types';

const ABSENT: Filter = { kind: 'absent' };

/**
 * クエリに載せられる値か（空白のみの文字列・NaN・Infinity は不可）
 */
function isUsableValue(value: number | string): boolean {
  return typeof value === 'number' ? Number.isFinite(value) : value.trim() !== '';
}

/**
 * 呼び出し元の指定を Filter に変換
 *
 * 使えない値は読み飛ばし、残らなければ未指定扱い
 */
export function toFilter(input: FilterInput): Filter {
  if (input === null || input === undefined) {
    return ABSENT;
  }
  if (typeof input === 'string' || typeof input === 'number') {
    return isUsableValue(input) ? { kind: 'single', value: input } : ABSENT;
  }
  const values = input.filter(isUsableValue);
  if (values.length === 0) {
    return ABSENT;
  }
  return { kind: 'many', values };
}

/**
 * Filter を API のクエリ値に変換（未指定は空文字）
 *
 * @example
 * ```typescript
 * serializeFilter(toFilter([2017, 2018])); // '2017,2018'
 * ```
 */
export function serializeFilter(filter: Filter): string {
  switch (filter.kind) {
    case 'absent':
      return '';
    case 'single':
      return String(filter.value);
    case 'many':
      return filter.values.map(String).join(',');
  }
}

/**
 * toFilter → serializeFilter のショートカット
 */
export function normalizeFilter(input: FilterInput): string {
  return serializeFilter(toFilter(input));
}
