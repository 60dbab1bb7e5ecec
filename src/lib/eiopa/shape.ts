/**
 * レスポンス整形
 *
 * @description カーブレコードの配列を、レートテーブルとメタデータテーブルの対に変換する
 *
 * - レート: 列 = カーブID（出現順）、行 i = 満期 i + 1 年
 * - メタデータ: 1レコード1行、列 = フィールド名の和集合（初出順）
 */

import { MalformedPayloadError } from '../utils/errors';
import { createLogger, type Logger } from '../utils/logger';
import { CurveValuesSchema, JsonValueSchema } from './schemas';
import type {
  CurveRecord,
  EiopaRfr,
  MetadataCell,
  MetadataTable,
  RateCell,
  RateTable,
} from './types';

/** id を持たないレコードの列キー */
export const UNKNOWN_CURVE_ID = 'unknown';

/** レート列を保持するフィールド名 */
export const DATA_FIELD = 'data';

const defaultLogger = createLogger({ module: 'eiopa-shape' });

export interface ShapeOptions {
  logger?: Logger;
}

/**
 * 空の結果
 */
export function emptyRfr(): EiopaRfr {
  return {
    data: { columns: [], maturities: [], series: new Map() },
    metadata: { columns: [], rows: [] },
  };
}

/**
 * メタデータフィールドを抽出（data 以外すべて、ネストした値もそのまま）
 */
function extractFields(record: CurveRecord, index: number): Map<string, MetadataCell> {
  const fields = new Map<string, MetadataCell>();
  for (const [field, value] of Object.entries(record)) {
    if (field === DATA_FIELD || value === undefined) {
      continue;
    }
    const cell = JsonValueSchema.safeParse(value);
    if (!cell.success) {
      throw new MalformedPayloadError(
        `Curve record at index ${index} has a non-JSON "${field}" field`,
        cell.error
      );
    }
    fields.set(field, cell.data);
  }
  return fields;
}

/**
 * レート列を取得
 *
 * @throws {MalformedPayloadError} data が無い / 数値配列でない
 */
function extractValues(record: CurveRecord, index: number): RateCell[] {
  const values = CurveValuesSchema.safeParse(record.data);
  if (!values.success) {
    throw new MalformedPayloadError(
      `Curve record at index ${index} has no numeric "${DATA_FIELD}" field`,
      values.error
    );
  }
  return values.data;
}

/**
 * 行数に満たない列を null で埋める
 */
function pad(values: readonly RateCell[], rowCount: number): RateCell[] {
  const padded = values.slice();
  while (padded.length < rowCount) {
    padded.push(null);
  }
  return padded;
}

/**
 * カーブレコードを EiopaRfr に整形
 *
 * 同じ id が複数ある場合は後勝ち（列の位置は初出のまま）。
 * メタデータ側は全レコードの行を残す。
 *
 * @throws {MalformedPayloadError} data フィールドが無い、またはメタデータが JSON 値でない
 *
 * @example
 * ```typescript
 * const rfr = shapeRfr([
 *   { id: 'A', type: 'spot', data: [0.01, 0.02] },
 *   { id: 'B', type: 'spot', data: [0.03, 0.04] },
 * ]);
 * rfr.data.columns;      // ['A', 'B']
 * rfr.metadata.columns;  // ['id', 'type']
 * ```
 */
export function shapeRfr(records: readonly CurveRecord[], options?: ShapeOptions): EiopaRfr {
  if (records.length === 0) {
    return emptyRfr();
  }

  const logger = options?.logger ?? defaultLogger;

  const curves = new Map<string, RateCell[]>();
  const duplicateIds = new Set<string>();
  const metadataColumns: string[] = [];
  const seenColumns = new Set<string>();
  const fieldsPerRecord: Array<Map<string, MetadataCell>> = [];

  records.forEach((record, index) => {
    const fields = extractFields(record, index);
    for (const field of fields.keys()) {
      if (!seenColumns.has(field)) {
        seenColumns.add(field);
        metadataColumns.push(field);
      }
    }
    fieldsPerRecord.push(fields);

    const values = extractValues(record, index);
    const id = typeof record.id === 'string' ? record.id : UNKNOWN_CURVE_ID;
    if (curves.has(id)) {
      duplicateIds.add(id);
    }
    // Map.set は既存キーの位置を変えない
    curves.set(id, values);
  });

  if (duplicateIds.size > 0) {
    logger.warn('Duplicate curve ids in response, keeping the last occurrence', {
      duplicateIds: [...duplicateIds],
    });
  }

  let rowCount = 0;
  for (const values of curves.values()) {
    rowCount = Math.max(rowCount, values.length);
  }

  const series = new Map<string, readonly RateCell[]>();
  for (const [id, values] of curves) {
    series.set(id, pad(values, rowCount));
  }

  const data: RateTable = {
    columns: [...curves.keys()],
    maturities: Array.from({ length: rowCount }, (_, i) => i + 1),
    series,
  };

  const metadata: MetadataTable = {
    columns: metadataColumns,
    rows: fieldsPerRecord.map((fields) =>
      Object.fromEntries(metadataColumns.map((column): [string, MetadataCell] => [column, fields.get(column) ?? null]))
    ),
  };

  return { data, metadata };
}

/**
 * セルを取得（列・行が存在しなければ undefined）
 */
export function getRate(table: RateTable, id: string, row: number): RateCell | undefined {
  return table.series.get(id)?.[row];
}

/**
 * 1行（1満期）分のレートを列順で取得
 */
export function getRow(table: RateTable, row: number): Map<string, RateCell> {
  const result = new Map<string, RateCell>();
  if (row < 0 || row >= table.maturities.length) {
    return result;
  }
  for (const id of table.columns) {
    result.set(id, table.series.get(id)?.[row] ?? null);
  }
  return result;
}

/**
 * 先頭数満期のプレビュー文字列
 *
 * @example
 * ```text
 * <EiopaRFR>
 *   20171231_rfr_spot_with_va_FR > 0.0012, 0.0034, 0.0051 ...
 * ```
 */
export function formatRfr(rfr: EiopaRfr, previewCount: number = 3): string {
  const lines = ['<EiopaRFR>'];
  for (const row of rfr.metadata.rows) {
    const id = row.id;
    const label = typeof id === 'string' ? id : '?';
    const key = typeof id === 'string' ? id : UNKNOWN_CURVE_ID;
    const values = (rfr.data.series.get(key) ?? []).slice(0, previewCount);
    const preview = values.map((value) => (value === null ? 'NA' : String(value))).join(', ');
    lines.push(`  ${label} > ${preview} ...`);
  }
  return lines.join('\n');
}
