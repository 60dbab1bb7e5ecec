/**
 * EIOPA リスクフリーレート型定義
 *
 * @description API のワイヤ形式と、整形後のテーブル型
 */

// ============================================
// ワイヤ形式
// ============================================

/** カーブ種別（ボラティリティ調整あり / なし） */
export const CURVE_KINDS = ['with_va', 'no_va'] as const;
export type CurveKind = (typeof CURVE_KINDS)[number];

/** デコード済み JSON 値 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/** メタデータの値（ネストした値もそのまま保持） */
export type MetadataValue = Exclude<JsonValue, null>;

/**
 * 1カーブ分のレコード
 *
 * `data` 以外のフィールドはすべてメタデータ（id, type, region, year, month ...）。
 * `id`（例: "20171231_rfr_spot_with_va_FR"）が文字列ならレート列のキーになる。
 * フィールドの順序はレスポンスのまま。
 */
export interface CurveRecord {
  /** 満期ごとのレート（先頭 = 1年） */
  data: ReadonlyArray<number | null>;
  [field: string]: unknown;
}

/** options エンドポイントが返す値（地域コード、年、月 ...） */
export type OptionValue = JsonValue;

// ============================================
// フィルタ
// ============================================

/** 呼び出し元が渡す年/月の指定 */
export type FilterInput = number | string | readonly (number | string)[] | null | undefined;

/** 正規化済みフィルタ */
export type Filter =
  | { kind: 'absent' }
  | { kind: 'single'; value: number | string }
  | { kind: 'many'; values: readonly (number | string)[] };

// ============================================
// 整形後テーブル
// ============================================

/** レートのセル（短いカーブの範囲外は null） */
export type RateCell = number | null;

/** メタデータのセル（欠損フィールドは null） */
export type MetadataCell = MetadataValue | null;

/**
 * レートテーブル
 *
 * 列 = カーブID（出現順）、行 = 満期（行 i は満期 i + 1 年）
 */
export interface RateTable {
  readonly columns: readonly string[];
  /** 行ラベル（1, 2, ..., N） */
  readonly maturities: readonly number[];
  /** 列ごとのセル列（長さはすべて maturities.length） */
  readonly series: ReadonlyMap<string, readonly RateCell[]>;
}

/**
 * メタデータテーブル（1カーブ1行）
 */
export interface MetadataTable {
  /** 全レコードのフィールド名の和集合（初出順） */
  readonly columns: readonly string[];
  readonly rows: ReadonlyArray<Readonly<Record<string, MetadataCell>>>;
}

/**
 * 問い合わせ結果（レートとメタデータは常に対で返す）
 */
export interface EiopaRfr {
  readonly data: RateTable;
  readonly metadata: MetadataTable;
}
