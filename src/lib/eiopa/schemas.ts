/**
 * 引数・レスポンスのスキーマ
 */

import { z } from 'zod';
import { InvalidArgumentError, MalformedPayloadError } from '../utils/errors';
import {
  CURVE_KINDS,
  type CurveKind,
  type CurveRecord,
  type JsonValue,
  type OptionValue,
} from './types';

// ============================================
// 引数
// ============================================

export const CurveKindSchema = z.enum(CURVE_KINDS);

export const RegionSchema = z.string().min(1, "'region' must be a non-empty string.");

export const FieldSchema = z.string().min(1, "'field' must be a non-empty string.");

/**
 * 引数を検証し、失敗時は InvalidArgumentError を投げる
 */
function parseArgument<T>(schema: z.ZodType<T>, value: unknown, argument: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const message = result.error.issues[0]?.message ?? `Invalid '${argument}'`;
    throw new InvalidArgumentError(message, argument);
  }
  return result.data;
}

export function parseCurveKind(value: unknown): CurveKind {
  return parseArgument(CurveKindSchema, value, 'curveKind');
}

export function parseRegion(value: unknown): string {
  return parseArgument(RegionSchema, value, 'region');
}

export function parseField(value: unknown): string {
  return parseArgument(FieldSchema, value, 'field');
}

// ============================================
// レスポンス
// ============================================

/** デコード済み JSON 値（ネスト可） */
export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(z.string(), JsonValueSchema),
  ])
);

/** 満期ごとのレート列 */
export const CurveValuesSchema = z.array(z.number().nullable());

/** options エンドポイントのレスポンス（配列であることだけを確認） */
export const OptionsPayloadSchema = z.array(JsonValueSchema);

/**
 * カーブレコードの配列
 *
 * z.record はキーを入力順のまま返す（z.object は宣言キーを先頭に並べ替える）
 */
export const CurvePayloadSchema = z.array(z.record(z.string(), z.unknown()));

/**
 * zod のエラーを1行に要約
 */
function describeIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 3)
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * options レスポンスを検証
 *
 * @throws {MalformedPayloadError} 配列でない場合
 */
export function parseOptionsPayload(payload: unknown): OptionValue[] {
  const result = OptionsPayloadSchema.safeParse(payload);
  if (!result.success) {
    throw new MalformedPayloadError(
      `Options payload is not a list of values: ${describeIssues(result.error)}`,
      result.error
    );
  }
  return result.data;
}

/**
 * カーブレコード配列を検証
 *
 * フィールドの順序は変えない（メタデータ列の初出順がそのまま残る）
 *
 * @throws {MalformedPayloadError} オブジェクトの配列でない / data フィールドが欠けている場合
 */
export function parseCurvePayload(payload: unknown): CurveRecord[] {
  const result = CurvePayloadSchema.safeParse(payload);
  if (!result.success) {
    throw new MalformedPayloadError(
      `Curve payload cannot be shaped: ${describeIssues(result.error)}`,
      result.error
    );
  }

  return result.data.map((record, index) => {
    const values = CurveValuesSchema.safeParse(record.data);
    if (!values.success) {
      throw new MalformedPayloadError(
        `Curve record at index ${index} has no numeric "data" field`,
        values.error
      );
    }
    // 既存キーへの代入なので data の位置も変わらない
    return { ...record, data: values.data };
  });
}
