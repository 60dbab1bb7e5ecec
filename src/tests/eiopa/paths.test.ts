import { describe, it, expect } from 'vitest';
import { buildOptionsPath, buildRfrPath, DEFAULT_BASE_URL } from '@/lib/eiopa/paths';

describe('paths.ts', () => {
  describe('buildOptionsPath', () => {
    it('フィールド名をパスの末尾に付ける', () => {
      expect(buildOptionsPath('region')).toBe(`${DEFAULT_BASE_URL}/region`);
    });

    it.each(['region', 'year', 'month'])('%s: "/field" で終わり "?" を含まない', (field) => {
      const path = buildOptionsPath(field);
      expect(path.endsWith(`/${field}`)).toBe(true);
      expect(path).not.toContain('?');
    });

    it('フィールド名を検証しない', () => {
      expect(buildOptionsPath('no-such-field')).toBe(`${DEFAULT_BASE_URL}/no-such-field`);
    });

    it('ベースURLを差し替えられる（末尾スラッシュは除去）', () => {
      expect(buildOptionsPath('year', 'http://localhost:8080/api/')).toBe(
        'http://localhost:8080/api/year'
      );
    });
  });

  describe('buildRfrPath', () => {
    it('フィルタなしでは "?" を付けない', () => {
      const path = buildRfrPath('with_va', 'FR', '', '');
      expect(path).toBe(`${DEFAULT_BASE_URL}/with_va/FR`);
      expect(path).not.toContain('?');
    });

    it('フィルタ引数は省略できる', () => {
      expect(buildRfrPath('no_va', 'BE')).toBe(`${DEFAULT_BASE_URL}/no_va/BE`);
    });

    it('年のみ: カンマ区切りをそのまま渡す', () => {
      expect(buildRfrPath('with_va', 'FR', '2017,2018', '')).toBe(
        `${DEFAULT_BASE_URL}/with_va/FR?year=2017,2018`
      );
    });

    it('月のみ: "&" を付けない', () => {
      expect(buildRfrPath('no_va', 'DE', '', '6,12')).toBe(
        `${DEFAULT_BASE_URL}/no_va/DE?month=6,12`
      );
    });

    it('年と月: 年が先', () => {
      expect(buildRfrPath('with_va', 'FR', '2017', '12')).toBe(
        `${DEFAULT_BASE_URL}/with_va/FR?year=2017&month=12`
      );
    });

    it('ベースURLを差し替えられる', () => {
      expect(buildRfrPath('with_va', 'FR', '2017,2018', '12', 'http://localhost:8080/api')).toBe(
        'http://localhost:8080/api/with_va/FR?year=2017,2018&month=12'
      );
    });
  });
});
