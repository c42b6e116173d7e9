/**
 * INPUT: FeatureVector、CoefficientTable
 * OUTPUT: ScoreResult（z, p）、計算明細表（Variable / COEF / INPUT / COEF×INPUT）
 * POS: 服務層，邏輯迴歸評分；z 固定為明細表 COEF×INPUT 欄依序加總
 */

import { BreakdownRow, CoefficientTable, FeatureVector, ScoreResult } from '../../models/affordability';
import { InvalidScoreError } from '../../models/errors';

/**
 * 數值穩定的 logistic 函數
 * z < 0 時改用 exp(z) / (1 + exp(z))，避免 exp(-z) 溢位
 */
export function sigmoid(z: number): number {
  if (z >= 0) {
    return 1 / (1 + Math.exp(-z));
  }
  const ez = Math.exp(z);
  return ez / (1 + ez);
}

/** 依係數表順序展開明細；特徵向量缺少的項目視為 0 */
export function buildBreakdown(features: FeatureVector, coefficients: CoefficientTable): BreakdownRow[] {
  return coefficients.entries.map(({ feature, weight }) => {
    const input = features[feature] ?? 0;
    const product = weight * input;
    // -0 一律寫成 0，CSV 還原後逐列相等
    return { variable: feature, coefficient: weight, input, product: product === 0 ? 0 : product };
  });
}

/** COEF×INPUT 欄依序加總（CSV 重新加總須得到相同 z） */
export function sumBreakdownProducts(rows: readonly Pick<BreakdownRow, 'product'>[]): number {
  return rows.reduce((sum, row) => sum + row.product, 0);
}

/**
 * 由明細表計算 z 與 p
 * @throws InvalidScoreError z 非有限數（NaN / ±Infinity）
 */
export function scoreBreakdown(rows: readonly BreakdownRow[]): ScoreResult {
  const z = sumBreakdownProducts(rows);
  if (!Number.isFinite(z)) {
    throw new InvalidScoreError(z);
  }
  return Object.freeze({ z, p: sigmoid(z) });
}

export function score(features: FeatureVector, coefficients: CoefficientTable): ScoreResult {
  return scoreBreakdown(buildBreakdown(features, coefficients));
}
