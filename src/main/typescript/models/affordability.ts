/**
 * INPUT: enums.ts（AffordabilityLabel, EncodingRule）
 * OUTPUT: 可負擔評估引擎所有類型定義（係數表、編碼 schema、特徵向量、判定結果）
 * POS: 資料模型層，定義 Feature Encoder / Scorer / Evaluator 共用 TypeScript 介面
 */

import { AffordabilityLabel, EncodingRule } from './enums';

// ─────────────────────────────────────────────────────────────────
// 設定資料（啟動時載入，之後唯讀）
// ─────────────────────────────────────────────────────────────────

/** 係數表單一項目 */
export interface CoefficientEntry {
  readonly feature: string;
  readonly weight: number;
}

/** 邏輯迴歸係數表（含截距 Constant），依原始順序排列 */
export interface CoefficientTable {
  readonly id: string;
  readonly description: string;
  readonly entries: readonly CoefficientEntry[];
}

/** 數值欄位（年齡） */
export interface AgeField {
  readonly key: string;
  readonly label: string;
  /** 對應係數表特徵名稱（直接帶入年齡數值） */
  readonly feature: string;
  readonly min: number;
  readonly max: number;
}

/** 類別變數群組 */
export interface CategoricalGroup {
  readonly key: string;
  readonly label: string;
  readonly options: readonly string[];
  readonly baselineIndex: number;
  /**
   * 與 options 等長；第 i 個選項啟用的 dummy 特徵。
   * null 表示不啟用（基準類別，或係數表無對應項目的層級）
   */
  readonly levelFeatures: readonly (string | null)[];
}

/** 編碼 schema（已綁定一張係數表） */
export interface EncodingSchema {
  readonly id: string;
  readonly version: number;
  readonly description: string;
  readonly coefficientTableId: string;
  readonly constantFeature: string;
  readonly age: AgeField;
  readonly groups: readonly CategoricalGroup[];
  /** 綁定係數表的特徵名稱（依係數表順序），即特徵向量的完整 key 集合 */
  readonly featureNames: readonly string[];
}

/** schema + 係數表組合 */
export interface ModelProfile {
  readonly schema: EncodingSchema;
  readonly coefficients: CoefficientTable;
}

// ─────────────────────────────────────────────────────────────────
// 單次評估
// ─────────────────────────────────────────────────────────────────

/** 受訪者資料：年齡 + 各類別群組所選選項（以 group key 為鍵） */
export interface RespondentProfile {
  age: number;
  selections: Readonly<Record<string, string>>;
}

/** 特徵向量：特徵名稱 → 啟用值 */
export type FeatureVector = Readonly<Record<string, number>>;

/** 單一群組的編碼結果 */
export interface GroupEncoding {
  groupKey: string;
  option: string;
  optionIndex: number;
  rule: EncodingRule;
  /** 啟用的特徵；未啟用時為 null */
  feature: string | null;
}

export interface ScoreResult {
  /** 線性預測值 z = Σ coef × input */
  readonly z: number;
  /** p = sigmoid(z) */
  readonly p: number;
}

/** 計算明細表單列（Variable / COEF / INPUT / COEF×INPUT） */
export interface BreakdownRow {
  variable: string;
  coefficient: number;
  input: number;
  product: number;
}

/** 租金收入比規則結果 */
export interface RentRatioResult {
  rentRatio: number;
  /** rentRatio × income（RM） */
  thresholdRM: number;
  pass: boolean;
}

/** evaluate() 輸入 */
export interface EvaluationInput {
  profile: RespondentProfile;
  income: number;
  rent: number;
  probabilityThreshold: number;
  rentRatio: number;
  coefficients: CoefficientTable;
  schema: EncodingSchema;
}

/** 可負擔判定結果（建立後不可變） */
export interface AffordabilityVerdict {
  readonly schemaId: string;
  readonly coefficientTableId: string;
  /** Condition A：p ≥ probabilityThreshold */
  readonly conditionA: boolean;
  /** Condition B：rent ≤ rentRatio × income */
  readonly conditionB: boolean;
  readonly overall: boolean;
  readonly labels: {
    readonly conditionA: AffordabilityLabel;
    readonly conditionB: AffordabilityLabel;
    readonly overall: AffordabilityLabel;
  };
  readonly z: number;
  readonly p: number;
  readonly probabilityThreshold: number;
  readonly rentRatio: number;
  readonly income: number;
  readonly rent: number;
  readonly thresholdRM: number;
  readonly breakdown: readonly BreakdownRow[];
}

/** 稽核紀錄（每次評估至多寫入一筆） */
export interface EvaluationRecord {
  evaluationId: string;
  evaluatedAt: string;
  schemaId: string;
  coefficientTableId: string;
  profile: RespondentProfile;
  income: number;
  rent: number;
  rentRatio: number;
  thresholdRM: number;
  probabilityThreshold: number;
  z: number;
  p: number;
  conditionA: boolean;
  conditionB: boolean;
  overall: boolean;
}

/** API 評估請求（profileId 省略時使用伺服器預設 profile） */
export interface EvaluationRequest {
  profileId?: string;
  profile: RespondentProfile;
  income: number;
  rent: number;
  rentRatio: number;
  probabilityThreshold: number;
}
