/**
 * INPUT: 無
 * OUTPUT: 可負擔評估錯誤分類（AffordabilityError 及其子類）
 * POS: 資料模型層，API 層依 code / status 回應錯誤
 */

export type AffordabilityErrorCode =
  | 'INVALID_PROFILE'
  | 'INVALID_COEFFICIENT_TABLE'
  | 'INVALID_ENCODING_SCHEMA'
  | 'INVALID_SCORE'
  | 'AUDIT_SINK_FAILED'
  | 'UNKNOWN_MODEL_PROFILE';

export class AffordabilityError extends Error {
  public readonly code: AffordabilityErrorCode;
  public readonly status: number;

  constructor(code: AffordabilityErrorCode, status: number, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** 受訪者資料不合法（選項不在值域內、年齡超出範圍、金額為負等），評分前即中止 */
export class InvalidProfileError extends AffordabilityError {
  public readonly field: string;

  constructor(field: string, message: string) {
    super('INVALID_PROFILE', 400, message);
    this.field = field;
  }
}

/** 係數表設定錯誤，啟動時即失敗 */
export class InvalidCoefficientTableError extends AffordabilityError {
  constructor(tableId: string, message: string) {
    super('INVALID_COEFFICIENT_TABLE', 500, `Coefficient table "${tableId}": ${message}`);
  }
}

/** 編碼 schema 設定錯誤，或 schema 與係數表不相符 */
export class InvalidEncodingSchemaError extends AffordabilityError {
  constructor(schemaId: string, message: string) {
    super('INVALID_ENCODING_SCHEMA', 500, `Encoding schema "${schemaId}": ${message}`);
  }
}

/** 線性預測值 z 非有限數，不得以 Not Afford 回報 */
export class InvalidScoreError extends AffordabilityError {
  public readonly z: number;

  constructor(z: number) {
    super('INVALID_SCORE', 422, `Linear predictor z is not finite (${String(z)}); check coefficients and inputs`);
    this.z = z;
  }
}

/** 稽核紀錄寫入失敗，僅作為警告，不影響評估結果 */
export class AuditSinkError extends AffordabilityError {
  public readonly sink: string;

  constructor(sink: string, message: string) {
    super('AUDIT_SINK_FAILED', 502, message);
    this.sink = sink;
  }
}

export class UnknownModelProfileError extends AffordabilityError {
  constructor(profileId: string, known: readonly string[]) {
    super(
      'UNKNOWN_MODEL_PROFILE',
      400,
      `Unknown model profile "${profileId}"; expected one of ${known.join(' / ')}`,
    );
  }
}
