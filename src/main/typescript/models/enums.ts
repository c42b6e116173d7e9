/**
 * INPUT: 無
 * OUTPUT: 可負擔判定標籤、編碼規則等列舉定義
 * POS: 資料模型層，定義全系統共用的列舉常數
 */

/** 條件判定標籤（與試算表 IF 公式輸出一致） */
export enum AffordabilityLabel {
  AFFORD = 'Afford',
  NOT_AFFORD = 'Not Afford',
}

/** 類別變數編碼時實際套用的規則 */
export enum EncodingRule {
  /** 選擇基準類別，不啟用任何 dummy */
  BASELINE = 'BASELINE',
  /** 啟用對應的 dummy 特徵（可多對一） */
  DUMMY = 'DUMMY',
  /** 非基準類別但係數表無對應項目 → 視同基準類別，全部 dummy 為 0 */
  UNMAPPED_LEVEL_AS_BASELINE = 'UNMAPPED_LEVEL_AS_BASELINE',
}

/** 布林判定轉標籤 */
export function toLabel(pass: boolean): AffordabilityLabel {
  return pass ? AffordabilityLabel.AFFORD : AffordabilityLabel.NOT_AFFORD;
}
