/**
 * INPUT: 月收入、月租金、租金收入比上限
 * OUTPUT: RentRatioResult（thresholdRM = rentRatio × income，rent ≤ thresholdRM 即通過）
 * POS: 服務層，Condition B 租金收入比規則（與迴歸模型無關）
 */

import { RentRatioResult } from '../../models/affordability';

/**
 * 收入為 0 時 thresholdRM = 0，僅租金亦為 0 才通過（不另設特例）
 */
export function checkRentRatio(income: number, rent: number, rentRatio: number): RentRatioResult {
  const thresholdRM = rentRatio * income;
  return {
    rentRatio,
    thresholdRM,
    pass: rent <= thresholdRM,
  };
}
