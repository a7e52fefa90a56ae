import { TARGET_UNITS, type TargetUnit } from './types'

/**
 * 出力単位ごとのクリップ前に許容される最大移動量 (メートル)
 */
export const MAX_ALLOWED_DEVIATION: Readonly<Record<TargetUnit, number>> = {
  MM: 0.001,
  CM: 0.01,
  DM: 0.1,
  M: 1.0,
}

export function isTargetUnit(unit: string): unit is TargetUnit
{
  return TARGET_UNITS.some((u) => u === unit)
}

/**
 * 出力単位から許容最大移動量を返す
 * 不明な単位はセンチメートル扱い (座標系タグと違い、ここはエラーにしない)
 */
export function getMaxAllowedDeviation(unit: string): number
{
  return isTargetUnit(unit) ? MAX_ALLOWED_DEVIATION[unit] : MAX_ALLOWED_DEVIATION.CM
}

/**
 * 最大移動量からオフセットに掛ける整数スケールを求める
 * 結果はテクスチャ名に埋め込まれ、デコード側で割り戻される
 *
 * @param maxDeviation - findMaxDeviation の結果
 * @param unit - 出力単位
 * @returns 1 以上の整数
 */
export function calculateScaleFactor(maxDeviation: number, unit: string): number
{
  const maxAllowedDeviation = getMaxAllowedDeviation(unit)
  if (maxDeviation > 0)
  {
    return Math.ceil(maxDeviation / maxAllowedDeviation)
  }
  return 1
}
