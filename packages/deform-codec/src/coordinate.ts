import { err, ok, Result } from 'neverthrow'
import { Vector3 } from 'three'
import { COORDINATE_CONVENTIONS, type BakeError, type CoordinateConvention } from './types'

function isCoordinateConvention(tag: string): tag is CoordinateConvention
{
  return COORDINATE_CONVENTIONS.some((c) => c === tag)
}

/**
 * 座標系タグを検証する
 * 不明なタグは既定値に寄せずにエラーとする
 */
export function resolveConvention(tag: string): Result<CoordinateConvention, BakeError>
{
  if (!isCoordinateConvention(tag))
  {
    return err({
      type: 'CONFIGURATION_ERROR',
      message: `Unknown coordinate convention "${tag}" (expected ${COORDINATE_CONVENTIONS.join(' or ')})`,
    })
  }
  return ok(tag)
}

/**
 * 入力座標系のベクトルを出力座標系へ並べ替える
 * オフセットと法線の両方に同じ表を使う
 *
 * SOURCE_NATIVE: (x, -y, z)
 * ALT_ENGINE:    (-y, -x, z)
 */
export function convertAxes(
  x: number,
  y: number,
  z: number,
  convention: CoordinateConvention,
  target: Vector3 = new Vector3(),
): Vector3
{
  switch (convention)
  {
    case 'SOURCE_NATIVE':
      return target.set(x, -y, z)
    case 'ALT_ENGINE':
      return target.set(-y, -x, z)
    default: {
      const unreachable: never = convention
      throw new Error(`Unhandled coordinate convention: ${String(unreachable)}`)
    }
  }
}

/**
 * convertAxes の逆変換
 * どちらの表も自己逆写像なので同じ並べ替えになる
 */
export function revertAxes(
  x: number,
  y: number,
  z: number,
  convention: CoordinateConvention,
  target: Vector3 = new Vector3(),
): Vector3
{
  return convertAxes(x, y, z, convention, target)
}

/** [-1, 1] の法線成分を [0, 1] に詰める */
export function compressNormal(component: number): number
{
  return (component + 1) * 0.5
}
