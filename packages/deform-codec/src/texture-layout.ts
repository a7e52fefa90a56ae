/**
 * フレームごとの頂点オフセット / 法線をピクセルグリッドへ詰める
 *
 * 横 = アクティブ頂点、縦 = フレーム。行 0 は最後のフレームで、
 * デコード側は「末尾から何フレーム目か」で行を引く。
 */

import { err, ok, Result } from 'neverthrow'
import { Vector3 } from 'three'
import { compressNormal, convertAxes, revertAxes } from './coordinate'
import { reverseSnapshotOrder, validateSnapshots } from './snapshot'
import { getVertexAnimU } from './vertex-group'
import type { BakeError, CoordinateConvention, GroupPartition, PixelGrid, Snapshot } from './types'

/** フレーム方式で頂点のテクセル位置を持つ UV レイヤー名 (全ベイク共通) */
export const VERTEX_ANIM_UV_LAYER = 'vertex_anim'
/** vertex_anim レイヤーの V (テクスチャ縦方向の中央付近) */
export const VERTEX_ANIM_V = 128 / 255

export interface FrameTextureOptions
{
  scaleFactor: number
  convention: CoordinateConvention
  partition: GroupPartition
}

export interface FrameTextures
{
  /** RGBA float。RGB = 変換済みオフセット x scaleFactor、A = 1 */
  offsets: PixelGrid
  /** RGBA [0, 1]。RGB = 変換済み法線を圧縮したもの、A = 1 */
  normals: PixelGrid
}

export function offsetTextureName(name: string, scaleFactor: number): string
{
  return `T_${name}_Scale${scaleFactor}_O`
}

export function normalTextureName(name: string): string
{
  return `T_${name}_N`
}

/**
 * スナップショット列をオフセット / 法線の 2 枚のグリッドに詰める
 * 同じ入力に対しては常に同じバイト列になる
 *
 * @param snapshots - 先頭がベースのスナップショット列 (1 フレーム 1 要素)
 * @param options - スケール、座標系、アクティブ頂点の分割
 */
export function packFrameTextures(
  snapshots: readonly Snapshot[],
  options: FrameTextureOptions,
): Result<FrameTextures, BakeError>
{
  const { scaleFactor, convention, partition } = options

  return validateSnapshots(snapshots, 1).andThen((): Result<FrameTextures, BakeError> =>
  {
    if (partition.activeOrdinals.length !== snapshots[0].vertexCount)
    {
      return err({
        type: 'PRECONDITION_ERROR',
        message: `Partition covers ${partition.activeOrdinals.length} vertices, snapshots hold ${snapshots[0].vertexCount}`,
      })
    }

    const base = snapshots[0].positions
    const width = partition.totalActive
    const height = snapshots.length
    const offsets = new Float32Array(width * height * 4)
    const normals = new Float32Array(width * height * 4)
    const converted = new Vector3()

    // 逆順に処理し、最後のフレームを行 0 に置く
    reverseSnapshotOrder(snapshots.length).forEach((snapshotIndex, row) =>
    {
      const snapshot = snapshots[snapshotIndex]

      for (let v = 0; v < snapshot.vertexCount; v++)
      {
        const column = partition.activeOrdinals[v]
        if (column < 0) continue

        const o = v * 3
        const pixel = (row * width + column) * 4

        convertAxes(
          (snapshot.positions[o] - base[o]) * scaleFactor,
          (snapshot.positions[o + 1] - base[o + 1]) * scaleFactor,
          (snapshot.positions[o + 2] - base[o + 2]) * scaleFactor,
          convention,
          converted,
        )
        offsets[pixel] = converted.x
        offsets[pixel + 1] = converted.y
        offsets[pixel + 2] = converted.z
        offsets[pixel + 3] = 1

        convertAxes(
          snapshot.normals[o],
          snapshot.normals[o + 1],
          snapshot.normals[o + 2],
          convention,
          converted,
        )
        normals[pixel] = compressNormal(converted.x)
        normals[pixel + 1] = compressNormal(converted.y)
        normals[pixel + 2] = compressNormal(converted.z)
        normals[pixel + 3] = 1
      }
    })

    return ok({
      offsets: { width, height, data: offsets },
      normals: { width, height, data: normals },
    })
  })
}

/**
 * 1 オブジェクト分の vertex_anim UV をループごとに作る
 *
 * @param partition - 結合後の全頂点に対する分割
 * @param loopVertexIndices - オブジェクト内のループ -> 頂点インデックス
 * @param vertexOffset - 結合後の頂点列におけるこのオブジェクトの先頭位置
 */
export function buildVertexAnimUVs(
  partition: GroupPartition,
  loopVertexIndices: Uint32Array,
  vertexOffset: number,
): Float32Array
{
  const data = new Float32Array(loopVertexIndices.length * 2)
  for (let loop = 0; loop < loopVertexIndices.length; loop++)
  {
    data[loop * 2] = getVertexAnimU(partition, vertexOffset + loopVertexIndices[loop])
    data[loop * 2 + 1] = VERTEX_ANIM_V
  }
  return data
}

/**
 * オフセットグリッドの 1 テクセルから頂点位置を復元する (シェーダー側デコードと同じ式)
 * position = base + revert(rgb) / scaleFactor
 */
export function decodeOffsetTexel(
  grid: PixelGrid,
  row: number,
  column: number,
  scaleFactor: number,
  convention: CoordinateConvention,
  basePosition: Vector3,
): Vector3
{
  const pixel = (row * grid.width + column) * 4
  return revertAxes(grid.data[pixel], grid.data[pixel + 1], grid.data[pixel + 2], convention)
    .divideScalar(scaleFactor)
    .add(basePosition)
}
