import { err, ok, Result } from 'neverthrow'
import { Vector3 } from 'three'
import type { BakeError, Snapshot, VertexSample } from './types'

/**
 * xyz 配列からスナップショットを作成する
 * normals を省略した場合は +Z で埋める
 *
 * @param label - 診断用ラベル
 * @param positions - 頂点座標 (xyz x 頂点数)
 * @param normals - 頂点法線 (xyz x 頂点数)
 */
export function createSnapshot(
  label: string,
  positions: ArrayLike<number>,
  normals?: ArrayLike<number>,
): Result<Snapshot, BakeError>
{
  if (positions.length % 3 !== 0)
  {
    return err({
      type: 'PRECONDITION_ERROR',
      message: `Snapshot "${label}" has ${positions.length} position components, not a multiple of 3`,
    })
  }

  const vertexCount = positions.length / 3
  if (normals && normals.length !== positions.length)
  {
    return err({
      type: 'PRECONDITION_ERROR',
      message: `Snapshot "${label}" has ${normals.length / 3} normals for ${vertexCount} vertices`,
    })
  }

  const normalArray = new Float32Array(positions.length)
  if (normals)
  {
    normalArray.set(normals)
  }
  else
  {
    for (let i = 2; i < normalArray.length; i += 3) normalArray[i] = 1
  }

  return ok({
    label,
    vertexCount,
    positions: Float32Array.from(positions),
    normals: normalArray,
  })
}

/**
 * スナップショットから 1 頂点分のサンプルを取り出す
 */
export function getVertexSample(snapshot: Snapshot, index: number): VertexSample
{
  const offset = index * 3
  return {
    index,
    position: new Vector3(
      snapshot.positions[offset],
      snapshot.positions[offset + 1],
      snapshot.positions[offset + 2],
    ),
    normal: new Vector3(
      snapshot.normals[offset],
      snapshot.normals[offset + 1],
      snapshot.normals[offset + 2],
    ),
  }
}

/**
 * 全スナップショットが同じ頂点数を持ち、最低 minCount 個あることを確認する
 */
export function validateSnapshots(
  snapshots: readonly Snapshot[],
  minCount: number,
): Result<void, BakeError>
{
  if (snapshots.length < minCount)
  {
    return err({
      type: 'PRECONDITION_ERROR',
      message: `At least ${minCount} snapshots are required, got ${snapshots.length}`,
    })
  }

  const base = snapshots[0]
  const mismatch = snapshots.find((s) => s.vertexCount !== base.vertexCount)
  if (mismatch)
  {
    return err({
      type: 'PRECONDITION_ERROR',
      message: `Snapshot "${mismatch.label}" has ${mismatch.vertexCount} vertices, base "${base.label}" has ${base.vertexCount}`,
    })
  }

  return ok(undefined)
}

/**
 * 処理順 (最後のスナップショットが先頭) のインデックス列を返す
 * テクスチャの行 0 が最後のフレームになるという、デコード側との取り決め
 * 走査と書き込みの両方がこの順序を使う
 */
export function reverseSnapshotOrder(count: number): number[]
{
  const order: number[] = []
  for (let i = count - 1; i >= 0; i--) order.push(i)
  return order
}
