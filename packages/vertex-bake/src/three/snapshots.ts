/**
 * three.js のメッシュからスナップショット列を作る
 *
 * - シェイプキー方式: ジオメトリ本体を Basis、モーフターゲットをシェイプキーとして扱う
 * - フレーム方式: フレームごとにシーンを動かし、変形後の頂点をワールド座標で取り出す
 */

import {
  createSnapshot,
  validateFrameCounts,
  type BakeError,
  type Snapshot,
} from '@vertex-bake/deform-codec'
import { err, ok, Result, safeTry } from 'neverthrow'
import {
  BufferAttribute,
  BufferGeometry,
  Float32BufferAttribute,
  InterleavedBufferAttribute,
  Mesh,
  SkinnedMesh,
  Vector3,
} from 'three'
import type { FrameSetter } from '../types'

type VertexAttribute = BufferAttribute | InterleavedBufferAttribute

/** Basis に付けるラベル */
export const BASIS_LABEL = 'Basis'

function readVectors(attribute: VertexAttribute): Float32Array
{
  const data = new Float32Array(attribute.count * 3)
  for (let i = 0; i < attribute.count; i++)
  {
    data[i * 3] = attribute.getX(i)
    data[i * 3 + 1] = attribute.getY(i)
    data[i * 3 + 2] = attribute.getZ(i)
  }
  return data
}

function normalizeVectors(data: Float32Array): Float32Array
{
  const v = new Vector3()
  for (let i = 0; i < data.length; i += 3)
  {
    v.fromArray(data, i).normalize().toArray(data, i)
  }
  return data
}

/**
 * 頂点位置とインデックスから頂点法線を計算する
 * インデックスが無い場合は 3 頂点ずつの三角形として扱う
 */
export function computeNormals(positions: Float32Array, index: number[] | null): Float32Array
{
  const geometry = new BufferGeometry()
  geometry.setAttribute('position', new Float32BufferAttribute(positions, 3))
  if (index) geometry.setIndex(index)
  geometry.computeVertexNormals()

  const normals = readVectors(geometry.getAttribute('normal'))
  geometry.dispose()
  return normals
}

function getIndexArray(geometry: BufferGeometry): number[] | null
{
  const index = geometry.getIndex()
  if (!index) return null
  return Array.from({ length: index.count }, (_, i) => index.getX(i))
}

/**
 * ジオメトリのループ -> 頂点インデックス表
 * BufferGeometry は頂点ごとに UV を持つため、ループと頂点は 1 対 1
 */
export function getLoopVertexIndices(geometry: BufferGeometry): Uint32Array
{
  const count = geometry.getAttribute('position').count
  const loops = new Uint32Array(count)
  for (let i = 0; i < count; i++) loops[i] = i
  return loops
}

/**
 * モーフターゲットをシェイプキーとみなしてスナップショット列を作る
 *
 * 先頭は Basis (ジオメトリ本体)。morphTargetsRelative の場合は差分を足して絶対位置にする。
 * モーフ法線があればそれを使い、無ければ変形後の形状から計算する。
 *
 * @param geometry - 対象ジオメトリ
 * @param morphTargetDictionary - Mesh.morphTargetDictionary (ラベル用)
 */
export function snapshotsFromMorphTargets(
  geometry: BufferGeometry,
  morphTargetDictionary?: { [key: string]: number },
): Result<Snapshot[], BakeError>
{
  if (!geometry.hasAttribute('position'))
  {
    return err({ type: 'PRECONDITION_ERROR', message: 'Geometry has no position attribute' })
  }

  const index = getIndexArray(geometry)
  const basePositions = readVectors(geometry.getAttribute('position'))
  const baseNormals = geometry.hasAttribute('normal')
    ? readVectors(geometry.getAttribute('normal'))
    : computeNormals(basePositions, index)

  const labels: string[] = []
  for (const [name, i] of Object.entries(morphTargetDictionary ?? {}))
  {
    labels[i] = name
  }

  const morphPositions = geometry.morphAttributes.position ?? []
  const morphNormals = geometry.morphAttributes.normal ?? []
  const relative = geometry.morphTargetsRelative

  const mismatched = morphPositions.findIndex((attribute) => attribute.count * 3 !== basePositions.length)
  if (mismatched >= 0)
  {
    return err({
      type: 'PRECONDITION_ERROR',
      message: `Morph target ${mismatched} has ${morphPositions[mismatched].count} vertices, base has ${basePositions.length / 3}`,
    })
  }

  return safeTry(function* () {
    const snapshots = [yield* createSnapshot(BASIS_LABEL, basePositions, baseNormals)]

    for (let i = 0; i < morphPositions.length; i++)
    {
      const positions = readVectors(morphPositions[i])
      if (relative)
      {
        for (let j = 0; j < positions.length; j++) positions[j] += basePositions[j]
      }

      let normals: Float32Array
      const morphNormal = morphNormals.at(i)
      if (morphNormal)
      {
        normals = readVectors(morphNormal)
        if (relative)
        {
          for (let j = 0; j < normals.length; j++) normals[j] += baseNormals[j]
          normalizeVectors(normals)
        }
      }
      else
      {
        normals = computeNormals(positions, index)
      }

      snapshots.push(yield* createSnapshot(labels[i] ?? `Key ${i + 1}`, positions, normals))
    }

    return ok(snapshots)
  })
}

/**
 * start から end の手前までのフレーム番号列
 * step が 0 以下なら空
 */
export function frameRange(start: number, end: number, step: number = 1): number[]
{
  const frames: number[] = []
  if (step <= 0) return frames
  for (let frame = start; frame < end; frame += step) frames.push(frame)
  return frames
}

function updatePose(mesh: Mesh): void
{
  mesh.updateWorldMatrix(true, false)
  if (mesh instanceof SkinnedMesh)
  {
    mesh.skeleton.bones.forEach((bone) => bone.updateWorldMatrix(true, false))
  }
}

export interface CollectFrameOptions
{
  /** サンプリング後に戻すフレーム */
  restoreFrame?: number
}

/**
 * フレームごとに setFrame でシーンを動かし、全メッシュの変形後の頂点を 1 つのスナップショットにする
 *
 * 頂点は meshes の順に結合し、位置はワールド座標。
 * モーフと skinning は Mesh.getVertexPosition で評価し、法線は結合した変形後の形状から計算する。
 * 頂点数 / フレーム数の上限はサンプリング前に確認する。
 *
 * @param meshes - 結合順に並んだメッシュ
 * @param frames - サンプリングするフレーム番号
 * @param setFrame - シーンを指定フレームにするコールバック
 */
export function collectFrameSnapshots(
  meshes: readonly Mesh[],
  frames: readonly number[],
  setFrame: FrameSetter,
  options: CollectFrameOptions = {},
): Result<Snapshot[], BakeError>
{
  const vertexCounts = meshes.map((mesh) => mesh.geometry.getAttribute('position')?.count ?? 0)
  const vertexCount = vertexCounts.reduce((sum, count) => sum + count, 0)

  return validateFrameCounts(vertexCount, frames.length).andThen(() =>
  {
    // 結合後のインデックス (インデックスの無いジオメトリは 3 頂点ずつの三角形)
    const mergedIndex: number[] = []
    let offset = 0
    meshes.forEach((mesh, m) =>
    {
      const index = getIndexArray(mesh.geometry)
      if (index)
      {
        index.forEach((i) => mergedIndex.push(i + offset))
      }
      else
      {
        for (let i = 0; i < vertexCounts[m]; i++) mergedIndex.push(i + offset)
      }
      offset += vertexCounts[m]
    })

    const vertex = new Vector3()
    const snapshots: Result<Snapshot, BakeError>[] = frames.map((frame) =>
    {
      setFrame(frame)

      const positions = new Float32Array(vertexCount * 3)
      let base = 0
      meshes.forEach((mesh, m) =>
      {
        updatePose(mesh)
        for (let i = 0; i < vertexCounts[m]; i++)
        {
          mesh.getVertexPosition(i, vertex).applyMatrix4(mesh.matrixWorld).toArray(positions, (base + i) * 3)
        }
        base += vertexCounts[m]
      })

      return createSnapshot(`Frame ${frame}`, positions, computeNormals(positions, mergedIndex))
    })

    if (options.restoreFrame !== undefined) setFrame(options.restoreFrame)

    return Result.combine(snapshots)
  })
}
