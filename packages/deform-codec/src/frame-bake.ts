import { err, ok, Result, safeTry } from 'neverthrow'
import { resolveConvention } from './coordinate'
import { findMaxDeviation } from './deviation'
import { calculateScaleFactor } from './scale'
import { validateLoops } from './shape-key-bake'
import { validateSnapshots } from './snapshot'
import {
  buildVertexAnimUVs,
  normalTextureName,
  offsetTextureName,
  packFrameTextures,
  VERTEX_ANIM_UV_LAYER,
} from './texture-layout'
import { partitionVertices, type PartitionSource } from './vertex-group'
import type { BakeError, GroupPartition, PixelGrid, Snapshot } from './types'

/** テクスチャ幅 (頂点数) の上限 */
export const MAX_VERTEX_COUNT = 8192
/** テクスチャ高さ (フレーム数) の上限 */
export const MAX_FRAME_COUNT = 8192

/**
 * 頂点数を変えない変形系モディファイアのみ許可する
 */
export const DEFAULT_ALLOWED_MODIFIERS: readonly string[] = [
  'ARMATURE',
  'CAST',
  'CURVE',
  'DISPLACE',
  'HOOK',
  'LAPLACIANDEFORM',
  'LATTICE',
  'MESH_DEFORM',
  'SHRINKWRAP',
  'SIMPLE_DEFORM',
  'SMOOTH',
  'CORRECTIVE_SMOOTH',
  'LAPLACIANSMOOTH',
  'SURFACE_DEFORM',
  'WARP',
  'WAVE',
]

export interface FrameBakeObject extends PartitionSource
{
  /** オブジェクトに積まれたモディファイアの種類 */
  modifiers?: readonly string[]
  /** オブジェクト内のループ -> 頂点インデックス */
  loopVertexIndices: Uint32Array
}

/**
 * フレーム方式の入力
 * snapshots は objects の頂点を結合順に並べたもので、先頭フレームがベース
 */
export interface FrameBakeInput
{
  objects: readonly FrameBakeObject[]
  snapshots: readonly Snapshot[]
}

export interface FrameBakeConfig
{
  /** 出力単位 デフォルト: CM */
  targetUnit?: string
  /** 出力座標系 デフォルト: SOURCE_NATIVE */
  convention?: string
  /** アクティブ頂点を絞り込む頂点グループ名 */
  groupName?: string | null
  /** テクスチャ名に使う名前 デフォルト: 先頭オブジェクト名 */
  outputName?: string
  allowedModifiers?: readonly string[]
}

export interface NamedPixelGrid
{
  name: string
  grid: PixelGrid
}

export interface VertexAnimUVLayer
{
  objectName: string
  name: string
  data: Float32Array
}

export interface FrameBakeOutput
{
  offsetTexture: NamedPixelGrid
  normalTexture: NamedPixelGrid
  uvLayers: VertexAnimUVLayer[]
  partition: GroupPartition
  maxDeviation: number
  scaleFactor: number
}

function toTitleCase(value: string): string
{
  return value.toLowerCase().replace(/(^|[^a-z])([a-z])/g, (_, prefix: string, c: string) => prefix + c.toUpperCase())
}

export function validateModifiers(
  objects: readonly FrameBakeObject[],
  allowedModifiers: readonly string[] = DEFAULT_ALLOWED_MODIFIERS,
): Result<void, BakeError>
{
  for (const object of objects)
  {
    const modifier = object.modifiers?.find((m) => !allowedModifiers.includes(m))
    if (modifier)
    {
      return err({
        type: 'PRECONDITION_ERROR',
        message: `Objects with ${toTitleCase(modifier)} modifiers are not allowed! ("${object.name}")`,
      })
    }
  }
  return ok(undefined)
}

/**
 * 頂点数 / フレーム数がテクスチャの上限に収まるか確認する
 */
export function validateFrameCounts(vertexCount: number, frameCount: number): Result<void, BakeError>
{
  if (vertexCount > MAX_VERTEX_COUNT)
  {
    return err({
      type: 'CAPACITY_ERROR',
      message: `Vertex count of ${vertexCount.toLocaleString('en-US')}, exceeds limit of ${MAX_VERTEX_COUNT.toLocaleString('en-US')}!`,
      actual: vertexCount,
      limit: MAX_VERTEX_COUNT,
    })
  }
  if (frameCount > MAX_FRAME_COUNT)
  {
    return err({
      type: 'CAPACITY_ERROR',
      message: `Frame count of ${frameCount.toLocaleString('en-US')}, exceeds limit of ${MAX_FRAME_COUNT.toLocaleString('en-US')}!`,
      actual: frameCount,
      limit: MAX_FRAME_COUNT,
    })
  }
  return ok(undefined)
}

function validateObjects(input: FrameBakeInput, vertexCount: number): Result<void, BakeError>
{
  if (input.objects.length === 0)
  {
    return err({ type: 'PRECONDITION_ERROR', message: 'No mesh objects to bake' })
  }

  const snapshotVertexCount = input.snapshots[0].vertexCount
  if (snapshotVertexCount !== vertexCount)
  {
    return err({
      type: 'PRECONDITION_ERROR',
      message: `Snapshots hold ${snapshotVertexCount} vertices, but the objects have ${vertexCount} in total`,
    })
  }

  return Result.combine(
    input.objects.map((o) => validateLoops(o.loopVertexIndices, o.vertexCount, o.name)),
  ).map(() => undefined)
}

/**
 * 選択オブジェクトのフレームごとの頂点オフセットと法線を 2 枚のテクスチャに焼き込む
 *
 * DeviationAnalyzer → ScaleResolver → GroupPartitioner → TexturePacker の順に処理し、
 * 各オブジェクト用の vertex_anim UV も作る。
 * 検証は全て出力の生成より前に行う。
 *
 * @param input - オブジェクト情報と結合済みスナップショット列
 * @param config - 焼き込み設定
 */
export function bakeFrames(
  input: FrameBakeInput,
  config: FrameBakeConfig = {},
): Result<FrameBakeOutput, BakeError>
{
  return safeTry(function* () {
    const vertexCount = input.objects.reduce((sum, o) => sum + o.vertexCount, 0)

    yield* validateModifiers(input.objects, config.allowedModifiers)
    yield* validateFrameCounts(vertexCount, input.snapshots.length)
    yield* validateSnapshots(input.snapshots, 2)
    yield* validateObjects(input, vertexCount)
    const convention = yield* resolveConvention(config.convention ?? 'SOURCE_NATIVE')

    const partition = partitionVertices(input.objects, config.groupName)

    const maxDeviation = yield* findMaxDeviation(input.snapshots)
    const scaleFactor = calculateScaleFactor(maxDeviation, config.targetUnit ?? 'CM')
    const textures = yield* packFrameTextures(input.snapshots, { scaleFactor, convention, partition })

    const uvLayers: VertexAnimUVLayer[] = []
    let vertexOffset = 0
    for (const object of input.objects)
    {
      uvLayers.push({
        objectName: object.name,
        name: VERTEX_ANIM_UV_LAYER,
        data: buildVertexAnimUVs(partition, object.loopVertexIndices, vertexOffset),
      })
      vertexOffset += object.vertexCount
    }

    const name = config.outputName ?? input.objects[0].name
    return ok({
      offsetTexture: { name: offsetTextureName(name, scaleFactor), grid: textures.offsets },
      normalTexture: { name: normalTextureName(name), grid: textures.normals },
      uvLayers,
      partition,
      maxDeviation,
      scaleFactor,
    })
  })
}
