import { err, ok, Result, safeTry } from 'neverthrow'
import { buildChannelLayout, computeShapeKeyChannels, writeChannelsToUVLayers } from './channel-layout'
import { compressNormal, convertAxes, resolveConvention } from './coordinate'
import { findMaxDeviation } from './deviation'
import { calculateScaleFactor } from './scale'
import { validateSnapshots } from './snapshot'
import type {
  BakeError,
  ColorLayerData,
  CoordinateConvention,
  SceneUnitSettings,
  Snapshot,
  UVChannelLayout,
  UVLayerData,
} from './types'

/** 法線を焼き込むカラーレイヤー名 */
export const NORMAL_COLOR_LAYER = 'normals'

export interface ShapeKeyBakeConfig
{
  /** 焼き込むシェイプキー数 (1-4) デフォルト: 1 */
  numShapeKeys?: number
  /** 最初に使う UV レイヤー番号 (0-7) デフォルト: 1 */
  startLayer?: number
  /** 法線をカラーレイヤーに焼き込むか デフォルト: true */
  bakeNormal?: boolean
  /** 法線を取り出すシェイプキー番号 デフォルト: 1 */
  normalShapeKeyIndex?: number
  /** オフセットの座標系 デフォルト: ALT_ENGINE */
  convention?: string
  /** 移動量の診断に使う単位 デフォルト: CM */
  targetUnit?: string
  /** シーン単位がメートル法 / スケール 0.01 であることを要求するか デフォルト: true */
  requireCentimeterScene?: boolean
}

export interface ResolvedShapeKeyBakeConfig
{
  numShapeKeys: number
  startLayer: number
  bakeNormal: boolean
  normalShapeKeyIndex: number
  convention: CoordinateConvention
  targetUnit: string
  requireCentimeterScene: boolean
}

/**
 * シェイプキー方式の入力
 * snapshots[0] が Basis、以降がシェイプキー
 */
export interface ShapeKeyBakeInput
{
  name: string
  snapshots: readonly Snapshot[]
  loopVertexIndices: Uint32Array
  units?: SceneUnitSettings
}

export interface ShapeKeyBakeOutput
{
  layout: UVChannelLayout
  uvLayers: UVLayerData[]
  normalColors: ColorLayerData | null
  maxDeviation: number
  scaleFactor: number
}

export function resolveShapeKeyBakeConfig(
  config: ShapeKeyBakeConfig,
): Result<ResolvedShapeKeyBakeConfig, BakeError>
{
  return resolveConvention(config.convention ?? 'ALT_ENGINE').map((convention) => ({
    numShapeKeys: config.numShapeKeys ?? 1,
    startLayer: config.startLayer ?? 1,
    bakeNormal: config.bakeNormal ?? true,
    normalShapeKeyIndex: config.normalShapeKeyIndex ?? 1,
    convention,
    targetUnit: config.targetUnit ?? 'CM',
    requireCentimeterScene: config.requireCentimeterScene ?? true,
  }))
}

/**
 * シーン単位がメートル法かつスケール 0.01 であることを確認する
 */
export function validateSceneUnits(units: SceneUnitSettings): Result<void, BakeError>
{
  if (units.system !== 'METRIC' || Math.round(units.scaleLength * 100) / 100 !== 0.01)
  {
    return err({
      type: 'PRECONDITION_ERROR',
      message: 'Scene Units must be Metric with a Unit Scale of 0.01!',
    })
  }
  return ok(undefined)
}

function validateShapeKeyCount(
  input: ShapeKeyBakeInput,
  numShapeKeys: number,
): Result<void, BakeError>
{
  if (input.snapshots.length === 0)
  {
    return err({ type: 'PRECONDITION_ERROR', message: `Object "${input.name}" has no shape keys!` })
  }
  if (input.snapshots.length < 1 + numShapeKeys)
  {
    return err({
      type: 'PRECONDITION_ERROR',
      message: `Object "${input.name}" needs additional shape keys! (${numShapeKeys} requested, ${input.snapshots.length - 1} available)`,
    })
  }
  return validateSnapshots(input.snapshots, 1 + numShapeKeys)
}

function validateNormalIndex(
  snapshots: readonly Snapshot[],
  index: number,
): Result<void, BakeError>
{
  if (!Number.isInteger(index) || index < 0 || index >= snapshots.length)
  {
    return err({
      type: 'INDEX_ERROR',
      message: `Invalid shape key index ${index} for baking normals (0-${snapshots.length - 1} available)`,
    })
  }
  return ok(undefined)
}

/**
 * 全ループが有効な頂点を指していることを確認する
 */
export function validateLoops(
  loopVertexIndices: Uint32Array,
  vertexCount: number,
  name: string,
): Result<void, BakeError>
{
  const invalid = loopVertexIndices.findIndex((v) => v >= vertexCount)
  if (invalid >= 0)
  {
    return err({
      type: 'PRECONDITION_ERROR',
      message: `Loop ${invalid} of "${name}" refers to vertex ${loopVertexIndices[invalid]}, but only ${vertexCount} vertices exist`,
    })
  }
  return ok(undefined)
}

/**
 * シェイプキーの頂点法線をループごとの RGBA に詰める
 * (nx + 1) / 2, (-ny + 1) / 2, (nz + 1) / 2, 1
 */
export function packShapeKeyNormals(
  snapshot: Snapshot,
  loopVertexIndices: Uint32Array,
): ColorLayerData
{
  const data = new Float32Array(loopVertexIndices.length * 4)
  for (let loop = 0; loop < loopVertexIndices.length; loop++)
  {
    const o = loopVertexIndices[loop] * 3
    const normal = convertAxes(
      snapshot.normals[o],
      snapshot.normals[o + 1],
      snapshot.normals[o + 2],
      'SOURCE_NATIVE',
    )
    data[loop * 4] = compressNormal(normal.x)
    data[loop * 4 + 1] = compressNormal(normal.y)
    data[loop * 4 + 2] = compressNormal(normal.z)
    data[loop * 4 + 3] = 1
  }
  return { name: NORMAL_COLOR_LAYER, data }
}

/**
 * シェイプキーの差分を UV レイヤーへ、指定シェイプキーの法線をカラーレイヤーへ焼き込む
 *
 * 検証 (単位設定、シェイプキー数、法線インデックス、UV 容量) を全て済ませてから
 * 出力を作るので、失敗時には何も返らない
 *
 * @param input - メッシュ名、スナップショット列、ループ表
 * @param config - 焼き込み設定
 */
export function bakeShapeKeys(
  input: ShapeKeyBakeInput,
  config: ShapeKeyBakeConfig = {},
): Result<ShapeKeyBakeOutput, BakeError>
{
  return safeTry(function* () {
    const resolved = yield* resolveShapeKeyBakeConfig(config)

    if (resolved.requireCentimeterScene && input.units)
    {
      yield* validateSceneUnits(input.units)
    }
    yield* validateShapeKeyCount(input, resolved.numShapeKeys)
    if (resolved.bakeNormal)
    {
      yield* validateNormalIndex(input.snapshots, resolved.normalShapeKeyIndex)
    }
    const layout = yield* buildChannelLayout(resolved.numShapeKeys, resolved.startLayer)
    yield* validateLoops(input.loopVertexIndices, input.snapshots[0].vertexCount, input.name)

    const bakedSnapshots = input.snapshots.slice(0, resolved.numShapeKeys + 1)
    const maxDeviation = yield* findMaxDeviation(bakedSnapshots)
    const scaleFactor = calculateScaleFactor(maxDeviation, resolved.targetUnit)

    const channels = computeShapeKeyChannels(bakedSnapshots, resolved.numShapeKeys, resolved.convention)
    const uvLayers = writeChannelsToUVLayers(layout, channels, input.loopVertexIndices)
    const normalColors = resolved.bakeNormal
      ? packShapeKeyNormals(input.snapshots[resolved.normalShapeKeyIndex], input.loopVertexIndices)
      : null

    return ok({ layout, uvLayers, normalColors, maxDeviation, scaleFactor })
  })
}
