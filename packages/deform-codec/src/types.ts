/**
 * Core type definitions for deform-codec
 * 頂点変形をテクスチャ / UV チャンネルへ焼き込むために必要な型を集約
 */

import type { Vector3 } from 'three'

/**
 * 座標系の変換先
 * SOURCE_NATIVE: 入力側の座標系 (Y Forward, Z Up)
 * ALT_ENGINE: 別エンジンの座標系 (X Forward, Z Up)
 */
export const COORDINATE_CONVENTIONS = ['SOURCE_NATIVE', 'ALT_ENGINE'] as const
export type CoordinateConvention = typeof COORDINATE_CONVENTIONS[number]

/**
 * オフセットの出力単位
 */
export const TARGET_UNITS = ['MM', 'CM', 'DM', 'M'] as const
export type TargetUnit = typeof TARGET_UNITS[number]

export type Axis = 'X' | 'Y' | 'Z'
export type UVComponent = 'U' | 'V'

/**
 * 1 頂点分のサンプル
 * index はスナップショットを収集した側で確定し、コーデックは再計算しない
 */
export interface VertexSample
{
  index: number
  position: Vector3
  normal: Vector3
}

/**
 * 1 フレーム、または 1 シェイプキー分の全頂点データ
 * positions / normals は xyz の 3 要素を頂点数分並べたもの
 */
export interface Snapshot
{
  /** フレーム番号やシェイプキー名など、診断用のラベル */
  label: string
  vertexCount: number
  positions: Float32Array
  normals: Float32Array
}

/**
 * 4 チャンネルのピクセルグリッド
 * 行 0 は最後に処理したスナップショット
 */
export interface PixelGrid
{
  width: number
  height: number
  data: Float32Array
}

/**
 * 1 チャンネル (U または V) の割り当て
 */
export interface ChannelSlot
{
  /** 1 始まりのシェイプキー番号 */
  shapeKey: number
  axis: Axis
  component: UVComponent
  sign: 1 | -1
}

/**
 * UV レイヤー 1 枚分の割り当て
 */
export interface UVLayerAssignment
{
  /** メッシュ上の UV レイヤー番号 (0-7) */
  ordinal: number
  name: string
  /** V に意味のある値を持たない末尾レイヤー */
  singleComponent: boolean
  channels: ChannelSlot[]
}

export interface UVChannelLayout
{
  numShapeKeys: number
  startLayer: number
  layers: UVLayerAssignment[]
}

/**
 * ループ (面の角) ごとに書き込まれた UV レイヤー
 */
export interface UVLayerData
{
  ordinal: number
  name: string
  singleComponent: boolean
  /** ループ数 x 2 (U, V) */
  data: Float32Array
}

/**
 * ループごとに書き込まれる 4 チャンネルのカラーレイヤー
 */
export interface ColorLayerData
{
  name: string
  /** ループ数 x 4 (R, G, B, A) */
  data: Float32Array
}

/**
 * 頂点グループ表
 * memberships[v] は頂点 v が属するグループのインデックス一覧
 */
export interface VertexGroupTable
{
  names: string[]
  memberships: number[][]
}

/**
 * 頂点グループによるアクティブ頂点の分割結果
 */
export interface GroupPartition
{
  /** 解決できたグループ名。全頂点アクティブの場合は null */
  groupName: string | null
  /** 頂点ごとのアクティブ内での順序。非アクティブは -1 */
  activeOrdinals: Int32Array
  totalActive: number
}

/**
 * シーンの単位設定
 */
export interface SceneUnitSettings
{
  system: 'METRIC' | 'IMPERIAL' | 'NONE'
  scaleLength: number
}

/**
 * エラー型 (全体)
 */
export type BakeError =
  | { type: 'PRECONDITION_ERROR'; message: string }
  | { type: 'CAPACITY_ERROR'; message: string; actual: number; limit: number }
  | { type: 'INDEX_ERROR'; message: string }
  | { type: 'CONFIGURATION_ERROR'; message: string }
