/**
 * シェイプキーの差分ベクトルを UV レイヤーへ詰めるレイアウト
 *
 * 1 シェイプキーあたり X, Y, Z の 3 チャンネルを持ち、
 * UV レイヤー 1 枚に U, V の 2 チャンネルずつ詰める。
 * 符号の交互パターンはデコード側シェーダーとの固定の取り決めなので変更しないこと。
 */

import { err, ok, Result } from 'neverthrow'
import { convertAxes } from './coordinate'
import type {
  Axis,
  BakeError,
  ChannelSlot,
  CoordinateConvention,
  Snapshot,
  UVChannelLayout,
  UVLayerAssignment,
  UVLayerData,
} from './types'

/** メッシュが持てる UV レイヤーの上限 */
export const MAX_UV_LAYERS = 8
/** 一度に焼き込めるシェイプキー数の上限 */
export const MAX_SHAPE_KEYS = 4

const AXES: readonly Axis[] = ['X', 'Y', 'Z']

/**
 * 必要な UV レイヤー数
 * 1, 2, 3, 4 シェイプキーでそれぞれ 2, 3, 5, 6
 */
export function getRequiredUVLayerCount(numShapeKeys: number): number
{
  return Math.ceil((3 * numShapeKeys) / 2)
}

/**
 * レイヤー i のサブチャンネル (0 = U, 1 = V) に掛ける符号
 * floor((2i + sub) / 3) が奇数なら -1
 */
export function getChannelSign(layerIndex: number, subChannel: 0 | 1): 1 | -1
{
  return Math.floor((layerIndex * 2 + subChannel) / 3) % 2 === 0 ? 1 : -1
}

function toChannelSlot(channel: number, layerIndex: number, subChannel: 0 | 1): ChannelSlot
{
  return {
    shapeKey: Math.floor(channel / 3) + 1,
    axis: AXES[channel % 3],
    component: subChannel === 0 ? 'U' : 'V',
    sign: getChannelSign(layerIndex, subChannel),
  }
}

/**
 * シェイプキー数と開始レイヤーからチャンネル割り当てを作る
 * 書き込み前に容量を検証し、超える場合は何も作らずにエラーを返す
 *
 * @param numShapeKeys - 焼き込むシェイプキー数 (1-4)
 * @param startLayer - 最初に使う UV レイヤー番号 (0-7)
 */
export function buildChannelLayout(
  numShapeKeys: number,
  startLayer: number,
): Result<UVChannelLayout, BakeError>
{
  if (!Number.isInteger(numShapeKeys) || numShapeKeys < 1)
  {
    return err({
      type: 'CONFIGURATION_ERROR',
      message: `Number of shape keys must be a positive integer, got ${numShapeKeys}`,
    })
  }
  if (numShapeKeys > MAX_SHAPE_KEYS)
  {
    return err({
      type: 'CAPACITY_ERROR',
      message: `Shape key count of ${numShapeKeys} exceeds limit of ${MAX_SHAPE_KEYS}!`,
      actual: numShapeKeys,
      limit: MAX_SHAPE_KEYS,
    })
  }
  if (!Number.isInteger(startLayer) || startLayer < 0 || startLayer >= MAX_UV_LAYERS)
  {
    return err({
      type: 'CONFIGURATION_ERROR',
      message: `Start UV index must be an integer between 0 and ${MAX_UV_LAYERS - 1}, got ${startLayer}`,
    })
  }

  const layersNeeded = getRequiredUVLayerCount(numShapeKeys)
  const requiredLayers = startLayer + layersNeeded
  if (requiredLayers > MAX_UV_LAYERS)
  {
    return err({
      type: 'CAPACITY_ERROR',
      message: `Not enough UV layers to store ${numShapeKeys} shape keys: ${requiredLayers} layers required, ${MAX_UV_LAYERS} available`,
      actual: requiredLayers,
      limit: MAX_UV_LAYERS,
    })
  }

  const channelCount = numShapeKeys * 3
  const layers: UVLayerAssignment[] = []
  for (let i = 0; i < layersNeeded; i++)
  {
    const channels = [toChannelSlot(i * 2, i, 0)]
    if (i * 2 + 1 < channelCount)
    {
      channels.push(toChannelSlot(i * 2 + 1, i, 1))
    }

    const labels = channels.map((c) => `${c.shapeKey}${c.axis}`)
    layers.push({
      ordinal: startLayer + i,
      name: `Morph ${labels.join(' ')}`,
      singleComponent: channels.length === 1,
      channels,
    })
  }

  return ok({ numShapeKeys, startLayer, layers })
}

/**
 * シェイプキーごとの差分ベクトルを座標変換してチャンネル配列にする
 * 戻り値は [shapeKey * 3 + axis][vertex]
 */
export function computeShapeKeyChannels(
  snapshots: readonly Snapshot[],
  numShapeKeys: number,
  convention: CoordinateConvention,
): Float32Array[]
{
  const base = snapshots[0]
  const channels: Float32Array[] = []
  for (let i = 0; i < numShapeKeys * 3; i++)
  {
    channels.push(new Float32Array(base.vertexCount))
  }

  for (let key = 1; key <= numShapeKeys; key++)
  {
    const target = snapshots[key].positions
    const xs = channels[(key - 1) * 3]
    const ys = channels[(key - 1) * 3 + 1]
    const zs = channels[(key - 1) * 3 + 2]

    for (let v = 0; v < base.vertexCount; v++)
    {
      const o = v * 3
      const offset = convertAxes(
        target[o] - base.positions[o],
        target[o + 1] - base.positions[o + 1],
        target[o + 2] - base.positions[o + 2],
        convention,
      )
      xs[v] = offset.x
      ys[v] = offset.y
      zs[v] = offset.z
    }
  }

  return channels
}

/**
 * チャンネル配列をループごとの UV 座標に書き出す
 * UV = (U * signU, 1 + V * signV)。V を持たないレイヤーは V = 1 になる
 *
 * @param layout - buildChannelLayout の結果
 * @param channels - computeShapeKeyChannels の結果
 * @param loopVertexIndices - ループごとの頂点インデックス
 */
export function writeChannelsToUVLayers(
  layout: UVChannelLayout,
  channels: readonly Float32Array[],
  loopVertexIndices: Uint32Array,
): UVLayerData[]
{
  return layout.layers.map((layer, layerIndex) =>
  {
    const [uSlot, vSlot] = layer.channels
    const uValues = channels[layerIndex * 2]
    const vValues = vSlot ? channels[layerIndex * 2 + 1] : null
    const data = new Float32Array(loopVertexIndices.length * 2)

    for (let loop = 0; loop < loopVertexIndices.length; loop++)
    {
      const vertex = loopVertexIndices[loop]
      const u = uValues[vertex]
      const v = vValues && vSlot ? vValues[vertex] * vSlot.sign : 0
      data[loop * 2] = u * uSlot.sign
      data[loop * 2 + 1] = 1 + v
    }

    return {
      ordinal: layer.ordinal,
      name: layer.name,
      singleComponent: layer.singleComponent,
      data,
    }
  })
}
