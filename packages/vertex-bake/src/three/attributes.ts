/**
 * 焼き込み結果をジオメトリの UV / カラー属性に書き込む
 *
 * UV レイヤー n は属性名 uv (n = 0) / uv{n} に対応し、
 * レイヤー名は geometry.userData.uvLayerNames[n] に保持する。
 */

import type { ColorLayerData, UVLayerData } from '@vertex-bake/deform-codec'
import { BufferGeometry, Float32BufferAttribute } from 'three'

/** カラーレイヤー名を保持する userData のキー */
export const COLOR_LAYER_NAME_KEY = 'colorLayerName'
/** UV レイヤー名を保持する userData のキー */
export const UV_LAYER_NAMES_KEY = 'uvLayerNames'

export function uvAttributeName(ordinal: number): string
{
  return ordinal === 0 ? 'uv' : `uv${ordinal}`
}

function defaultLayerName(ordinal: number): string
{
  return ordinal === 0 ? 'UVMap' : `UVMap.${String(ordinal).padStart(3, '0')}`
}

/**
 * ジオメトリが持つ UV レイヤー数 (uv, uv1, ... が連続している数)
 */
export function getUVLayerCount(geometry: BufferGeometry): number
{
  let count = 0
  while (geometry.hasAttribute(uvAttributeName(count))) count++
  return count
}

/**
 * UV レイヤー名の一覧
 * 名前が未設定のレイヤーは UVMap / UVMap.001 ... とする
 */
export function getUVLayerNames(geometry: BufferGeometry): string[]
{
  const stored: unknown = geometry.userData[UV_LAYER_NAMES_KEY]
  const names: readonly unknown[] = Array.isArray(stored) ? stored : []
  return Array.from({ length: getUVLayerCount(geometry) }, (_, i) =>
  {
    const name: unknown = names[i]
    return typeof name === 'string' ? name : defaultLayerName(i)
  })
}

function setUVLayer(geometry: BufferGeometry, names: string[], ordinal: number, name: string, data: Float32Array): void
{
  geometry.setAttribute(uvAttributeName(ordinal), new Float32BufferAttribute(data, 2))
  names[ordinal] = name
}

/**
 * 序数で指定された UV レイヤーを書き込む
 * 既存レイヤーは上書きし、足りない下位レイヤーは 0 埋めで追加する
 */
export function writeUVLayers(geometry: BufferGeometry, layers: readonly UVLayerData[]): void
{
  const names = getUVLayerNames(geometry)
  const vertexCount = geometry.getAttribute('position').count

  for (const layer of layers)
  {
    for (let ordinal = names.length; ordinal < layer.ordinal; ordinal++)
    {
      setUVLayer(geometry, names, ordinal, defaultLayerName(ordinal), new Float32Array(vertexCount * 2))
    }
    setUVLayer(geometry, names, layer.ordinal, layer.name, layer.data)
  }

  geometry.userData[UV_LAYER_NAMES_KEY] = names
}

/**
 * 名前で指定された UV レイヤーを書き込む
 * 同名のレイヤーがあれば上書き、無ければ末尾に追加する
 *
 * @returns 書き込んだレイヤーの序数
 */
export function writeNamedUVLayer(geometry: BufferGeometry, name: string, data: Float32Array): number
{
  const names = getUVLayerNames(geometry)
  const existing = names.indexOf(name)
  const ordinal = existing >= 0 ? existing : names.length

  setUVLayer(geometry, names, ordinal, name, data)
  geometry.userData[UV_LAYER_NAMES_KEY] = names
  return ordinal
}

/**
 * RGBA のカラーレイヤーを color 属性として書き込む
 */
export function writeColorLayer(geometry: BufferGeometry, layer: ColorLayerData): void
{
  geometry.setAttribute('color', new Float32BufferAttribute(layer.data, 4))
  geometry.userData[COLOR_LAYER_NAME_KEY] = layer.name
}
