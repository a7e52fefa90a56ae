/**
 * 焼き込み結果のファイル書き出し
 *
 * - 法線テクスチャ: 8bit RGBA PNG
 * - オフセットテクスチャ: float32 (little endian) の .bin + JSON マニフェスト
 * - シェイプキー: UV / カラーレイヤーを JSON
 *
 * PNG は行 0 を画像の下端に置く。.bin はグリッドの行順のまま書き出す。
 */

import type {
  FrameBakeOutput,
  NamedPixelGrid,
  PixelGrid,
  ShapeKeyBakeOutput,
} from '@vertex-bake/deform-codec'
import { encode } from 'fast-png'
import { mkdir, rm, writeFile } from 'fs/promises'
import { ResultAsync } from 'neverthrow'
import path from 'path'
import type { VertexBakeError } from '../types'
import { flipRows, toUnorm8 } from '../util/pixels'

export interface OffsetTextureManifest
{
  name: string
  file: string
  width: number
  height: number
  channels: 4
  format: 'float32le'
  rowOrder: 'last-frame-first'
  scaleFactor: number
  convention: string
  targetUnit: string
}

export interface FrameExportMeta
{
  convention: string
  targetUnit: string
}

export interface ShapeKeyExportDocument
{
  name: string
  maxDeviation: number
  scaleFactor: number
  uvLayers: Array<{ ordinal: number; name: string; singleComponent: boolean; data: number[] }>
  colorLayer: { name: string; data: number[] } | null
}

/**
 * [0, 1] のグリッドを 8bit RGBA PNG にエンコードする
 */
export function encodeGridPng(grid: PixelGrid): Uint8Array
{
  return encode({
    width: grid.width,
    height: grid.height,
    data: flipRows(toUnorm8(grid), grid.width, grid.height, 4),
    depth: 8,
    channels: 4,
  })
}

/**
 * float グリッドを little endian の float32 列にする
 */
export function encodeGridFloat32(grid: PixelGrid): Uint8Array
{
  const bytes = new Uint8Array(grid.data.length * 4)
  const view = new DataView(bytes.buffer)
  grid.data.forEach((value, i) => view.setFloat32(i * 4, value, true))
  return bytes
}

export function createOffsetManifest(
  texture: NamedPixelGrid,
  scaleFactor: number,
  meta: FrameExportMeta,
): OffsetTextureManifest
{
  return {
    name: texture.name,
    file: `${texture.name}.bin`,
    width: texture.grid.width,
    height: texture.grid.height,
    channels: 4,
    format: 'float32le',
    rowOrder: 'last-frame-first',
    scaleFactor,
    convention: meta.convention,
    targetUnit: meta.targetUnit,
  }
}

export function createShapeKeyDocument(name: string, output: ShapeKeyBakeOutput): ShapeKeyExportDocument
{
  return {
    name,
    maxDeviation: output.maxDeviation,
    scaleFactor: output.scaleFactor,
    uvLayers: output.uvLayers.map((layer) => ({
      ordinal: layer.ordinal,
      name: layer.name,
      singleComponent: layer.singleComponent,
      data: Array.from(layer.data),
    })),
    colorLayer: output.normalColors
      ? { name: output.normalColors.name, data: Array.from(output.normalColors.data) }
      : null,
  }
}

function writeFiles(
  directory: string,
  files: ReadonlyArray<{ name: string; data: Uint8Array | string }>,
): ResultAsync<string[], VertexBakeError>
{
  return ResultAsync.fromPromise(
    (async () =>
    {
      await mkdir(directory, { recursive: true })
      const written: string[] = []
      try
      {
        for (const file of files)
        {
          const filePath = path.join(directory, file.name)
          await writeFile(filePath, file.data)
          written.push(filePath)
        }
      }
      catch (error)
      {
        // 途中までの書き出しを残さない
        await Promise.all(written.map((filePath) => rm(filePath, { force: true })))
        throw error
      }
      return written
    })(),
    (error) => ({
      type: 'IO_ERROR' as const,
      message: `Failed to write into ${directory}: ${String(error)}`,
    }),
  )
}

/**
 * フレーム方式の結果を書き出す
 *
 * @returns 書き出したファイルのパス
 */
export function writeFrameBakeOutput(
  output: FrameBakeOutput,
  directory: string,
  meta: FrameExportMeta,
): ResultAsync<string[], VertexBakeError>
{
  const manifest = createOffsetManifest(output.offsetTexture, output.scaleFactor, meta)
  return writeFiles(directory, [
    { name: manifest.file, data: encodeGridFloat32(output.offsetTexture.grid) },
    { name: `${output.offsetTexture.name}.json`, data: JSON.stringify(manifest, null, 2) },
    { name: `${output.normalTexture.name}.png`, data: encodeGridPng(output.normalTexture.grid) },
  ])
}

/**
 * シェイプキー方式の結果を <name>.uv.json に書き出す
 */
export function writeShapeKeyBakeOutput(
  name: string,
  output: ShapeKeyBakeOutput,
  directory: string,
): ResultAsync<string[], VertexBakeError>
{
  return writeFiles(directory, [
    { name: `${name}.uv.json`, data: JSON.stringify(createShapeKeyDocument(name, output), null, 2) },
  ])
}
