import type { PixelGrid } from '@vertex-bake/deform-codec'
import {
  DataTexture,
  FloatType,
  RGBAFormat,
  UnsignedByteType,
  type TextureDataType,
} from 'three'
import { toUnorm8 } from '../util/pixels'

interface StoredTexture
{
  texture: DataTexture
  data: Float32Array | Uint8Array
}

/**
 * 焼き込んだテクスチャを名前で保持する
 *
 * 同名のテクスチャは作り直さずに中身を上書きする。
 * 作り直すのはサイズか型が変わった場合のみ。
 * 渡された配列はコピーして保持する。
 */
export class DataTextureStore
{
  private readonly textures = new Map<string, StoredTexture>()

  get size(): number
  {
    return this.textures.size
  }

  get names(): string[]
  {
    return [...this.textures.keys()]
  }

  has(name: string): boolean
  {
    return this.textures.has(name)
  }

  get(name: string): DataTexture | undefined
  {
    return this.textures.get(name)?.texture
  }

  /**
   * float の RGBA テクスチャとして書き込む (オフセット用)
   */
  writeFloat(name: string, grid: PixelGrid): DataTexture
  {
    return this.write(name, grid.width, grid.height, grid.data, FloatType)
  }

  /**
   * 8bit の RGBA テクスチャとして書き込む (法線用)
   */
  writeUnorm8(name: string, grid: PixelGrid): DataTexture
  {
    return this.write(name, grid.width, grid.height, toUnorm8(grid), UnsignedByteType)
  }

  delete(name: string): boolean
  {
    const stored = this.textures.get(name)
    if (!stored) return false
    stored.texture.dispose()
    return this.textures.delete(name)
  }

  dispose(): void
  {
    this.textures.forEach((stored) => stored.texture.dispose())
    this.textures.clear()
  }

  private write(
    name: string,
    width: number,
    height: number,
    data: Float32Array | Uint8Array,
    type: TextureDataType,
  ): DataTexture
  {
    const stored = this.textures.get(name)
    if (
      stored
      && stored.texture.type === type
      && stored.texture.image.width === width
      && stored.texture.image.height === height
    )
    {
      stored.data.set(data)
      stored.texture.needsUpdate = true
      return stored.texture
    }

    stored?.texture.dispose()

    const owned = data.slice()
    const texture = new DataTexture(owned, width, height, RGBAFormat, type)
    texture.name = name
    texture.needsUpdate = true
    this.textures.set(name, { texture, data: owned })
    return texture
  }
}
