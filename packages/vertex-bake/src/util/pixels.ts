import type { PixelGrid } from '@vertex-bake/deform-codec'
import { MathUtils } from 'three'

/**
 * [0, 1] のグリッドを 8bit に量子化する
 */
export function toUnorm8(grid: PixelGrid): Uint8Array
{
  const bytes = new Uint8Array(grid.data.length)
  for (let i = 0; i < grid.data.length; i++)
  {
    bytes[i] = Math.round(MathUtils.clamp(grid.data[i], 0, 1) * 255)
  }
  return bytes
}

/**
 * 行の並びを上下反転する (行 0 を画像の下端に置くため)
 */
export function flipRows(data: Uint8Array, width: number, height: number, channels: number): Uint8Array
{
  const flipped = new Uint8Array(data.length)
  const stride = width * channels
  for (let row = 0; row < height; row++)
  {
    flipped.set(data.subarray(row * stride, (row + 1) * stride), (height - 1 - row) * stride)
  }
  return flipped
}
