import {
  bakeFrames,
  validateFrameCounts,
  validateModifiers,
  type FrameBakeConfig,
  type FrameBakeObject,
  type FrameBakeOutput,
} from '@vertex-bake/deform-codec'
import { ok, Result, safeTry } from 'neverthrow'
import type { DataTexture } from 'three'
import { writeNamedUVLayer } from '../three/attributes'
import { collectFrameSnapshots, getLoopVertexIndices } from '../three/snapshots'
import type { DataTextureStore } from '../three/texture-store'
import type { AnimatedMeshSource, FrameSetter, VertexBakeError } from '../types'

export interface MeshFrameBakeOptions extends FrameBakeConfig
{
  /** サンプリング後に戻すフレーム */
  restoreFrame?: number
}

export interface MeshFrameBakeResult
{
  output: FrameBakeOutput
  offsetTexture: DataTexture
  normalTexture: DataTexture
}

function toBakeObject(source: AnimatedMeshSource): FrameBakeObject
{
  const geometry = source.mesh.geometry
  return {
    name: source.mesh.name,
    vertexCount: geometry.getAttribute('position').count,
    modifiers: source.modifiers,
    vertexGroups: source.vertexGroups,
    loopVertexIndices: getLoopVertexIndices(geometry),
  }
}

/**
 * アニメーションするメッシュ群をフレームごとにサンプリングし、
 * オフセット / 法線テクスチャと vertex_anim UV に焼き込む
 *
 * テクスチャは store に名前で保存し、同名のものは上書きする。
 * 検証で失敗した場合、ジオメトリと store は変更しない。
 *
 * @param sources - 結合順に並んだメッシュ
 * @param frames - サンプリングするフレーム番号
 * @param setFrame - シーンを指定フレームにするコールバック
 * @param store - テクスチャの保存先
 * @param options - 焼き込み設定
 */
export function bakeMeshFrames(
  sources: readonly AnimatedMeshSource[],
  frames: readonly number[],
  setFrame: FrameSetter,
  store: DataTextureStore,
  options: MeshFrameBakeOptions = {},
): Result<MeshFrameBakeResult, VertexBakeError>
{
  const { restoreFrame, ...config } = options
  const objects = sources.map(toBakeObject)
  const vertexCount = objects.reduce((sum, o) => sum + o.vertexCount, 0)

  return safeTry<MeshFrameBakeResult, VertexBakeError>(function* () {
    // サンプリング前に確認できるもの
    yield* validateModifiers(objects, config.allowedModifiers)
    yield* validateFrameCounts(vertexCount, frames.length)

    const snapshots = yield* collectFrameSnapshots(
      sources.map((source) => source.mesh),
      frames,
      setFrame,
      { restoreFrame },
    )
    const output = yield* bakeFrames({ objects, snapshots }, config)

    const offsetTexture = store.writeFloat(output.offsetTexture.name, output.offsetTexture.grid)
    const normalTexture = store.writeUnorm8(output.normalTexture.name, output.normalTexture.grid)
    output.uvLayers.forEach((layer, i) =>
    {
      writeNamedUVLayer(sources[i].mesh.geometry, layer.name, layer.data)
    })
    return ok({ output, offsetTexture, normalTexture })
  })
}
