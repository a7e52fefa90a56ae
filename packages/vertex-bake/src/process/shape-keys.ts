import {
  bakeShapeKeys,
  type SceneUnitSettings,
  type ShapeKeyBakeConfig,
  type ShapeKeyBakeOutput,
} from '@vertex-bake/deform-codec'
import { Result } from 'neverthrow'
import type { Mesh } from 'three'
import { writeColorLayer, writeUVLayers } from '../three/attributes'
import { getLoopVertexIndices, snapshotsFromMorphTargets } from '../three/snapshots'
import type { VertexBakeError } from '../types'

/**
 * メッシュのモーフターゲットを UV レイヤー (と法線カラー) に焼き込む
 * 失敗した場合、ジオメトリは変更しない
 *
 * @param mesh - モーフターゲットを持つメッシュ
 * @param config - 焼き込み設定
 * @param units - シーン単位 (指定時のみ検証)
 */
export function bakeMeshShapeKeys(
  mesh: Mesh,
  config: ShapeKeyBakeConfig = {},
  units?: SceneUnitSettings,
): Result<ShapeKeyBakeOutput, VertexBakeError>
{
  const geometry = mesh.geometry

  return snapshotsFromMorphTargets(geometry, mesh.morphTargetDictionary)
    .andThen((snapshots) => bakeShapeKeys(
      {
        name: mesh.name,
        snapshots,
        loopVertexIndices: getLoopVertexIndices(geometry),
        units,
      },
      config,
    ))
    .map((output) =>
    {
      writeUVLayers(geometry, output.uvLayers)
      if (output.normalColors)
      {
        writeColorLayer(geometry, output.normalColors)
      }
      return output
    })
}
