/**
 * vertex-bake
 *
 * three.js のメッシュを対象に、頂点アニメーション / シェイプキーを
 * テクスチャと UV チャンネルへ焼き込む
 */

// 焼き込み処理
export { bakeMeshFrames } from './process/frames'
export { bakeMeshShapeKeys } from './process/shape-keys'
export { runFrameBakeJob, runShapeKeyBakeJob } from './process/jobs'

// three.js
export {
  getUVLayerCount,
  getUVLayerNames,
  uvAttributeName,
  writeColorLayer,
  writeNamedUVLayer,
  writeUVLayers,
  COLOR_LAYER_NAME_KEY,
  UV_LAYER_NAMES_KEY,
} from './three/attributes'
export {
  collectFrameSnapshots,
  computeNormals,
  frameRange,
  getLoopVertexIndices,
  snapshotsFromMorphTargets,
  BASIS_LABEL,
} from './three/snapshots'
export { DataTextureStore } from './three/texture-store'

// 入出力
export {
  createOffsetManifest,
  createShapeKeyDocument,
  encodeGridFloat32,
  encodeGridPng,
  writeFrameBakeOutput,
  writeShapeKeyBakeOutput,
} from './io/export'
export { parseFrameBakeJob, parseShapeKeyBakeJob, readJobFile } from './io/job'

export type { MeshFrameBakeOptions, MeshFrameBakeResult } from './process/frames'
export type { JobResult } from './process/jobs'
export type { CollectFrameOptions } from './three/snapshots'
export type {
  FrameExportMeta,
  OffsetTextureManifest,
  ShapeKeyExportDocument,
} from './io/export'
export type { FrameBakeJob } from './io/job'
export type { AnimatedMeshSource, FrameSetter, VertexBakeError } from './types'

export * from '@vertex-bake/deform-codec'
