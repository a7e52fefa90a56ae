/**
 * @vertex-bake/deform-codec
 *
 * 頂点アニメーション / シェイプキーの変形を、シェーダーから読めるテクスチャと
 * UV チャンネルへ焼き込むコーデック
 */

// 焼き込み処理
export {
  bakeFrames,
  validateFrameCounts,
  validateModifiers,
  DEFAULT_ALLOWED_MODIFIERS,
  MAX_FRAME_COUNT,
  MAX_VERTEX_COUNT,
} from './frame-bake'
export {
  bakeShapeKeys,
  packShapeKeyNormals,
  resolveShapeKeyBakeConfig,
  validateLoops,
  validateSceneUnits,
  NORMAL_COLOR_LAYER,
} from './shape-key-bake'

// 構成要素
export { compressNormal, convertAxes, resolveConvention, revertAxes } from './coordinate'
export { findMaxDeviation } from './deviation'
export { calculateScaleFactor, getMaxAllowedDeviation, isTargetUnit, MAX_ALLOWED_DEVIATION } from './scale'
export {
  buildChannelLayout,
  computeShapeKeyChannels,
  getChannelSign,
  getRequiredUVLayerCount,
  writeChannelsToUVLayers,
  MAX_SHAPE_KEYS,
  MAX_UV_LAYERS,
} from './channel-layout'
export {
  buildVertexAnimUVs,
  decodeOffsetTexel,
  normalTextureName,
  offsetTextureName,
  packFrameTextures,
  VERTEX_ANIM_UV_LAYER,
  VERTEX_ANIM_V,
} from './texture-layout'
export { getVertexAnimU, partitionVertices, INACTIVE_U } from './vertex-group'
export { createSnapshot, getVertexSample, reverseSnapshotOrder, validateSnapshots } from './snapshot'

export type {
  FrameBakeConfig,
  FrameBakeInput,
  FrameBakeObject,
  FrameBakeOutput,
  NamedPixelGrid,
  VertexAnimUVLayer,
} from './frame-bake'
export type {
  ResolvedShapeKeyBakeConfig,
  ShapeKeyBakeConfig,
  ShapeKeyBakeInput,
  ShapeKeyBakeOutput,
} from './shape-key-bake'
export type { FrameTextureOptions, FrameTextures } from './texture-layout'
export type { PartitionSource } from './vertex-group'
export { COORDINATE_CONVENTIONS, TARGET_UNITS } from './types'
export type {
  Axis,
  BakeError,
  ChannelSlot,
  ColorLayerData,
  CoordinateConvention,
  GroupPartition,
  PixelGrid,
  SceneUnitSettings,
  Snapshot,
  TargetUnit,
  UVChannelLayout,
  UVComponent,
  UVLayerAssignment,
  UVLayerData,
  VertexGroupTable,
  VertexSample,
} from './types'
