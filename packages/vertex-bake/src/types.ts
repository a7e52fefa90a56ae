import type { BakeError, VertexGroupTable } from '@vertex-bake/deform-codec'
import type { Mesh } from 'three'

/**
 * エラー型 (全体)
 * コーデックのエラーに、ファイル入出力とジョブ定義のエラーを加えたもの
 */
export type VertexBakeError = BakeError
  | { type: 'IO_ERROR'; message: string }
  | { type: 'INVALID_JOB'; message: string }

/**
 * フレーム方式で焼き込む 1 メッシュ分の情報
 */
export interface AnimatedMeshSource
{
  mesh: Mesh
  /** モディファイア相当の変形の種類 (検証用) */
  modifiers?: readonly string[]
  vertexGroups?: VertexGroupTable
}

/**
 * フレームを進めるコールバック
 * AnimationMixer.setTime などでシーンを指定フレームの姿勢にする
 */
export type FrameSetter = (frame: number) => void
