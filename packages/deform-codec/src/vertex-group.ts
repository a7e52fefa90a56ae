import type { GroupPartition, VertexGroupTable } from './types'

/**
 * 非アクティブ頂点を寄せる U 座標
 * アクティブ頂点は必ず (0.5 / totalActive) 以上になるので、シェーダー側は
 * 0 付近のしきい値で除外できる
 */
export const INACTIVE_U = 0

/**
 * 結合対象の 1 オブジェクト分の頂点情報
 */
export interface PartitionSource
{
  name: string
  vertexCount: number
  vertexGroups?: VertexGroupTable
}

function allActive(vertexCount: number): GroupPartition
{
  const activeOrdinals = new Int32Array(vertexCount)
  for (let i = 0; i < vertexCount; i++) activeOrdinals[i] = i
  return { groupName: null, activeOrdinals, totalActive: vertexCount }
}

/**
 * 頂点グループ名から、結合後の全頂点をアクティブ / 非アクティブに分ける
 *
 * グループ名が無い、どのオブジェクトでも解決できない、またはメンバーが 0 頂点の場合は全頂点アクティブ。
 * アクティブ頂点にはオブジェクト順・頂点順で連番を振る。
 * 呼び出しごとに再計算し、結果はキャッシュしない。
 *
 * @param objects - 結合順に並んだオブジェクト
 * @param groupName - 対象の頂点グループ名
 */
export function partitionVertices(
  objects: readonly PartitionSource[],
  groupName?: string | null,
): GroupPartition
{
  const vertexCount = objects.reduce((sum, o) => sum + o.vertexCount, 0)
  if (!groupName) return allActive(vertexCount)

  const groupIndices = objects.map((o) => o.vertexGroups?.names.indexOf(groupName) ?? -1)
  if (groupIndices.every((index) => index < 0))
  {
    console.warn(`Vertex group "${groupName}" was not found on any object; every vertex stays active`)
    return allActive(vertexCount)
  }

  const activeOrdinals = new Int32Array(vertexCount).fill(-1)
  let totalActive = 0
  let globalIndex = 0

  objects.forEach((object, objectIndex) =>
  {
    const groupIndex = groupIndices[objectIndex]
    const memberships = object.vertexGroups?.memberships ?? []

    for (let v = 0; v < object.vertexCount; v++, globalIndex++)
    {
      if (groupIndex >= 0 && memberships[v]?.includes(groupIndex))
      {
        activeOrdinals[globalIndex] = totalActive++
      }
    }
  })

  if (totalActive === 0)
  {
    console.warn(`Vertex group "${groupName}" has no member vertices; every vertex stays active`)
    return allActive(vertexCount)
  }

  return { groupName, activeOrdinals, totalActive }
}

/**
 * 頂点のテクセル中心の U 座標
 * アクティブ頂点は (0, 1) に等間隔、非アクティブ頂点は INACTIVE_U
 */
export function getVertexAnimU(partition: GroupPartition, vertex: number): number
{
  const ordinal = partition.activeOrdinals[vertex]
  if (ordinal < 0) return INACTIVE_U
  return (ordinal + 0.5) / partition.totalActive
}
