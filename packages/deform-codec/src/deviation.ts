import { Result } from 'neverthrow'
import { reverseSnapshotOrder, validateSnapshots } from './snapshot'
import type { BakeError, Snapshot } from './types'

/**
 * ベースからの頂点移動量の最大値を求める
 *
 * スナップショット 0 をベースとして、それ以外の全スナップショット・全頂点について
 * 差分ベクトルの長さを測る。走査順は TexturePacker と同じ逆順。
 *
 * @param snapshots - 2 つ以上のスナップショット (先頭がベース)
 * @returns 最大移動量 (全て同一なら 0)
 */
export function findMaxDeviation(snapshots: readonly Snapshot[]): Result<number, BakeError>
{
  return validateSnapshots(snapshots, 2).map(() =>
  {
    const base = snapshots[0].positions
    let maxDeviation = 0

    for (const snapshotIndex of reverseSnapshotOrder(snapshots.length))
    {
      if (snapshotIndex === 0) continue
      const positions = snapshots[snapshotIndex].positions

      for (let i = 0; i < positions.length; i += 3)
      {
        const dx = positions[i] - base[i]
        const dy = positions[i + 1] - base[i + 1]
        const dz = positions[i + 2] - base[i + 2]
        const length = Math.sqrt(dx * dx + dy * dy + dz * dz)
        if (length > maxDeviation) maxDeviation = length
      }
    }

    return maxDeviation
  })
}
