import { expect } from 'vitest'
import { createSnapshot } from '../src/snapshot'
import type { Snapshot } from '../src/types'

/**
 * テスト用スナップショットを作る (失敗したらテストを落とす)
 */
export function snapshot(label: string, positions: number[], normals?: number[]): Snapshot
{
  const result = createSnapshot(label, positions, normals)
  if (result.isErr()) throw new Error(result.error.message)
  return result.value
}

export function expectCloseArray(actual: ArrayLike<number>, expected: number[]): void
{
  expect(actual.length).toBe(expected.length)
  expected.forEach((value, index) =>
  {
    expect(actual[index]).toBeCloseTo(value, 6)
  })
}
