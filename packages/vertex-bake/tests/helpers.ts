import { mkdtemp } from 'fs/promises'
import os from 'os'
import path from 'path'
import { BufferGeometry, Float32BufferAttribute, Mesh, MeshBasicMaterial } from 'three'
import { expect } from 'vitest'

/**
 * (0,0,0) (1,0,0) (0,1,0) の三角形 1 枚を持つメッシュ
 * offset で全頂点をずらせる
 */
export function createTriangleMesh(name: string, offset: [number, number, number] = [0, 0, 0]): Mesh
{
  const [x, y, z] = offset
  const geometry = new BufferGeometry()
  geometry.setAttribute('position', new Float32BufferAttribute([
    x, y, z,
    x + 1, y, z,
    x, y + 1, z,
  ], 3))

  const mesh = new Mesh(geometry, new MeshBasicMaterial())
  mesh.name = name
  return mesh
}

/**
 * 3 番目の頂点だけを +Z に 0.5 動かす相対モーフターゲットを持つ三角形
 */
export function createMorphedTriangleMesh(name: string): Mesh
{
  const mesh = createTriangleMesh(name)
  mesh.geometry.morphAttributes.position = [
    new Float32BufferAttribute([0, 0, 0, 0, 0, 0, 0, 0, 0.5], 3),
  ]
  mesh.geometry.morphTargetsRelative = true
  mesh.updateMorphTargets()
  mesh.morphTargetDictionary = { Smile: 0 }
  return mesh
}

export function expectCloseArray(actual: ArrayLike<number>, expected: number[]): void
{
  expect(actual.length).toBe(expected.length)
  expected.forEach((value, index) =>
  {
    expect(actual[index]).toBeCloseTo(value, 6)
  })
}

export function createTempDir(): Promise<string>
{
  return mkdtemp(path.join(os.tmpdir(), 'vertex-bake-'))
}
