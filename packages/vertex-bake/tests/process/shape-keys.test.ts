import { describe, expect, it } from 'vitest'
import { bakeMeshShapeKeys } from '../../src/process/shape-keys'
import { getUVLayerNames } from '../../src/three/attributes'
import { createMorphedTriangleMesh, expectCloseArray } from '../helpers'

describe('bakeMeshShapeKeys', () => {
  it('should write morph target offsets into UV layers of the geometry', () => {
    const mesh = createMorphedTriangleMesh('Face')

    const result = bakeMeshShapeKeys(mesh)

    expect(result.isOk()).toBe(true)
    const { geometry } = mesh
    expect(getUVLayerNames(geometry)).toEqual(['UVMap', 'Morph 1X 1Y', 'Morph 1Z'])
    // v2 (0, 0, 0.5) -> ALT_ENGINE (0, 0, 0.5)
    expectCloseArray(geometry.getAttribute('uv1').array, [0, 1, 0, 1, 0, 1])
    expectCloseArray(geometry.getAttribute('uv2').array, [0, 1, 0, 1, 0.5, 1])
  })

  it('should bake the morphed normals into the color attribute', () => {
    const mesh = createMorphedTriangleMesh('Face')

    bakeMeshShapeKeys(mesh)._unsafeUnwrap()

    // 法線 (0, -0.5, 1) / |(0, -0.5, 1)| の Y を反転して [0, 1] に圧縮
    const color = [0.5, (0.5 / Math.sqrt(1.25) + 1) / 2, (1 / Math.sqrt(1.25) + 1) / 2, 1]
    expectCloseArray(mesh.geometry.getAttribute('color').array, [...color, ...color, ...color])
    expect(mesh.geometry.userData.colorLayerName).toBe('normals')
  })

  it('should report the largest offset', () => {
    const mesh = createMorphedTriangleMesh('Face')
    const output = bakeMeshShapeKeys(mesh, { bakeNormal: false })._unsafeUnwrap()

    expect(output.maxDeviation).toBeCloseTo(0.5, 6)
    expect(output.normalColors).toBeNull()
    expect(mesh.geometry.hasAttribute('color')).toBe(false)
  })

  it('should leave the geometry untouched when there are too few morph targets', () => {
    const mesh = createMorphedTriangleMesh('Face')

    const result = bakeMeshShapeKeys(mesh, { numShapeKeys: 2 })

    expect(result._unsafeUnwrapErr()).toEqual({
      type: 'PRECONDITION_ERROR',
      message: 'Object "Face" needs additional shape keys! (2 requested, 1 available)',
    })
    expect(mesh.geometry.hasAttribute('uv1')).toBe(false)
  })

  it('should check the scene units when they are given', () => {
    const mesh = createMorphedTriangleMesh('Face')

    const result = bakeMeshShapeKeys(mesh, {}, { system: 'IMPERIAL', scaleLength: 1 })

    expect(result._unsafeUnwrapErr().message).toBe('Scene Units must be Metric with a Unit Scale of 0.01!')
  })
})
