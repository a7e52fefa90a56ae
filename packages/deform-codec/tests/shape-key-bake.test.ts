import { describe, expect, it } from 'vitest'
import { bakeShapeKeys, type ShapeKeyBakeInput } from '../src/shape-key-bake'
import { expectCloseArray, snapshot } from './helpers'

function createInput(overrides: Partial<ShapeKeyBakeInput> = {}): ShapeKeyBakeInput
{
  return {
    name: 'Face',
    snapshots: [
      snapshot('Basis', [0, 0, 0, 1, 0, 0]),
      snapshot('Smile', [0.5, 0.25, 0.125, 1, 0, 0], [0, 0, 1, 0, 1, 0]),
      snapshot('Frown', [0, 0, 0, 1.25, -0.5, 1]),
    ],
    loopVertexIndices: Uint32Array.from([0, 1]),
    units: { system: 'METRIC', scaleLength: 0.01 },
    ...overrides,
  }
}

describe('bakeShapeKeys', () => {
  it('should pack converted offsets into signed UV layers', () => {
    const result = bakeShapeKeys(createInput(), { numShapeKeys: 2, startLayer: 1 })

    expect(result.isOk()).toBe(true)
    const { uvLayers } = result._unsafeUnwrap()

    expect(uvLayers.map((l) => [l.ordinal, l.name])).toEqual([
      [1, 'Morph 1X 1Y'],
      [2, 'Morph 1Z 2X'],
      [3, 'Morph 2Y 2Z'],
    ])
    // Smile v0 (0.5, 0.25, 0.125) -> ALT_ENGINE (-0.25, -0.5, 0.125)
    // Frown v1 (0.25, -0.5, 1) -> ALT_ENGINE (0.5, -0.25, 1)
    expectCloseArray(uvLayers[0].data, [-0.25, 0.5, 0, 1])
    expectCloseArray(uvLayers[1].data, [0.125, 1, 0, 0.5])
    expectCloseArray(uvLayers[2].data, [0, 1, 0.25, 0])
  })

  it('should write one UV per loop following the loop vertex table', () => {
    const input = createInput({ loopVertexIndices: Uint32Array.from([1, 0, 0]) })
    const { uvLayers } = bakeShapeKeys(input, { numShapeKeys: 1, startLayer: 0, bakeNormal: false })._unsafeUnwrap()

    expect(uvLayers).toHaveLength(2)
    expectCloseArray(uvLayers[0].data, [0, 1, -0.25, 0.5, -0.25, 0.5])
    // 末尾レイヤーは U のみ意味を持ち、V は 1 固定
    expect(uvLayers[1].singleComponent).toBe(true)
    expectCloseArray(uvLayers[1].data, [0, 1, 0.125, 1, 0.125, 1])
  })

  it('should map source X to negative Y by default', () => {
    const input = createInput({
      snapshots: [snapshot('Basis', [0, 0, 0]), snapshot('Push', [0.5, 0, 0])],
      loopVertexIndices: Uint32Array.from([0]),
    })
    const { uvLayers } = bakeShapeKeys(input, { numShapeKeys: 1, startLayer: 0, bakeNormal: false })._unsafeUnwrap()

    // (0.5, 0, 0) -> (-0, -0.5, 0)
    expectCloseArray(uvLayers[0].data, [0, 0.5])
    expectCloseArray(uvLayers[1].data, [0, 1])
  })

  it('should use the SOURCE_NATIVE table when requested', () => {
    const { uvLayers } = bakeShapeKeys(createInput(), {
      numShapeKeys: 1,
      startLayer: 0,
      convention: 'SOURCE_NATIVE',
    })._unsafeUnwrap()

    // (0.5, 0.25, 0.125) -> (0.5, -0.25, 0.125)
    expectCloseArray(uvLayers[0].data, [0.5, 0.75, 0, 1])
    expectCloseArray(uvLayers[1].data, [0.125, 1, 0, 1])
  })

  it('should bake the selected shape key normals into a color layer', () => {
    const { normalColors } = bakeShapeKeys(createInput(), { normalShapeKeyIndex: 1 })._unsafeUnwrap()

    expect(normalColors?.name).toBe('normals')
    expectCloseArray(normalColors?.data ?? [], [0.5, 0.5, 1, 1, 0.5, 0, 0.5, 1])
  })

  it('should report the deviation and scale of the baked keys', () => {
    const output = bakeShapeKeys(createInput(), { numShapeKeys: 2 })._unsafeUnwrap()

    expect(output.maxDeviation).toBeCloseTo(Math.sqrt(1.3125), 6)
    expect(output.scaleFactor).toBe(115)
  })

  it('should skip the color layer when normal baking is off', () => {
    const output = bakeShapeKeys(createInput(), { bakeNormal: false, normalShapeKeyIndex: 9 })._unsafeUnwrap()
    expect(output.normalColors).toBeNull()
  })

  describe('validation', () => {
    it('should require a centimeter metric scene', () => {
      const imperial = bakeShapeKeys(createInput({ units: { system: 'IMPERIAL', scaleLength: 0.01 } }))
      expect(imperial._unsafeUnwrapErr()).toEqual({
        type: 'PRECONDITION_ERROR',
        message: 'Scene Units must be Metric with a Unit Scale of 0.01!',
      })

      const meters = bakeShapeKeys(createInput({ units: { system: 'METRIC', scaleLength: 1 } }))
      expect(meters._unsafeUnwrapErr().type).toBe('PRECONDITION_ERROR')

      const unchecked = bakeShapeKeys(
        createInput({ units: { system: 'METRIC', scaleLength: 1 } }),
        { requireCentimeterScene: false },
      )
      expect(unchecked.isOk()).toBe(true)
    })

    it('should require enough shape keys', () => {
      const none = bakeShapeKeys(createInput({ snapshots: [] }))
      expect(none._unsafeUnwrapErr().message).toBe('Object "Face" has no shape keys!')

      const result = bakeShapeKeys(createInput(), { numShapeKeys: 3 })
      expect(result._unsafeUnwrapErr().type).toBe('PRECONDITION_ERROR')
      expect(result._unsafeUnwrapErr().message).toContain('needs additional shape keys')
    })

    it('should reject a normal shape key index out of range', () => {
      const result = bakeShapeKeys(createInput(), { normalShapeKeyIndex: 3 })
      expect(result._unsafeUnwrapErr().type).toBe('INDEX_ERROR')
    })

    it('should fail on UV capacity before producing anything', () => {
      const result = bakeShapeKeys(createInput(), { numShapeKeys: 2, startLayer: 7 })
      expect(result._unsafeUnwrapErr().type).toBe('CAPACITY_ERROR')
    })

    it('should reject unknown coordinate conventions', () => {
      const result = bakeShapeKeys(createInput(), { convention: 'UE' })
      expect(result._unsafeUnwrapErr().type).toBe('CONFIGURATION_ERROR')
    })

    it('should reject loops pointing past the vertex list', () => {
      const result = bakeShapeKeys(createInput({ loopVertexIndices: Uint32Array.from([0, 2]) }))
      expect(result._unsafeUnwrapErr().message).toBe(
        'Loop 1 of "Face" refers to vertex 2, but only 2 vertices exist',
      )
    })
  })
})
