import { describe, expect, it, vi } from 'vitest'
import { bakeFrames, validateFrameCounts, type FrameBakeInput, type FrameBakeObject } from '../src/frame-bake'
import { VERTEX_ANIM_V } from '../src/texture-layout'
import { expectCloseArray, snapshot } from './helpers'

function object(name: string, vertexCount: number, extra: Partial<FrameBakeObject> = {}): FrameBakeObject
{
  return {
    name,
    vertexCount,
    loopVertexIndices: Uint32Array.from({ length: vertexCount }, (_, i) => i),
    ...extra,
  }
}

function createInput(): FrameBakeInput
{
  return {
    objects: [object('Flag', 2, { modifiers: ['ARMATURE'] }), object('Pole', 1)],
    snapshots: [
      snapshot('1', [0, 0, 0, 1, 0, 0, 0, 0, 2]),
      snapshot('2', [0, 0, 0, 1, 0, 0, 0, 0, 2.025]),
      snapshot('3', [0, 0.0125, 0, 1, 0, 0, 0, 0, 2]),
    ],
  }
}

describe('validateFrameCounts', () => {
  it('should accept 8192 vertices from several objects and 8192 frames', () => {
    expect(validateFrameCounts(2000 + 3000 + 3192, 8192).isOk()).toBe(true)
  })

  it('should reject one vertex too many', () => {
    const error = validateFrameCounts(8193, 8192)._unsafeUnwrapErr()
    expect(error).toEqual({
      type: 'CAPACITY_ERROR',
      message: 'Vertex count of 8,193, exceeds limit of 8,192!',
      actual: 8193,
      limit: 8192,
    })
  })

  it('should reject one frame too many', () => {
    const error = validateFrameCounts(8192, 8193)._unsafeUnwrapErr()
    expect(error.type).toBe('CAPACITY_ERROR')
    expect(error.message).toBe('Frame count of 8,193, exceeds limit of 8,192!')
  })
})

describe('bakeFrames', () => {
  it('should bake merged objects into named textures', () => {
    const output = bakeFrames(createInput())._unsafeUnwrap()

    // 最大移動量 0.025 (Pole の z) / 0.01 -> 3
    expect(output.scaleFactor).toBe(3)
    expect(output.offsetTexture.name).toBe('T_Flag_Scale3_O')
    expect(output.normalTexture.name).toBe('T_Flag_N')
    expect([output.offsetTexture.grid.width, output.offsetTexture.grid.height]).toEqual([3, 3])

    const grid = output.offsetTexture.grid.data
    // 行 0 = フレーム 3: v0 (0, 0.0125, 0) x 3 -> (0, -0.0375, 0)
    expectCloseArray(grid.subarray(0, 4), [0, -0.0375, 0, 1])
    // 行 1 = フレーム 2: v2 (0, 0, 0.025) x 3
    expectCloseArray(grid.subarray((1 * 3 + 2) * 4, (1 * 3 + 2) * 4 + 4), [0, 0, 0.075, 1])
  })

  it('should use the output name when given', () => {
    const output = bakeFrames(createInput(), { outputName: 'Banner', targetUnit: 'M' })._unsafeUnwrap()
    expect(output.offsetTexture.name).toBe('T_Banner_Scale1_O')
  })

  it('should create a vertex_anim layer per object addressing the merged texture', () => {
    const { uvLayers } = bakeFrames(createInput())._unsafeUnwrap()

    expect(uvLayers.map((l) => [l.objectName, l.name])).toEqual([
      ['Flag', 'vertex_anim'],
      ['Pole', 'vertex_anim'],
    ])
    expectCloseArray(uvLayers[0].data, [0.5 / 3, VERTEX_ANIM_V, 1.5 / 3, VERTEX_ANIM_V])
    expectCloseArray(uvLayers[1].data, [2.5 / 3, VERTEX_ANIM_V])
  })

  it('should narrow the texture to the vertex group', () => {
    const input = createInput()
    const grouped: FrameBakeInput = {
      ...input,
      objects: [
        object('Flag', 2, { vertexGroups: { names: ['Cloth'], memberships: [[], [0]] } }),
        object('Pole', 1),
      ],
    }

    const output = bakeFrames(grouped, { groupName: 'Cloth' })._unsafeUnwrap()

    expect(output.partition.totalActive).toBe(1)
    expect(output.offsetTexture.grid.width).toBe(1)
    expectCloseArray(output.uvLayers[0].data, [0, VERTEX_ANIM_V, 0.5, VERTEX_ANIM_V])
    expectCloseArray(output.uvLayers[1].data, [0, VERTEX_ANIM_V])
  })

  describe('validation', () => {
    it('should reject objects with topology changing modifiers', () => {
      const input = createInput()
      const result = bakeFrames({
        ...input,
        objects: [object('Flag', 2, { modifiers: ['ARMATURE', 'DATA_TRANSFER'] }), object('Pole', 1)],
      })

      expect(result._unsafeUnwrapErr()).toEqual({
        type: 'PRECONDITION_ERROR',
        message: 'Objects with Data_Transfer modifiers are not allowed! ("Flag")',
      })
    })

    it('should check the vertex limit before anything else is read', () => {
      const input = createInput()
      const result = bakeFrames({
        ...input,
        objects: [object('A', 2000), object('B', 3000), object('C', 3193)],
      })

      expect(result._unsafeUnwrapErr().type).toBe('CAPACITY_ERROR')
    })

    it('should pass the count gate at exactly 8192 vertices', () => {
      const input = createInput()
      const result = bakeFrames({
        ...input,
        objects: [object('A', 2000), object('B', 3000), object('C', 3192)],
      })

      // 件数チェックは通過し、スナップショットとの頂点数不一致で止まる
      expect(result._unsafeUnwrapErr()).toEqual({
        type: 'PRECONDITION_ERROR',
        message: 'Snapshots hold 3 vertices, but the objects have 8192 in total',
      })
    })

    it('should reject more than 8192 frames', () => {
      const frame = snapshot('frame', [0, 0, 0])
      const result = bakeFrames({
        objects: [object('Dot', 1)],
        snapshots: Array.from({ length: 8193 }, () => frame),
      })

      const error = result._unsafeUnwrapErr()
      expect(error.type).toBe('CAPACITY_ERROR')
      if (error.type === 'CAPACITY_ERROR') {
        expect(error.actual).toBe(8193)
      }
    })

    it('should reject unknown conventions', () => {
      const result = bakeFrames(createInput(), { convention: 'Z_UP' })
      expect(result._unsafeUnwrapErr().type).toBe('CONFIGURATION_ERROR')
    })

    it('should keep every vertex active when the group has no members', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
      const input = createInput()
      const output = bakeFrames(
        {
          ...input,
          objects: [
            object('Flag', 2, { vertexGroups: { names: ['Cloth'], memberships: [[], []] } }),
            object('Pole', 1),
          ],
        },
        { groupName: 'Cloth' },
      )._unsafeUnwrap()

      expect(output.partition.groupName).toBeNull()
      expect(output.partition.totalActive).toBe(3)
      expect(output.offsetTexture.grid.width).toBe(3)
      expect(warn).toHaveBeenCalledOnce()
      warn.mockRestore()
    })
  })
})
