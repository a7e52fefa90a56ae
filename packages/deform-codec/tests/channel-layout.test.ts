import { describe, expect, it } from 'vitest'
import {
  buildChannelLayout,
  getChannelSign,
  getRequiredUVLayerCount,
  MAX_UV_LAYERS,
} from '../src/channel-layout'

describe('channel-layout', () => {
  describe('getRequiredUVLayerCount', () => {
    it('should pack three channels per shape key two per layer', () => {
      expect([1, 2, 3, 4].map(getRequiredUVLayerCount)).toEqual([2, 3, 5, 6])
    })
  })

  describe('getChannelSign', () => {
    it('should negate every second shape key', () => {
      const signs: number[] = []
      for (let layer = 0; layer < 6; layer++) {
        signs.push(getChannelSign(layer, 0), getChannelSign(layer, 1))
      }
      expect(signs).toEqual([1, 1, 1, -1, -1, -1, 1, 1, 1, -1, -1, -1])
    })
  })

  describe('buildChannelLayout', () => {
    it('should name layers after the shape key axes they hold', () => {
      const layout = buildChannelLayout(2, 1)._unsafeUnwrap()

      expect(layout.layers.map((l) => l.ordinal)).toEqual([1, 2, 3])
      expect(layout.layers.map((l) => l.name)).toEqual([
        'Morph 1X 1Y',
        'Morph 1Z 2X',
        'Morph 2Y 2Z',
      ])
      expect(layout.layers.every((l) => !l.singleComponent)).toBe(true)
    })

    it('should mark a trailing layer with a single channel', () => {
      const one = buildChannelLayout(1, 0)._unsafeUnwrap()
      expect(one.layers.map((l) => l.name)).toEqual(['Morph 1X 1Y', 'Morph 1Z'])
      expect(one.layers[1].singleComponent).toBe(true)
      expect(one.layers[1].channels).toHaveLength(1)

      const three = buildChannelLayout(3, 0)._unsafeUnwrap()
      expect(three.layers).toHaveLength(5)
      expect(three.layers[4].name).toBe('Morph 3Z')
      expect(three.layers[4].singleComponent).toBe(true)
    })

    it('should assign U to even channels and V to odd channels', () => {
      const layout = buildChannelLayout(4, 0)._unsafeUnwrap()
      const channels = layout.layers.flatMap((l) => l.channels)

      expect(channels).toHaveLength(12)
      expect(channels.map((c) => `${c.shapeKey}${c.axis}${c.component}`)).toEqual([
        '1XU', '1YV', '1ZU', '2XV', '2YU', '2ZV',
        '3XU', '3YV', '3ZU', '4XV', '4YU', '4ZV',
      ])
      expect(channels.map((c) => c.sign)).toEqual([1, 1, 1, -1, -1, -1, 1, 1, 1, -1, -1, -1])
    })

    it('should fail when the layers would run past the last UV slot', () => {
      const result = buildChannelLayout(2, 7)

      expect(result.isErr()).toBe(true)
      const error = result._unsafeUnwrapErr()
      expect(error.type).toBe('CAPACITY_ERROR')
      if (error.type === 'CAPACITY_ERROR') {
        expect(error.actual).toBe(10)
        expect(error.limit).toBe(MAX_UV_LAYERS)
      }
    })

    it('should accept layouts ending exactly on the last UV slot', () => {
      const two = buildChannelLayout(2, 5)._unsafeUnwrap()
      expect(two.layers.map((l) => l.ordinal)).toEqual([5, 6, 7])
      expect(two.layers[2].name).toBe('Morph 2Y 2Z')

      const one = buildChannelLayout(1, 6)._unsafeUnwrap()
      expect(one.layers.map((l) => l.ordinal)).toEqual([6, 7])
      expect(one.layers[1].singleComponent).toBe(true)
    })

    it('should reject more than four shape keys', () => {
      const error = buildChannelLayout(5, 0)._unsafeUnwrapErr()
      expect(error.type).toBe('CAPACITY_ERROR')
      expect(error.message).toBe('Shape key count of 5 exceeds limit of 4!')
    })

    it('should reject invalid counts and start layers', () => {
      expect(buildChannelLayout(0, 0)._unsafeUnwrapErr().type).toBe('CONFIGURATION_ERROR')
      expect(buildChannelLayout(1, -1)._unsafeUnwrapErr().type).toBe('CONFIGURATION_ERROR')
      expect(buildChannelLayout(1, 8)._unsafeUnwrapErr().type).toBe('CONFIGURATION_ERROR')
      expect(buildChannelLayout(1.5, 0)._unsafeUnwrapErr().type).toBe('CONFIGURATION_ERROR')
    })
  })
})
