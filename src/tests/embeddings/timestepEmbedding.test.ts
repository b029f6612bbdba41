import { timestepEmbedding } from '../../embeddings/timestepEmbedding'
import { ConfigurationError } from '../../errors'

describe('timestepEmbedding', () => {
  it('should default to a [1, 320] vector', () => {
    const embedding = timestepEmbedding(0)

    expect([...embedding.dims]).toEqual([1, 320])
    expect([...embedding.data.slice(0, 160)]).toEqual(new Array(160).fill(1))
    expect([...embedding.data.slice(160)]).toEqual(new Array(160).fill(0))
  })

  it('should put cosines before sines over log-spaced frequencies', () => {
    const embedding = timestepEmbedding(1, 4)

    expect(embedding.data[0]).toBeCloseTo(Math.cos(1), 6)
    expect(embedding.data[1]).toBeCloseTo(Math.cos(0.01), 6)
    expect(embedding.data[2]).toBeCloseTo(Math.sin(1), 6)
    expect(embedding.data[3]).toBeCloseTo(Math.sin(0.01), 6)
  })

  it('should honour maxPeriod', () => {
    const embedding = timestepEmbedding(3, 4, 100)
    expect(embedding.data[1]).toBeCloseTo(Math.cos(0.3), 6)
  })

  it('should be a pure function of its arguments', () => {
    expect([...timestepEmbedding(961).data]).toEqual([...timestepEmbedding(961).data])
  })

  it('should reject odd dims', () => {
    expect(() => timestepEmbedding(1, 321)).toThrow(ConfigurationError)
    expect(() => timestepEmbedding(1, 0)).toThrow(ConfigurationError)
  })
})
