import { Tensor } from 'onnxruntime-common'
import {
  add, cat, clipByValue, cumprod, floatTensor, linspace, mul, randomNormalTensor, range, repeatBatch,
  sliceBatch, sub, toFloatTensors,
} from '../../util/Tensor'
import { ConfigurationError, ShapeMismatchError } from '../../errors'

describe('Tensor helpers', () => {
  it('should apply elementwise arithmetic without mutating inputs', () => {
    const a = floatTensor([1, 2, 3], [3])
    const b = floatTensor([4, 5, 6], [3])

    expect([...add(a, b).data]).toEqual([5, 7, 9])
    expect([...sub(b, a).data]).toEqual([3, 3, 3])
    expect([...mul(a, 2).data]).toEqual([2, 4, 6])
    expect([...a.data]).toEqual([1, 2, 3])
  })

  it('should reject tensors of different dims', () => {
    const a = floatTensor([1, 2, 3, 4], [2, 2])
    const b = floatTensor([1, 2, 3, 4], [4])

    expect(() => add(a, b)).toThrow(ShapeMismatchError)
    expect(() => sub(a, b)).toThrow('sub: expected dims [2, 2], got [4]')
  })

  it('should clip values', () => {
    const t = floatTensor([-2, 0.5, 3], [3])
    expect([...clipByValue(t, 0, 1).data]).toEqual([0, 0.5, 1])
    expect(() => clipByValue(t, 1, 0)).toThrow(RangeError)
  })

  it('should concatenate along the batch axis', () => {
    const a = floatTensor([1, 2], [1, 2])
    const b = floatTensor([3, 4, 5, 6], [2, 2])
    const result = cat([a, b])

    expect([...result.dims]).toEqual([3, 2])
    expect([...result.data]).toEqual([1, 2, 3, 4, 5, 6])
  })

  it('should concatenate along an inner axis', () => {
    const a = floatTensor([1, 2], [2, 1])
    const b = floatTensor([3, 4, 5, 6], [2, 2])
    const result = cat([a, b], -1)

    expect([...result.dims]).toEqual([2, 3])
    expect([...result.data]).toEqual([1, 3, 4, 2, 5, 6])
  })

  it('should refuse to concatenate mismatched tensors', () => {
    const a = floatTensor([1, 2], [1, 2])
    const b = floatTensor([1, 2, 3], [1, 3])
    expect(() => cat([a, b])).toThrow(ShapeMismatchError)
    expect(() => cat([])).toThrow('No tensors provided.')
  })

  it('should slice and repeat along the batch axis', () => {
    const t = floatTensor([1, 2, 3, 4, 5, 6], [3, 2])
    const slice = sliceBatch(t, 1, 3)
    expect([...slice.dims]).toEqual([2, 2])
    expect([...slice.data]).toEqual([3, 4, 5, 6])
    expect(() => sliceBatch(t, 2, 4)).toThrow(RangeError)

    const repeated = repeatBatch(floatTensor([7, 8], [1, 2]), 3)
    expect([...repeated.dims]).toEqual([3, 2])
    expect([...repeated.data]).toEqual([7, 8, 7, 8, 7, 8])
    expect(() => repeatBatch(t, 2)).toThrow(ShapeMismatchError)
  })

  it('should build number sequences', () => {
    expect(range(1, 10, 4)).toEqual([1, 5, 9])
    expect(range(0, 0)).toEqual([])
    expect(linspace(0, 1, 5)).toEqual([0, 0.25, 0.5, 0.75, 1])
    expect(cumprod([0.5, 0.5, 2])).toEqual([0.5, 0.25, 0.5])
  })

  it('should draw reproducible normal samples from a seed', () => {
    const a = randomNormalTensor([2, 3], 0, 1, 'test-seed')
    const b = randomNormalTensor([2, 3], 0, 1, 'test-seed')
    const c = randomNormalTensor([2, 3], 0, 1, 'other-seed')

    expect([...a.dims]).toEqual([2, 3])
    expect([...a.data]).toEqual([...b.data])
    expect([...a.data]).not.toEqual([...c.data])
  })

  it('should only accept float32 model outputs', () => {
    const ok = toFloatTensors({ out: new Tensor('float32', new Float32Array([1, 2]), [2]) })
    expect([...ok.out.data]).toEqual([1, 2])

    expect(() => toFloatTensors({ ids: new Tensor('int32', new Int32Array([1]), [1]) }))
      .toThrow(ConfigurationError)
  })
})
