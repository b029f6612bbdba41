import { Tensor, TypedTensor } from 'onnxruntime-common'
import seedrandom from 'seedrandom'
import { ConfigurationError, ShapeMismatchError } from '../errors'

export type FloatTensor = TypedTensor<'float32'>
export type IntTensor = TypedTensor<'int32'>
export type ImageTensor = TypedTensor<'uint8'>

export function floatTensor (data: Float32Array | readonly number[], dims: readonly number[]): FloatTensor {
  return new Tensor('float32', data, dims)
}

export function zeros (dims: readonly number[]): FloatTensor {
  return floatTensor(new Float32Array(dims.reduce((a, b) => a * b, 1)), dims)
}

export function sameDims (a: readonly number[], b: readonly number[]) {
  return a.length === b.length && a.every((size, i) => size === b[i])
}

export function assertSameDims (call: string, expected: readonly number[], actual: readonly number[]) {
  if (!sameDims(expected, actual)) {
    throw new ShapeMismatchError(call, expected, actual)
  }
}

function elementwise (
  call: string,
  a: FloatTensor,
  b: FloatTensor|number,
  op: (x: number, y: number) => number,
): FloatTensor {
  const out = new Float32Array(a.data.length)
  if (typeof b === 'number') {
    for (let i = 0; i < out.length; ++i) {
      out[i] = op(a.data[i], b)
    }
  } else {
    assertSameDims(call, a.dims, b.dims)
    for (let i = 0; i < out.length; ++i) {
      out[i] = op(a.data[i], b.data[i])
    }
  }
  return floatTensor(out, a.dims)
}

export function add (a: FloatTensor, b: FloatTensor|number) {
  return elementwise('add', a, b, (x, y) => x + y)
}

export function sub (a: FloatTensor, b: FloatTensor|number) {
  return elementwise('sub', a, b, (x, y) => x - y)
}

export function mul (a: FloatTensor, b: FloatTensor|number) {
  return elementwise('mul', a, b, (x, y) => x * y)
}

export function div (a: FloatTensor, b: FloatTensor|number) {
  return elementwise('div', a, b, (x, y) => x / y)
}

export function clipByValue (tensor: FloatTensor, min: number, max: number) {
  if (max < min) {
    throw new RangeError(`Invalid clip range [${min}, ${max}]`)
  }
  return elementwise('clipByValue', tensor, 0, (x) => Math.min(Math.max(x, min), max))
}

export function range (start: number, end: number, step = 1) {
  if (step <= 0) {
    throw new RangeError(`range step must be positive, got ${step}`)
  }
  const data: number[] = []
  for (let i = start; i < end; i += step) {
    data.push(i)
  }
  return data
}

export function linspace (start: number, end: number, num: number) {
  if (num === 1) {
    return [start]
  }
  const arr: number[] = []
  const step = (end - start) / (num - 1)
  for (let i = 0; i < num; i++) {
    arr.push(start + step * i)
  }
  return arr
}

export function cumprod (values: readonly number[]) {
  const out: number[] = []
  let acc = 1
  for (const value of values) {
    acc *= value
    out.push(acc)
  }
  return out
}

function randomNormal (rng: seedrandom.PRNG) {
  let u = 0; let v = 0

  while (u === 0) u = rng()
  while (v === 0) v = rng()
  const num = Math.sqrt(-2.0 * Math.log(u)) * Math.cos(2.0 * Math.PI * v)
  return num
}

/**
 * Standard normal samples via Box-Muller. A non-empty string seed (or a PRNG that
 * is reused between calls) makes the draw reproducible; an empty seed uses entropy.
 */
export function randomNormalTensor (shape: readonly number[], mean = 0, std = 1, seed: string|seedrandom.PRNG = ''): FloatTensor {
  const rng = typeof seed === 'string'
    ? (seed !== '' ? seedrandom(seed) : seedrandom())
    : seed
  const data = new Float32Array(shape.reduce((a, b) => a * b, 1))
  for (let i = 0; i < data.length; i++) {
    data[i] = randomNormal(rng) * std + mean
  }
  return floatTensor(data, shape)
}

/**
 * Concatenates tensors along `axis`. All dims other than `axis` must match.
 */
export function cat (tensors: readonly FloatTensor[], axis: number = 0): FloatTensor {
  if (tensors.length === 0) {
    throw new Error('No tensors provided.')
  }

  const rank = tensors[0].dims.length
  if (axis < 0) {
    axis = rank + axis
  }
  if (axis < 0 || axis >= rank) {
    throw new RangeError(`Invalid axis ${axis} for rank ${rank}`)
  }

  const shape = [...tensors[0].dims]
  for (const t of tensors) {
    const expected = shape.map((size, i) => i === axis ? t.dims[i] : size)
    assertSameDims('cat', expected, t.dims)
  }
  shape[axis] = tensors.reduce((sum, t) => sum + t.dims[axis], 0)

  const outer = shape.slice(0, axis).reduce((a, b) => a * b, 1)
  const inner = shape.slice(axis + 1).reduce((a, b) => a * b, 1)
  const data = new Float32Array(shape.reduce((a, b) => a * b, 1))

  let offset = 0
  for (let o = 0; o < outer; o++) {
    for (const t of tensors) {
      const chunk = t.dims[axis] * inner
      data.set(t.data.subarray(o * chunk, (o + 1) * chunk), offset)
      offset += chunk
    }
  }

  return floatTensor(data, shape)
}

export function sliceBatch (tensor: FloatTensor, start: number, end: number): FloatTensor {
  const batch = tensor.dims[0]
  if (start < 0 || end > batch || start >= end) {
    throw new RangeError(`Invalid batch slice [${start}, ${end}) of ${batch}`)
  }
  const itemSize = tensor.data.length / batch
  return floatTensor(
    tensor.data.slice(start * itemSize, end * itemSize),
    [end - start, ...tensor.dims.slice(1)],
  )
}

/**
 * Broadcast by repetition: a `[1, ...]` tensor becomes `[batchSize, ...]`.
 */
export function repeatBatch (tensor: FloatTensor, batchSize: number): FloatTensor {
  if (tensor.dims[0] !== 1) {
    throw new ShapeMismatchError('repeatBatch', [1, ...tensor.dims.slice(1)], tensor.dims)
  }
  const data = new Float32Array(tensor.data.length * batchSize)
  for (let b = 0; b < batchSize; b++) {
    data.set(tensor.data, b * tensor.data.length)
  }
  return floatTensor(data, [batchSize, ...tensor.dims.slice(1)])
}

export function toFloatTensors (modelRunResult: Readonly<Record<string, Tensor>>): Record<string, FloatTensor> {
  const result: Record<string, FloatTensor> = {}
  for (const [name, value] of Object.entries(modelRunResult)) {
    if (value.type !== 'float32' || !(value.data instanceof Float32Array)) {
      throw new ConfigurationError(`Model output ${name} has type ${value.type}, expected float32`)
    }
    result[name] = floatTensor(value.data, value.dims)
  }
  return result
}
