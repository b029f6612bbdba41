import fs from 'fs'
import os from 'os'
import path from 'path'
import { CLIPTokenizer, parseMerges } from '../../tokenizers/CLIPTokenizer'
import { setModelCacheDir } from '../../hub/node'
import { ConfigurationError } from '../../errors'

jest.mock('@huggingface/hub', () => ({
  downloadFile: jest.fn(async () => null),
}))

const vocab = {
  '<|startoftext|>': 49406,
  '<|endoftext|>': 49407,
  'a</w>': 320,
  'r': 81,
  'e': 68,
  'd</w>': 340,
  're': 561,
  'red</w>': 736,
  'f': 69,
  'o': 78,
  'x</w>': 343,
}
const merges = '#version: 0.2\nr e\nre d</w>\n'

describe('CLIP Tokenizer', () => {
  it('should encode a prompt between the start and end tokens', () => {
    const tokenizer = new CLIPTokenizer(vocab, parseMerges(merges))

    expect(tokenizer.encode('A red fox')).toEqual([49406, 320, 736, 69, 78, 343, 49407])
    expect(tokenizer.encode('  RED  ')).toEqual([49406, 736, 49407])
    expect(tokenizer.encode('')).toEqual([49406, 49407])
  })

  it('should drop the version header and blank lines from merges', () => {
    expect(parseMerges(merges)).toEqual(['r e', 're d</w>'])
  })

  it('should require the start and end tokens in the vocabulary', () => {
    expect(() => new CLIPTokenizer({ 'a</w>': 320 }, [])).toThrow(ConfigurationError)
  })

  it('should load vocab.json and merges.txt from the tokenizer directory', async () => {
    const cacheDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'latent-ddim-'))
    try {
      setModelCacheDir(cacheDir)
      const tokenizerDir = path.join(cacheDir, 'test/repo/tokenizer')
      await fs.promises.mkdir(tokenizerDir, { recursive: true })
      await fs.promises.writeFile(path.join(tokenizerDir, 'vocab.json'), JSON.stringify(vocab))
      await fs.promises.writeFile(path.join(tokenizerDir, 'merges.txt'), merges)

      const tokenizer = await CLIPTokenizer.fromPretrained('test/repo')

      expect(tokenizer.encode('a red fox')).toEqual([49406, 320, 736, 69, 78, 343, 49407])
    } finally {
      await fs.promises.rm(cacheDir, { recursive: true, force: true })
    }
  })
})
