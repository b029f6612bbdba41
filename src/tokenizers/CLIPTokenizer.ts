import { PreTrainedTokenizer } from '@huggingface/transformers'
import { getModelJSON, getModelTextFile } from '../hub'
import { GetModelFileOptions } from '../hub/common'
import { ConfigurationError } from '../errors'
import { Tokenizer } from '../models/types'

const START_OF_TEXT = '<|startoftext|>'
const END_OF_TEXT = '<|endoftext|>'
// 49152 vocab entries minus 256 byte tokens and the two special tokens
const MAX_MERGES = 49152 - 256 - 2

export interface ClipPretrainedOptions extends GetModelFileOptions {
  subdir?: string
}

function isVocab (value: unknown): value is Record<string, number> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) &&
    Object.values(value).every((id) => typeof id === 'number')
}

/**
 * Lowercasing byte-pair tokenizer with `</w>` word endings. Ids come back wrapped in the
 * start and end tokens and without padding.
 */
export class CLIPTokenizer implements Tokenizer {
  private readonly tokenizer: PreTrainedTokenizer
  readonly startTokenId: number
  readonly endTokenId: number

  constructor (vocab: Record<string, number>, merges: readonly string[], tokenizerConfig: Record<string, unknown> = {}) {
    const startTokenId = vocab[START_OF_TEXT]
    const endTokenId = vocab[END_OF_TEXT]
    if (startTokenId === undefined || endTokenId === undefined) {
      throw new ConfigurationError(`Vocabulary must contain ${START_OF_TEXT} and ${END_OF_TEXT}`)
    }
    this.startTokenId = startTokenId
    this.endTokenId = endTokenId

    const tokenizerJSON = {
      normalizer: {
        type: 'Lowercase',
      },
      pre_tokenizer: {
        type: 'WhitespaceSplit',
      },
      post_processor: null,
      decoder: null,
      model: {
        type: 'BPE',
        vocab,
        unk_token: END_OF_TEXT,
        end_of_word_suffix: '</w>',
        merges: [...merges],
      },
      added_tokens: [],
    }
    this.tokenizer = new PreTrainedTokenizer(tokenizerJSON, tokenizerConfig)
  }

  encode (text: string) {
    const ids = this.tokenizer.encode(text, { add_special_tokens: false })
    return [this.startTokenId, ...ids, this.endTokenId]
  }

  /**
   * Reads `vocab.json` and `merges.txt` from `<subdir>/` of a model repository.
   */
  static async fromPretrained (modelRepoOrPath: string, options: ClipPretrainedOptions = {}) {
    const { subdir = 'tokenizer', ...fileOptions } = options
    const [vocab, merges] = await Promise.all([
      getModelJSON(modelRepoOrPath, `${subdir}/vocab.json`, true, fileOptions),
      getModelTextFile(modelRepoOrPath, `${subdir}/merges.txt`, true, fileOptions),
    ])
    if (!isVocab(vocab)) {
      throw new ConfigurationError(`${subdir}/vocab.json must map tokens to ids`)
    }
    if (merges === null) {
      throw new ConfigurationError(`${subdir}/merges.txt was not found in ${modelRepoOrPath}`)
    }

    return new CLIPTokenizer(vocab, parseMerges(merges))
  }
}

/** Merge rules from `merges.txt`, without the `#version` header and blank lines. */
export function parseMerges (text: string) {
  return text
    .split('\n')
    .filter((line) => line.trim() !== '' && !line.startsWith('#version'))
    .slice(0, MAX_MERGES)
}
