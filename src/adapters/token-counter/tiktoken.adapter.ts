// =============================================================================
// TiktokenBudgeter — Truncate text to a model-token budget via tiktoken
// =============================================================================

import { get_encoding, type Tiktoken, type TiktokenEncoding } from "tiktoken";
import { ConfigError } from "../../errors.js";

export const TOKENIZER_ENCODINGS = [
  "gpt2",
  "r50k_base",
  "p50k_base",
  "p50k_edit",
  "cl100k_base",
  "o200k_base",
] as const satisfies readonly TiktokenEncoding[];

export type TokenizerEncoding = (typeof TOKENIZER_ENCODINGS)[number];

export function isTokenizerEncoding(name: string): name is TokenizerEncoding {
  const names: readonly string[] = TOKENIZER_ENCODINGS;
  return names.includes(name);
}

export class TiktokenBudgeter {
  private readonly encodingCache = new Map<TokenizerEncoding, Tiktoken>();

  private getEncoding(name: string): Tiktoken {
    if (!isTokenizerEncoding(name)) {
      throw new ConfigError([`TOKENIZER_ENCODING: unknown encoding "${name}"`]);
    }
    const cached = this.encodingCache.get(name);
    if (cached) return cached;

    const enc = get_encoding(name);
    this.encodingCache.set(name, enc);
    return enc;
  }

  count(text: string, encodingName: string): number {
    if (!text) return 0;
    return this.getEncoding(encodingName).encode_ordinary(text).length;
  }

  /**
   * Keeps the first `maxTokens` tokens of `text`. Text already within budget
   * comes back untouched; a multi-byte character split by the cut is dropped.
   */
  truncate(text: string, maxTokens: number, encodingName: string): string {
    if (!Number.isInteger(maxTokens) || maxTokens < 1) {
      throw new ConfigError([`MAX_TOKENS_PER_ENTRY: expected a positive integer, got ${maxTokens}`]);
    }
    const enc = this.getEncoding(encodingName);
    if (!text) return text;

    const tokens = enc.encode_ordinary(text);
    if (tokens.length <= maxTokens) return text;

    // Decoding a prefix can merge differently on re-encode; shrink until it fits.
    for (let cut = maxTokens; cut > 0; cut--) {
      const decoded = decodePrefix(enc, tokens.subarray(0, cut));
      if (enc.encode_ordinary(decoded).length <= maxTokens) return decoded;
    }
    return "";
  }

  /** Release cached encodings */
  dispose(): void {
    for (const enc of this.encodingCache.values()) enc.free();
    this.encodingCache.clear();
  }
}

function decodePrefix(enc: Tiktoken, tokens: Uint32Array): string {
  // stream mode holds back an incomplete trailing UTF-8 sequence instead of emitting U+FFFD
  return new TextDecoder("utf-8").decode(enc.decode(tokens), { stream: true });
}

const sharedBudgeter = new TiktokenBudgeter();

export function truncateToTokenLimit(
  text: string,
  maxTokens: number,
  encodingName: string,
): string {
  return sharedBudgeter.truncate(text, maxTokens, encodingName);
}
