import vocabulary from './vocabulary.json';
import { SeededRandom } from './seeded-random';

const HEX_DIGITS_PER_DRAW = 8;
const UUID_VARIANTS = ['8', '9', 'a', 'b'];

export interface FakeContentProducerOptions {
  /** Upper bound on words per streamed chunk */
  tokensPerChunk?: number;
}

/**
 * Produces filler text and opaque identifiers for synthetic responses.
 * Every draw goes through one seeded generator, so two producers built
 * with the same seed return the same sequence for the same calls.
 */
export class FakeContentProducer {
  private readonly random: SeededRandom;
  readonly tokensPerChunk: number;

  constructor(seed: number, options: FakeContentProducerOptions = {}) {
    this.random = new SeededRandom(seed);
    this.tokensPerChunk = Math.max(1, options.tokensPerChunk ?? 3);
  }

  /**
   * Rough token count: one token per 4 bytes of UTF-8
   */
  static estimateTokens(text: string): number {
    return Math.ceil(Buffer.byteLength(text, 'utf8') / 4);
  }

  word(): string {
    return this.random.pick(vocabulary);
  }

  words(count: number): string {
    const words: string[] = [];
    for (let i = 0; i < count; i++) {
      words.push(this.word());
    }
    return words.join(' ');
  }

  /**
   * 5 to 14 words, capitalized, ending with a period
   */
  sentence(): string {
    const text = this.words(this.random.int(5, 15));
    return `${text.charAt(0).toUpperCase()}${text.slice(1)}.`;
  }

  /**
   * 2 to 4 sentences
   */
  paragraph(): string {
    const count = this.random.int(2, 5);
    const sentences: string[] = [];
    for (let i = 0; i < count; i++) {
      sentences.push(this.sentence());
    }
    return sentences.join(' ');
  }

  /**
   * Split a token budget into word chunks of 1..tokensPerChunk words each.
   * The chunk sizes always add up to the budget; the last chunk gets a period.
   */
  streamChunks(totalTokens: number): string[] {
    const chunks: string[] = [];
    let remaining = Math.floor(totalTokens);

    while (remaining > 0) {
      const size = Math.min(
        remaining,
        this.random.int(1, this.tokensPerChunk + 1),
      );
      chunks.push(this.words(size));
      remaining -= size;
    }

    if (chunks.length > 0) {
      chunks[chunks.length - 1] += '.';
    }
    return chunks;
  }

  /**
   * Lowercase hex string of the given length
   */
  hex(length: number): string {
    let out = '';
    while (out.length < length) {
      out += this.random
        .nextUint32()
        .toString(16)
        .padStart(HEX_DIGITS_PER_DRAW, '0');
    }
    return out.slice(0, length);
  }

  toolCallId(): string {
    return this.hex(11);
  }

  /**
   * `chatcmpl-` followed by a UUID v4 shaped value
   */
  completionId(): string {
    const variant = this.random.pick(UUID_VARIANTS);
    return `chatcmpl-${this.hex(8)}-${this.hex(4)}-4${this.hex(3)}-${variant}${this.hex(3)}-${this.hex(12)}`;
  }

  fingerprint(): string {
    return `fp_${this.hex(16)}`;
  }

  /**
   * Opaque base64 blob standing in for a reasoning-block signature
   */
  signature(): string {
    const bytes = Buffer.alloc(96);
    for (let offset = 0; offset < bytes.length; offset += 4) {
      bytes.writeUInt32BE(this.random.nextUint32(), offset);
    }
    return `EtUB${bytes.toString('base64')}`;
  }
}
