import { getEncoding, type Tiktoken } from 'js-tiktoken';
import type { TokenizerName } from './config.js';

export interface Tokenizer {
  readonly name: TokenizerName;
  encode(text: string): number[];
  decode(tokens: number[]): string;
  count(text: string): number;
}

export class TiktokenTokenizer implements Tokenizer {
  readonly name = 'cl100k_base' as const;
  private readonly encoding: Tiktoken;

  constructor() {
    this.encoding = getEncoding('cl100k_base');
  }

  encode(text: string): number[] {
    return this.encoding.encode(text);
  }

  decode(tokens: number[]): string {
    return this.encoding.decode(tokens);
  }

  count(text: string): number {
    return text ? this.encoding.encode(text).length : 0;
  }
}

/**
 * One token per whitespace-separated word. Decoding joins words with single
 * spaces, so it is lossy for the original whitespace.
 */
export class WhitespaceTokenizer implements Tokenizer {
  readonly name = 'whitespace' as const;
  private vocabulary = new Map<string, number>();
  private words: string[] = [];

  encode(text: string): number[] {
    return this.split(text).map((word) => {
      const known = this.vocabulary.get(word);
      if (known !== undefined) return known;
      const id = this.words.length;
      this.words.push(word);
      this.vocabulary.set(word, id);
      return id;
    });
  }

  decode(tokens: number[]): string {
    return tokens
      .map((id) => this.words[id])
      .filter((word): word is string => word !== undefined)
      .join(' ');
  }

  count(text: string): number {
    return this.split(text).length;
  }

  private split(text: string) {
    return text.split(/\s+/).filter(Boolean);
  }
}

export function createTokenizer(name: TokenizerName): Tokenizer {
  switch (name) {
    case 'cl100k_base':
      return new TiktokenTokenizer();
    case 'whitespace':
      return new WhitespaceTokenizer();
  }
}
