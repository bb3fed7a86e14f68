import assert from 'node:assert/strict';
import test from 'node:test';
import { chunkText } from '../../ingest/chunker.js';
import { hashContent } from '../../ingest/hashing.js';
import {
  TiktokenTokenizer,
  WhitespaceTokenizer,
} from '../../ingest/tokenizer.js';
import { buildCorpus } from '../support/corpus.js';

const tokenizer = new WhitespaceTokenizer();

test('text within the budget becomes one chunk', () => {
  const chunks = chunkText(
    '  short note  ',
    { maxTokens: 10, overlapTokens: 2 },
    tokenizer,
  );
  assert.deepEqual(chunks, [
    {
      index: 0,
      text: 'short note',
      tokenCount: 2,
      overlapTokens: 0,
      contentHash: hashContent('short note'),
    },
  ]);
});

test('blank text yields no chunks', () => {
  assert.deepEqual(
    chunkText('\n\n', { maxTokens: 10, overlapTokens: 0 }, tokenizer),
    [],
  );
});

test('rejects an overlap that is not below the budget', () => {
  assert.throws(
    () => chunkText('a b c', { maxTokens: 5, overlapTokens: 5 }, tokenizer),
    /overlapTokens \(5\) must be below maxTokens \(5\)/,
  );
});

test('50k-token document chunks with bounded size and paragraph overlap', () => {
  const text = buildCorpus(500);
  assert.equal(tokenizer.count(text), 50_000);

  const chunks = chunkText(
    text,
    { maxTokens: 1000, overlapTokens: 200 },
    tokenizer,
  );

  // 10 paragraphs in the first chunk, then 8 fresh ones per chunk.
  assert.equal(chunks.length, 63);
  assert.deepEqual(
    chunks.map((chunk) => chunk.index),
    Array.from({ length: 63 }, (_, i) => i),
  );
  for (const chunk of chunks) {
    assert.ok(chunk.tokenCount <= 1000);
    assert.ok(chunk.text.endsWith('end.'));
    assert.equal(chunk.contentHash, hashContent(chunk.text));
  }
  assert.equal(chunks[0].overlapTokens, 0);
  assert.equal(chunks[1].overlapTokens, 200);
  assert.equal(chunks[62].tokenCount, 400);

  for (let i = 0; i + 1 < chunks.length; i += 1) {
    const tail = chunks[i].text.split('\n\n').slice(-2);
    const head = chunks[i + 1].text.split('\n\n').slice(0, 2);
    assert.deepEqual(head, tail, `overlap between ${i} and ${i + 1}`);
  }
});

function seededRandom(seed: number) {
  let state = seed;
  return () => {
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

const VOCABULARY = [
  'river', 'stone', 'lantern', 'quietly', 'market', 'over', 'the', 'a',
  'copper', 'winter', 'signal', 'folded', 'north', 'garden', 'slowly',
  'engine', 'paper', 'and', 'under', 'bright',
];

function randomDocument(random: () => number): string {
  const between = (min: number, max: number) =>
    min + Math.floor(random() * (max - min + 1));
  const sentence = () => {
    const words = Array.from({ length: between(1, 12) }, () => {
      const word = VOCABULARY[between(0, VOCABULARY.length - 1)];
      return random() < 0.1 ? `${word},` : word;
    });
    return `${words.join(' ').replace(/,$/, '')}${'.!?'.charAt(between(0, 2))}`;
  };
  const line = () =>
    Array.from({ length: between(1, 5) }, sentence).join(' ');
  const paragraph = () =>
    Array.from({ length: between(1, 4) }, line).join('\n');
  return Array.from({ length: between(1, 6) }, paragraph).join('\n\n');
}

const wordsOf = (text: string) => text.split(/\s+/).filter(Boolean);

test('random documents chunk within the cl100k budget and lose no words', () => {
  const tiktoken = new TiktokenTokenizer();
  const cfg = { maxTokens: 60, overlapTokens: 15 };

  // The longest tail of `prev` starting at a word that opens `next` and
  // measures exactly `tokens`.
  const sharedTail = (prev: string, next: string, tokens: number) => {
    if (tokens === 0) return '';
    for (let i = 1; i < prev.length; i += 1) {
      if (!/\s/.test(prev.charAt(i - 1)) || /\s/.test(prev.charAt(i))) {
        continue;
      }
      const tail = prev.slice(i);
      if (next.startsWith(tail) && tiktoken.count(tail) === tokens) {
        return tail;
      }
    }
    return null;
  };

  for (let seed = 1; seed <= 25; seed += 1) {
    const text = randomDocument(seededRandom(seed));
    const chunks = chunkText(text, cfg, tiktoken);
    assert.ok(chunks.length > 0, `seed ${seed}`);
    assert.equal(chunks[0].overlapTokens, 0, `seed ${seed}`);

    const rebuilt: string[] = [];
    chunks.forEach((chunk, i) => {
      assert.ok(chunk.tokenCount <= cfg.maxTokens, `seed ${seed} chunk ${i}`);
      assert.equal(chunk.tokenCount, tiktoken.count(chunk.text));
      const seedText =
        i === 0
          ? ''
          : sharedTail(chunks[i - 1].text, chunk.text, chunk.overlapTokens);
      assert.ok(seedText !== null, `seed ${seed} chunk ${i} overlap`);
      rebuilt.push(...wordsOf(chunk.text).slice(wordsOf(seedText).length));
    });
    assert.deepEqual(rebuilt, wordsOf(text), `seed ${seed}`);
  }
});
