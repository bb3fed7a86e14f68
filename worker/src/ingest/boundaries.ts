export interface Measure {
  count(text: string): number;
}

export const byteMeasure: Measure = {
  count: (text) => Buffer.byteLength(text, 'utf8'),
};

type BoundaryLevel = {
  name: 'paragraph' | 'line' | 'sentence' | 'clause';
  pattern: RegExp;
  joiner: string;
};

// Coarsest first. A unit only descends when it alone exceeds the limit.
const LEVELS: BoundaryLevel[] = [
  { name: 'paragraph', pattern: /\r?\n[ \t]*\r?\n\s*/, joiner: '\n\n' },
  { name: 'line', pattern: /\r?\n/, joiner: '\n' },
  { name: 'sentence', pattern: /(?<=[.!?])\s+/, joiner: ' ' },
  { name: 'clause', pattern: /(?<=[,;:])\s+/, joiner: ' ' },
];

type Piece = {
  text: string;
  /** Separator placed before this piece when it follows another. */
  joiner: string;
  size: number;
  joinedSize: number;
};

export type SemanticPiece = {
  text: string;
  size: number;
  overlap: number;
};

export type SplitSemanticOptions = {
  limit: number;
  overlap: number;
  measure: Measure;
};

function explode(
  text: string,
  levelIndex: number,
  leadingJoiner: string,
  limit: number,
  measure: Measure,
  out: Piece[],
) {
  const level = LEVELS[levelIndex];
  const parts = text
    .split(level.pattern)
    .map((part) => part.trim())
    .filter(Boolean);

  parts.forEach((part, i) => {
    const joiner = i === 0 ? leadingJoiner : level.joiner;
    const size = measure.count(part);
    if (size > limit && levelIndex + 1 < LEVELS.length) {
      explode(part, levelIndex + 1, joiner, limit, measure, out);
      return;
    }
    // Within the limit, or indivisible at the finest level: emitted whole.
    out.push({
      text: part,
      joiner,
      size,
      joinedSize: measure.count(joiner + part),
    });
  });
}

function join(pieces: Piece[]): string {
  return pieces
    .map((piece, i) => (i === 0 ? piece.text : piece.joiner + piece.text))
    .join('');
}

function estimate(pieces: Piece[]): number {
  return pieces.reduce(
    (sum, piece, i) => sum + (i === 0 ? piece.size : piece.joinedSize),
    0,
  );
}

/**
 * Greedy packing of boundary-aligned units into pieces no larger than
 * `limit`, each seeded with trailing units of its predecessor up to
 * `overlap`. A single unit larger than `limit` with no finer boundary is
 * returned whole.
 */
export function splitSemantic(
  text: string,
  options: SplitSemanticOptions,
): SemanticPiece[] {
  const { limit, overlap, measure } = options;
  if (limit <= 0) throw new RangeError('limit must be positive');

  const units: Piece[] = [];
  explode(text, 0, '', limit, measure, units);
  if (units.length === 0) return [];

  const out: SemanticPiece[] = [];
  let buffer: Piece[] = [];
  let fresh = 0;

  const close = () => {
    const carried: Piece[] = [];
    let body = join(buffer);
    let size = measure.count(body);
    while (size > limit && fresh > 1) {
      const last = buffer.pop();
      if (!last) break;
      carried.unshift(last);
      fresh -= 1;
      body = join(buffer);
      size = measure.count(body);
    }
    while (size > limit && buffer.length > fresh) {
      buffer.shift();
      body = join(buffer);
      size = measure.count(body);
    }

    const seedCount = buffer.length - fresh;
    out.push({
      text: body,
      size,
      overlap:
        seedCount > 0 ? measure.count(join(buffer.slice(0, seedCount))) : 0,
    });

    let seed: Piece[] = [];
    for (let i = buffer.length - 1; i >= 1 && overlap > 0; i -= 1) {
      const candidate = [buffer[i], ...seed];
      if (estimate(candidate) > overlap) break;
      seed = candidate;
    }
    while (seed.length > 0 && estimate([...seed, ...carried]) > limit) {
      seed = seed.slice(1);
    }
    buffer = [...seed, ...carried];
    fresh = carried.length;
  };

  for (const unit of units) {
    if (fresh > 0 && estimate([...buffer, unit]) > limit) {
      close();
    }
    while (
      fresh === 0 &&
      buffer.length > 0 &&
      estimate([...buffer, unit]) > limit
    ) {
      buffer = buffer.slice(1);
    }
    buffer.push(unit);
    fresh += 1;
  }
  while (fresh > 0) close();

  return out;
}
