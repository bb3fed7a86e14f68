/**
 * `paragraphs` paragraphs of ten sentences each; every sentence is ten
 * whitespace-separated words ending in "end.", tagged with its paragraph.
 */
export function buildCorpus(paragraphs: number): string {
  return Array.from({ length: paragraphs }, (_, p) =>
    Array.from(
      { length: 10 },
      () => `p${p} w w w w w w w w end.`,
    ).join(' '),
  ).join('\n\n');
}
