const segmenter = new Intl.Segmenter(undefined, { granularity: "grapheme" });

/** User-perceived characters of `text`; a base letter keeps its combining marks. */
export function graphemes(text: string): string[] {
  return Array.from(segmenter.segment(text), (part) => part.segment);
}

export function graphemeLength(text: string): number {
  return graphemes(text).length;
}
