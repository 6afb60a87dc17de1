export type TextSegment = {
  index: number;
  text: string;
  /** Source span in the original input, `[start, end)`. */
  start: number;
  end: number;
};

// Sentence body plus its terminal punctuation and any closing quotes/brackets,
// or a trailing run with no terminator. Line breaks always end a segment.
const SEGMENT_PATTERN = /[^.!?\n]*[.!?]+["'’”)\]]*|[^.!?\n]+/g;

function* splitSegments(text: string): Generator<TextSegment> {
  let index = 0;
  for (const match of text.matchAll(SEGMENT_PATTERN)) {
    const raw = match[0];
    const offset = match.index ?? 0;
    const leading = raw.length - raw.trimStart().length;
    const trimmed = raw.trim();
    if (!trimmed) continue;
    const start = offset + leading;
    yield {
      index: index++,
      text: trimmed.replace(/\s+/g, " "),
      start,
      end: start + trimmed.length
    };
  }
}

/**
 * Splits text into sentence-like segments. The result is lazy and can be
 * iterated any number of times; each pass re-scans the input.
 */
export function segmentText(text: string): Iterable<TextSegment> {
  return {
    [Symbol.iterator]: () => splitSegments(text)
  };
}
