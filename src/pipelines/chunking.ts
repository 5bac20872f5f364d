import type { ChunkSet } from "../domain/types.js";

export const DEFAULT_CHUNK_SIZE = 2000;
export const DEFAULT_CHUNK_OVERLAP = 0;

/** Paragraph, line, sentence, word, then a hard character cut. */
export const DEFAULT_SEPARATORS: readonly string[] = ["\n\n", "\n", ". ", "! ", "? ", " ", ""];

export interface ChunkingOptions {
  chunkSize?: number;
  chunkOverlap?: number;
  separators?: readonly string[];
}

export interface TextRange {
  text: string;
  start: number;
  end: number;
}

interface Span {
  start: number;
  end: number;
}

/**
 * Splits `text` into ranges of at most `chunkSize` characters.
 *
 * Each range is an exact slice of the input. Without overlap the ranges are
 * contiguous, so joining their text gives back the input.
 */
export function splitIntoChunks(text: string, options: ChunkingOptions = {}): TextRange[] {
  const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}.`);
  }
  const overlap = Math.min(Math.max(options.chunkOverlap ?? DEFAULT_CHUNK_OVERLAP, 0), chunkSize - 1);
  const separators = options.separators ?? DEFAULT_SEPARATORS;

  if (!text.trim()) {
    return [];
  }

  const pieces = splitRange(text, { start: 0, end: text.length }, separators, chunkSize);
  return mergePieces(pieces, chunkSize, overlap).map(({ start, end }) => ({
    text: text.slice(start, end),
    start,
    end,
  }));
}

export function createChunkSet(
  documentKey: string,
  text: string,
  options: ChunkingOptions = {},
): ChunkSet {
  const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
  const chunkOverlap = options.chunkOverlap ?? DEFAULT_CHUNK_OVERLAP;
  const chunks = splitIntoChunks(text, options).map((range, index) => ({
    text: range.text,
    metadata: { source: documentKey, index, start: range.start, end: range.end },
  }));

  return {
    documentKey,
    chunks,
    metadata: chunks[0]?.metadata ?? null,
    chunkSize,
    chunkOverlap,
    createdAt: new Date().toISOString(),
  };
}

function splitRange(
  text: string,
  range: Span,
  separators: readonly string[],
  chunkSize: number,
): Span[] {
  if (range.end - range.start <= chunkSize) {
    return [range];
  }

  const separatorIndex = separators.findIndex(
    (separator) => separator === "" || containsWithin(text, separator, range),
  );
  if (separatorIndex < 0 || separators[separatorIndex] === "") {
    return hardCut(text, range, chunkSize);
  }

  const separator = separators[separatorIndex];
  const remaining = separators.slice(separatorIndex + 1);
  const spans: Span[] = [];
  let pieceStart = range.start;
  let found = text.indexOf(separator, range.start);

  // The separator stays at the end of the piece it closes.
  while (found !== -1 && found + separator.length <= range.end) {
    const pieceEnd = found + separator.length;
    spans.push(...splitRange(text, { start: pieceStart, end: pieceEnd }, remaining, chunkSize));
    pieceStart = pieceEnd;
    found = text.indexOf(separator, pieceEnd);
  }
  if (pieceStart < range.end) {
    spans.push(...splitRange(text, { start: pieceStart, end: range.end }, remaining, chunkSize));
  }

  return spans;
}

function containsWithin(text: string, separator: string, range: Span): boolean {
  const found = text.indexOf(separator, range.start);
  return found !== -1 && found + separator.length <= range.end;
}

// Never cuts between the two halves of a surrogate pair.
function hardCut(text: string, range: Span, chunkSize: number): Span[] {
  const spans: Span[] = [];
  let start = range.start;
  while (start < range.end) {
    let end = Math.min(start + chunkSize, range.end);
    if (end < range.end && splitsSurrogatePair(text, end)) {
      end = end - 1 > start ? end - 1 : end + 1;
    }
    spans.push({ start, end });
    start = end;
  }
  return spans;
}

function splitsSurrogatePair(text: string, index: number): boolean {
  const before = text.charCodeAt(index - 1);
  const after = text.charCodeAt(index);
  return before >= 0xd800 && before <= 0xdbff && after >= 0xdc00 && after <= 0xdfff;
}

function mergePieces(pieces: Span[], chunkSize: number, overlap: number): Span[] {
  const merged: Span[] = [];
  let first = 0;

  while (first < pieces.length) {
    let last = first;
    while (last + 1 < pieces.length && pieces[last + 1].end - pieces[first].start <= chunkSize) {
      last += 1;
    }

    merged.push({ start: pieces[first].start, end: pieces[last].end });
    if (last === pieces.length - 1) {
      break;
    }
    first = nextWindowStart(pieces, first, last, chunkSize, overlap);
  }

  return merged;
}

/**
 * Index of the first piece of the next chunk: the trailing pieces of the
 * previous chunk that fit in `overlap` and still leave room for the next piece.
 */
function nextWindowStart(
  pieces: Span[],
  first: number,
  last: number,
  chunkSize: number,
  overlap: number,
): number {
  let next = last + 1;
  while (next - 1 > first) {
    const candidate = pieces[next - 1];
    if (pieces[last].end - candidate.start > overlap) {
      break;
    }
    if (pieces[last + 1].end - candidate.start > chunkSize) {
      break;
    }
    next -= 1;
  }
  return next;
}
