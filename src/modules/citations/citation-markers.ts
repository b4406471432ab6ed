import type { ReferenceKind } from "../references/types.js";
import type { CitationChunk } from "./types.js";

// Shared by the streaming parser and the evaluation scanner.
export const CITATION_MARKER_SOURCE = String.raw`\[([A-Za-z]-\d{1,4})\]`;

const PARTIAL_MARKER_PATTERN = /^\[(?:[A-Za-z](?:-\d{0,4})?)?$/;

export const createCitationMarkerPattern = (): RegExp => new RegExp(CITATION_MARKER_SOURCE, "g");

export interface CitationMarker {
  id: string;
  raw: string;
  index: number;
}

export const findCitationMarkers = (text: string): CitationMarker[] =>
  [...text.matchAll(createCitationMarkerPattern())].map((match) => ({
    id: match[1] ?? "",
    raw: match[0],
    index: match.index ?? 0
  }));

/**
 * Length of the suffix of `text` that could still grow into a marker,
 * e.g. 4 for `"rates [A-0"`. Zero when the tail is safe to emit.
 */
export const partialMarkerSuffixLength = (text: string): number => {
  const openIndex = text.lastIndexOf("[");
  if (openIndex === -1) {
    return 0;
  }
  const tail = text.slice(openIndex);
  return PARTIAL_MARKER_PATTERN.test(tail) ? tail.length : 0;
};

export const classifyCitationId = (id: string): ReferenceKind | null => {
  const prefix = id.charAt(0).toUpperCase();
  if (prefix === "A") {
    return "axiom";
  }
  if (prefix === "R") {
    return "reality";
  }
  return null;
};

export const renderChunkText = (chunk: CitationChunk): string =>
  chunk.type === "text" ? chunk.text : `[${chunk.id}]`;

export const renderChunks = (chunks: Iterable<CitationChunk>): string => {
  let rendered = "";
  for (const chunk of chunks) {
    rendered += renderChunkText(chunk);
  }
  return rendered;
};
