export interface TextChunk {
  type: "text";
  text: string;
}

export interface AxiomCitation {
  type: "axiom_citation";
  id: string;
  description: string;
}

export interface RealityCitation {
  type: "reality_citation";
  id: string;
  description: string;
}

export type CitationChunk = TextChunk | AxiomCitation | RealityCitation;

/**
 * Transport-level line written when a stream fails after it started.
 * A stream that closes without one completed normally.
 */
export interface StreamErrorLine {
  type: "error";
  message: string;
}

export type GenerateStreamLine = CitationChunk | StreamErrorLine;
