import type { ReferenceStore } from "../references/reference-store.js";
import type { Axiom, RealityStatement } from "../references/types.js";
import { classifyCitationId, createCitationMarkerPattern, partialMarkerSuffixLength } from "./citation-markers.js";
import type { AxiomCitation, CitationChunk, RealityCitation } from "./types.js";

export type CitationResolver = (id: string) => AxiomCitation | RealityCitation | null;

export const createCitationResolver = (stores: {
  axioms: ReferenceStore<Axiom>;
  reality: ReferenceStore<RealityStatement>;
}): CitationResolver => (id) => {
  const kind = classifyCitationId(id);
  if (kind === "axiom") {
    const axiom = stores.axioms.get(id);
    return axiom ? { type: "axiom_citation", id: axiom.id, description: axiom.description } : null;
  }
  if (kind === "reality") {
    const statement = stores.reality.get(id);
    return statement ? { type: "reality_citation", id: statement.id, description: statement.description } : null;
  }
  return null;
};

export interface CitationStreamParserOptions {
  resolve: CitationResolver;
  onUnresolved?: (id: string) => void;
}

/**
 * Incremental marker scanner. Text is released as soon as no marker can be
 * forming at the end of the buffer; unresolved markers stay literal text.
 */
export class CitationStreamParser {
  private buffer = "";

  constructor(private readonly options: CitationStreamParserOptions) {}

  push(delta: string): CitationChunk[] {
    this.buffer += delta;
    const chunks: CitationChunk[] = [];
    let pendingText = "";
    let consumed = 0;

    for (const match of this.buffer.matchAll(createCitationMarkerPattern())) {
      const index = match.index ?? 0;
      const id = match[1] ?? "";
      pendingText += this.buffer.slice(consumed, index);
      consumed = index + match[0].length;

      const citation = this.options.resolve(id);
      if (!citation) {
        this.options.onUnresolved?.(id);
        pendingText += match[0];
        continue;
      }

      if (pendingText.length > 0) {
        chunks.push({ type: "text", text: pendingText });
        pendingText = "";
      }
      chunks.push(citation);
    }

    const rest = this.buffer.slice(consumed);
    const heldLength = partialMarkerSuffixLength(rest);
    pendingText += rest.slice(0, rest.length - heldLength);
    this.buffer = rest.slice(rest.length - heldLength);

    if (pendingText.length > 0) {
      chunks.push({ type: "text", text: pendingText });
    }
    return chunks;
  }

  flush(): CitationChunk[] {
    const remaining = this.buffer;
    this.buffer = "";
    return remaining.length > 0 ? [{ type: "text", text: remaining }] : [];
  }
}

export async function* parseCitationStream(
  deltas: AsyncIterable<string>,
  options: CitationStreamParserOptions
): AsyncGenerator<CitationChunk, void, void> {
  const parser = new CitationStreamParser(options);
  for await (const delta of deltas) {
    yield* parser.push(delta);
  }
  yield* parser.flush();
}
