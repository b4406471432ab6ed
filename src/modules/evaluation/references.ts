import { classifyCitationId, findCitationMarkers } from "../citations/citation-markers.js";
import type { ReferenceResults } from "./types.js";

export const roundScore = (value: number): number => Math.round(value * 10_000) / 10_000;

const dedupe = (values: Iterable<string>): string[] => [...new Set(values)];

export interface CitedReferences {
  axioms: string[];
  reality: string[];
}

/** Scans a finished answer for `[id]` markers, split by id namespace. */
export const extractCitedReferences = (text: string): CitedReferences => {
  const axioms: string[] = [];
  const reality: string[] = [];
  for (const marker of findCitationMarkers(text)) {
    const kind = classifyCitationId(marker.id);
    if (kind === "axiom") {
      axioms.push(marker.id);
    } else if (kind === "reality") {
      reality.push(marker.id);
    }
  }
  return { axioms: dedupe(axioms), reality: dedupe(reality) };
};

export const calculatePrecisionRecall = (
  found: string[],
  expected: string[]
): { precision: number; recall: number } => {
  const foundSet = new Set(found);
  const expectedSet = new Set(expected);
  if (foundSet.size === 0 && expectedSet.size === 0) {
    return { precision: 1, recall: 1 };
  }
  if (foundSet.size === 0 || expectedSet.size === 0) {
    return { precision: 0, recall: 0 };
  }

  let hits = 0;
  for (const id of foundSet) {
    if (expectedSet.has(id)) {
      hits += 1;
    }
  }
  return {
    precision: roundScore(hits / foundSet.size),
    recall: roundScore(hits / expectedSet.size)
  };
};

export const evaluateReferences = (found: string[], expected: string[]): ReferenceResults => {
  const referencesFound = dedupe(found);
  const referencesExpected = dedupe(expected);
  return {
    references_expected: referencesExpected,
    references_found: referencesFound,
    ...calculatePrecisionRecall(referencesFound, referencesExpected)
  };
};
