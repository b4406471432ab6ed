export interface ReferenceEntry {
  id: string;
  description: string;
}

/** A stable principle of the constitution, cited as `[A-xxx]`. */
export type Axiom = ReferenceEntry;

/** A fact about current conditions, cited as `[R-xxx]`. */
export type RealityStatement = ReferenceEntry;

export type ReferenceKind = "axiom" | "reality";
