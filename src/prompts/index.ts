import type { EntityPair } from "../modules/evaluation/types.js";
import type { Axiom, RealityStatement } from "../modules/references/types.js";

export const QA_SYSTEM_PROMPT = [
  "You are a constitutional assistant answering questions about banking, markets and the economy.",
  "Ground every statement in the constitution axioms and the current reality facts supplied with the question.",
  "Cite axioms inline as [A-xxx] and reality facts as [R-xxx], using exactly the ids you were given.",
  "Never invent ids. If the supplied material is insufficient, say so explicitly."
].join(" ");

const renderReferenceLines = (entries: Array<Axiom | RealityStatement>): string =>
  entries.map((entry) => `[${entry.id}] ${entry.description}`).join("\n");

export const buildConstitutionBlock = (axioms: Axiom[]): string =>
  ["Constitution:", axioms.length > 0 ? renderReferenceLines(axioms) : "(none)"].join("\n");

export const buildRealityBlock = (reality: RealityStatement[]): string | null =>
  reality.length > 0 ? ["Current reality:", renderReferenceLines(reality)].join("\n") : null;

export const buildQaUserPrompt = (input: {
  axioms: Axiom[];
  reality: RealityStatement[];
  question: string;
}): string => {
  const realityBlock = buildRealityBlock(input.reality);
  return [
    buildConstitutionBlock(input.axioms),
    "",
    ...(realityBlock ? [realityBlock, ""] : []),
    "Answer the question below. Cite the axioms you rely on as [A-xxx] and the reality facts as [R-xxx], inline, right after the statement they support.",
    "",
    "Question:",
    input.question
  ].join("\n");
};

export const JUDGE_SYSTEM_PROMPT = [
  "You are a strict evaluator of answers to economic and banking questions.",
  "Return only valid JSON matching the requested shape, with no extra keys and no commentary outside the JSON."
].join(" ");

export const formatEntityPair = (entity: EntityPair): string =>
  `('${entity.trigger_variable}', '${entity.consequence_variable}')`;

export const formatEntityList = (entities: EntityPair[]): string =>
  entities.length > 0 ? entities.map(formatEntityPair).join(", ") : "(none)";

export const ENTITY_EXTRACTION_TARGETS = ["user_query", "expected_answer", "llm_answer"] as const;

export type EntityExtractionTarget = (typeof ENTITY_EXTRACTION_TARGETS)[number];

const EXTRACTION_TARGET_LABELS: Record<EntityExtractionTarget, string> = {
  user_query: "user query",
  expected_answer: "expected answer",
  llm_answer: "LLM answer"
};

export const buildEntityExtractionPrompt = (input: {
  target: EntityExtractionTarget;
  userQuery: string;
  expectedAnswer: string;
  llmAnswer: string;
}): string => {
  const texts: Record<EntityExtractionTarget, string> = {
    user_query: input.userQuery,
    expected_answer: input.expectedAnswer,
    llm_answer: input.llmAnswer
  };
  const context = ENTITY_EXTRACTION_TARGETS
    .filter((key) => key !== input.target)
    .map((key) => `${EXTRACTION_TARGET_LABELS[key]}:\n${texts[key]}`);

  return [
    `Extract the causal relationships stated in the ${EXTRACTION_TARGET_LABELS[input.target]}.`,
    "Each relationship is a pair of variables: a trigger_variable (cause) and a consequence_variable (effect).",
    "Recognize economic indicators, banking activities, market factors, financial instruments and economic outcomes.",
    'When a trigger has no paired consequence, use "N/A" as consequence_variable.',
    "",
    `Text to analyse (${EXTRACTION_TARGET_LABELS[input.target]}):`,
    texts[input.target],
    "",
    "Context only, do not extract from it:",
    ...context,
    "",
    "Return JSON exactly like:",
    '{"entities":[{"trigger_variable":"interest rates","consequence_variable":"mortgage demand"}]}'
  ].join("\n");
};

export const buildTopicCoveragePrompt = (input: {
  expectedEntities: EntityPair[];
  generatedEntities: EntityPair[];
}): string =>
  [
    "Compare the expected entities against the generated entities.",
    "Classify every expected entity, in the given order, as one of:",
    '- "exact": the same entity appears in the generated list, or an accurate synonym of it',
    '- "partial": only an inaccurate or partial synonym appears',
    '- "missing": nothing in the generated list corresponds to it',
    "",
    `Expected entities: ${formatEntityList(input.expectedEntities)}`,
    `Generated entities: ${formatEntityList(input.generatedEntities)}`,
    "",
    "Return JSON exactly like:",
    '{"classifications":[{"entity":"(\'a\', \'b\')","match":"exact"}],"reason":"why each entity was classified this way"}'
  ].join("\n");

export const buildAccuracyPrompt = (input: {
  entity: EntityPair;
  llmAnswer: string;
  expectedAnswer: string;
}): string =>
  [
    `Entity: ${formatEntityPair(input.entity)}`,
    "",
    "Compare how the LLM answer and the expected answer describe this relationship.",
    "Direction matters: rates rising is not the same as rates falling. Mentioning the entity is not enough.",
    "Score 1.0 when the behaviour matches, 0.0 when it contradicts or is absent, values in between for partial agreement.",
    "",
    "LLM answer:",
    input.llmAnswer,
    "",
    "Expected answer:",
    input.expectedAnswer,
    "",
    "Return JSON exactly like:",
    '{"score":0.5,"reason":"short explanation"}'
  ].join("\n");
