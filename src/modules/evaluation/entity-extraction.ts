import type { EvaluationJudge } from "./judge.js";
import type { EntityExtraction } from "./types.js";

export const extractEntities = async (
  input: { userQuery: string; expectedAnswer: string; llmAnswer: string; itemId?: string },
  judge: EvaluationJudge
): Promise<EntityExtraction> => {
  const [userQueryEntities, expectedAnswerEntities, llmAnswerEntities] = await Promise.all([
    judge.extractEntities({ ...input, target: "user_query" }),
    judge.extractEntities({ ...input, target: "expected_answer" }),
    judge.extractEntities({ ...input, target: "llm_answer" })
  ]);
  return {
    user_query_entities: userQueryEntities,
    expected_answer_entities: expectedAnswerEntities,
    llm_answer_entities: llmAnswerEntities
  };
};
