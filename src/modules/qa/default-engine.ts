import { config } from "../../config/index.js";
import { logInfo } from "../../observability/logger.js";
import type { ConversationThread } from "../llm/types.js";
import { loadReferenceStore, type ReferenceStore } from "../references/reference-store.js";
import type { Axiom, RealityStatement } from "../references/types.js";
import { QaEngine } from "./qa-engine.js";

export interface ReferenceData {
  axioms: ReferenceStore<Axiom>;
  reality: ReferenceStore<RealityStatement>;
}

export const loadReferenceData = async (
  paths: { constitutionFile: string; realityFile: string } = {
    constitutionFile: config.CONSTITUTION_FILE,
    realityFile: config.REALITY_FILE
  }
): Promise<ReferenceData> => {
  const [axioms, reality] = await Promise.all([
    loadReferenceStore(paths.constitutionFile),
    loadReferenceStore(paths.realityFile)
  ]);
  logInfo("references.loaded", {}, {
    constitution_file: paths.constitutionFile,
    reality_file: paths.realityFile,
    axiom_count: axioms.size,
    reality_count: reality.size
  });
  return { axioms, reality };
};

export const createDefaultQaEngine = async (): Promise<QaEngine<ConversationThread>> => {
  const [{ axioms, reality }, { OpenAIConversationAgent }] = await Promise.all([
    loadReferenceData(),
    import("../llm/openai-conversation-agent.js")
  ]);
  return new QaEngine({ llm: new OpenAIConversationAgent(), axioms, reality });
};

let defaultEngine: Promise<QaEngine<ConversationThread>> | null = null;

export const getDefaultQaEngine = (): Promise<QaEngine<ConversationThread>> => {
  if (!defaultEngine) {
    const pending = createDefaultQaEngine();
    defaultEngine = pending;
    pending.catch(() => {
      if (defaultEngine === pending) {
        defaultEngine = null;
      }
    });
  }
  return defaultEngine;
};

export const resetDefaultQaEngineForTests = (): void => {
  defaultEngine = null;
};
