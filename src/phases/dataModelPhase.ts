import type { TextGeneratorLike } from "../llm/textGenerator";
import { buildDataModelPrompt } from "../prompts/pipelinePrompts";
import type { ArtifactStoreLike } from "../services/artifactStore";
import type { PlanState } from "../types";
import { type PhaseStream, progress } from "./events";

export class DataModelPhase {
  constructor(private readonly generator: TextGeneratorLike) {}

  async *run(state: PlanState, store: ArtifactStoreLike): PhaseStream<PlanState> {
    const { plan } = state;
    yield progress("data-model", "Deriving the data model from the plan.");

    const text = await this.generator.generate(buildDataModelPrompt(plan.context, plan.text));
    const savedTo = await store.write("data-model", text);
    yield progress("data-model", `Data model saved (${text.length} chars).`, { path: savedTo });

    return state;
  }
}
