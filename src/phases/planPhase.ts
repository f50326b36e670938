import type { TextGeneratorLike } from "../llm/textGenerator";
import { buildPlanPrompt } from "../prompts/pipelinePrompts";
import type { ArtifactStoreLike } from "../services/artifactStore";
import type { ContextState, PlanState } from "../types";
import { type PhaseStream, progress } from "./events";

export class PlanPhase {
  constructor(private readonly generator: TextGeneratorLike) {}

  async *run(state: ContextState, store: ArtifactStoreLike): PhaseStream<PlanState> {
    const { context } = state;
    yield progress("plan", "Generating implementation plan.", { techStack: context.techStack });

    const text = await this.generator.generate(buildPlanPrompt(context));
    // Written as-is, even when empty.
    const savedTo = await store.write("plan", text);
    yield progress("plan", `Plan saved (${text.length} chars).`, { path: savedTo });

    return { kind: "plan", plan: { text, context } };
  }
}
