import type { TextGeneratorLike } from "../llm/textGenerator";
import { buildResearchPrompt } from "../prompts/pipelinePrompts";
import type { ArtifactStoreLike } from "../services/artifactStore";
import type { ContextState } from "../types";
import { type PhaseStream, progress } from "./events";

/** Optional step ahead of the plan: writes research.md and leaves the state as it was. */
export class ResearchPhase {
  constructor(private readonly generator: TextGeneratorLike) {}

  async *run(state: ContextState, store: ArtifactStoreLike): PhaseStream<ContextState> {
    const { context } = state;
    yield progress("research", "Researching the technology stack.", { techStack: context.techStack });

    const text = await this.generator.generate(buildResearchPrompt(context));
    const savedTo = await store.write("research", text);
    yield progress("research", `Research saved (${text.length} chars).`, { path: savedTo });

    return state;
  }
}
