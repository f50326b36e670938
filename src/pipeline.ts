import { config } from "./config";
import { OpenAiClient } from "./llm/openaiClient";
import { LlmTextGenerator, type TextGeneratorLike } from "./llm/textGenerator";
import { type ArtifactStoreFactory, PipelineRunner } from "./orchestrator/pipelineRunner";
import { ApprovalGate } from "./phases/approvalGate";
import { DataModelPhase } from "./phases/dataModelPhase";
import { ImplementationPhase } from "./phases/implementationPhase";
import { PlanPhase } from "./phases/planPhase";
import { ResearchPhase } from "./phases/researchPhase";
import { TaskPhase } from "./phases/taskPhase";
import { ApprovalQueue } from "./services/approvalQueue";
import { ArtifactStore } from "./services/artifactStore";
import { RunStore } from "./services/runStore";

export interface PipelineWiring {
  runs: RunStore;
  gate: ApprovalGate;
  runner: PipelineRunner;
}

export interface PipelineWiringOptions {
  generator?: TextGeneratorLike;
  storeFactory?: ArtifactStoreFactory;
  techStack?: string;
  previewChars?: number;
}

export const createPipeline = (options: PipelineWiringOptions = {}): PipelineWiring => {
  const generator = options.generator ?? new LlmTextGenerator(new OpenAiClient());
  const runs = new RunStore();
  const gate = new ApprovalGate(new ApprovalQueue());
  const runner = new PipelineRunner(
    runs,
    gate,
    {
      research: new ResearchPhase(generator),
      plan: new PlanPhase(generator),
      dataModel: new DataModelPhase(generator),
      tasks: new TaskPhase(generator, options.previewChars ?? config.taskPreviewChars),
      implementation: new ImplementationPhase(generator)
    },
    options.storeFactory ?? ((baseDir) => new ArtifactStore(baseDir, config.outputDirName)),
    options.techStack ?? config.techStack
  );

  return { runs, gate, runner };
};
