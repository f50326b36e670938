export { config, assertConfig } from "./config";
export { OpenAiClient, type OpenAiClientOptions } from "./llm/openaiClient";
export { LlmTextGenerator, type TextGeneratorLike } from "./llm/textGenerator";
export { inspectWorkspace, loadContext, routePipeline, selectStartPhase } from "./orchestrator/phaseRouter";
export type { StartPhase, WorkspaceReport } from "./orchestrator/phaseRouter";
export { PipelineFailure, PipelineRunner } from "./orchestrator/pipelineRunner";
export type { ApprovalHandler, ArtifactStoreFactory, OptionalPhases, PipelinePhases } from "./orchestrator/pipelineRunner";
export { extractCodeBlocks, selectBlockForFile, serializeCodeBlock } from "./parsing/codeBlockExtractor";
export { countUncheckedTasks, parseTaskItems, resolveTaskFilePath } from "./parsing/taskItemParser";
export { ApprovalGate, type GateDecision } from "./phases/approvalGate";
export { DataModelPhase } from "./phases/dataModelPhase";
export { ImplementationPhase } from "./phases/implementationPhase";
export { PlanPhase } from "./phases/planPhase";
export { ResearchPhase } from "./phases/researchPhase";
export { TaskPhase, buildTaskPreview } from "./phases/taskPhase";
export { createPipeline } from "./pipeline";
export { buildApp } from "./serverApp";
export { ApprovalAlreadyDecidedError, ApprovalNotFoundError, ApprovalQueue } from "./services/approvalQueue";
export { ArtifactNotFoundError, ArtifactStore, UnsafePathError, type ArtifactStoreLike } from "./services/artifactStore";
export { RunStore } from "./services/runStore";
export type * from "./types";
