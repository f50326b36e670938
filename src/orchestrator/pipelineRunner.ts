import { config } from "../config";
import type { PhaseStream } from "../phases/events";
import { progress } from "../phases/events";
import { ApprovalGate, type GateDecision } from "../phases/approvalGate";
import type { TaskPhaseOutput } from "../phases/taskPhase";
import { ArtifactStore, type ArtifactStoreLike } from "../services/artifactStore";
import { RunStore } from "../services/runStore";
import type {
  ApprovalRequest,
  ContextState,
  ImplementationOutput,
  PhaseName,
  PipelineEvent,
  PipelineResult,
  PipelineState,
  PlanState,
  RunInput,
  RunOutcome,
  TaskListState
} from "../types";
import { routePipeline } from "./phaseRouter";

export interface ResearchPhaseLike {
  run(state: ContextState, store: ArtifactStoreLike): PhaseStream<ContextState>;
}

export interface PlanPhaseLike {
  run(state: ContextState, store: ArtifactStoreLike): PhaseStream<PlanState>;
}

export interface DataModelPhaseLike {
  run(state: PlanState, store: ArtifactStoreLike): PhaseStream<PlanState>;
}

export interface TaskPhaseLike {
  run(state: PlanState, store: ArtifactStoreLike): PhaseStream<TaskPhaseOutput>;
}

export interface ImplementationPhaseLike {
  run(state: TaskListState, store: ArtifactStoreLike): PhaseStream<ImplementationOutput>;
}

export interface PipelinePhases {
  research: ResearchPhaseLike;
  plan: PlanPhaseLike;
  dataModel: DataModelPhaseLike;
  tasks: TaskPhaseLike;
  implementation: ImplementationPhaseLike;
}

/** Opt-in documents generated alongside the plan. */
export interface OptionalPhases {
  includeResearch: boolean;
  includeDataModel: boolean;
}

const noOptionalPhases: OptionalPhases = { includeResearch: false, includeDataModel: false };

export type ArtifactStoreFactory = (baseDir: string) => ArtifactStoreLike;

export type ApprovalHandler = (request: ApprovalRequest) => boolean | Promise<boolean>;

export class PipelineFailure extends Error {
  constructor(
    readonly phase: PhaseName,
    message: string,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "PipelineFailure";
  }
}

const phaseOf = (state: PipelineState): PhaseName => {
  switch (state.kind) {
    case "context":
      return "plan";
    case "plan":
      return "tasks";
    case "taskList":
      return "implementation";
  }
};

const describeStart = (state: PipelineState): string => {
  switch (state.kind) {
    case "context":
      return "Loaded governing principles and feature requirement. Running the full pipeline.";
    case "plan":
      return "Existing plan found. Skipping plan generation.";
    case "taskList":
      return "Existing plan and task list found. Skipping plan, tasks and approval (task list treated as approved).";
  }
};

export class PipelineRunner {
  constructor(
    private readonly runs: RunStore,
    private readonly gate: ApprovalGate,
    private readonly phases: PipelinePhases,
    private readonly storeFactory: ArtifactStoreFactory = (baseDir) => new ArtifactStore(baseDir),
    private readonly defaultTechStack = config.techStack
  ) {}

  async start(input: RunInput): Promise<RunOutcome> {
    const run = this.runs.create(input);
    return this.drive(run.id, this.fromStart(run.id, input));
  }

  async resume(requestId: string, approved: boolean, note?: string): Promise<RunOutcome> {
    const decision = this.gate.decide(requestId, approved, note);
    return this.drive(decision.runId, this.afterDecision(decision));
  }

  async runToCompletion(input: RunInput, decide: ApprovalHandler): Promise<PipelineResult> {
    let outcome = await this.start(input);
    while (outcome.status === "awaiting_approval") {
      const approved = await decide(outcome.request);
      outcome = await this.resume(outcome.request.id, approved);
    }
    return outcome.result;
  }

  launch(input: RunInput): string {
    const run = this.runs.create(input);
    this.runInBackground(run.id, this.fromStart(run.id, input));
    return run.id;
  }

  decideInBackground(requestId: string, approved: boolean, note?: string): ApprovalRequest {
    const decision = this.gate.decide(requestId, approved, note);
    this.runInBackground(decision.runId, this.afterDecision(decision));
    return decision.request;
  }

  pendingApprovals(runId?: string): ApprovalRequest[] {
    return this.gate.pending(runId);
  }

  private runInBackground(runId: string, stream: PhaseStream<void>): void {
    this.drive(runId, stream).catch((error: unknown) => {
      if (this.runs.get(runId)?.status === "failed") return;
      const message = error instanceof Error ? error.message : String(error);
      this.runs.updateStatus(runId, "failed", { error: message });
    });
  }

  private async *fromStart(runId: string, input: RunInput): PhaseStream<void> {
    this.runs.setCurrentPhase(runId, "routing");
    const store = this.storeFactory(input.baseDir);
    const state = await routePipeline(store, { techStack: input.techStack?.trim() || this.defaultTechStack });
    yield progress("routing", describeStart(state), { startPhase: state.kind, baseDir: store.baseDir });
    yield* this.advance(runId, state, store, {
      includeResearch: input.includeResearch ?? false,
      includeDataModel: input.includeDataModel ?? false
    });
  }

  private async *afterDecision(decision: GateDecision): PhaseStream<void> {
    this.runs.setCurrentPhase(decision.runId, "approval");
    if (decision.status === "rejected") {
      yield progress("approval", "Tasks rejected. Workflow terminated; existing artifacts are kept.", {
        requestId: decision.request.id
      });
      yield {
        type: "completed",
        result: {
          cancelled: true,
          implementation: "",
          generatedFiles: [],
          fileCount: 0,
          techStack: decision.context.techStack
        }
      };
      return;
    }

    yield progress("approval", "Tasks approved. Proceeding to implementation.", { requestId: decision.request.id });
    const store = this.storeFactory(decision.state.taskList.context.baseDir);
    yield* this.advance(decision.runId, decision.state, store);
  }

  private async *advance(
    runId: string,
    initial: PipelineState,
    store: ArtifactStoreLike,
    optional: OptionalPhases = noOptionalPhases
  ): PhaseStream<void> {
    let state = initial;
    while (true) {
      switch (state.kind) {
        case "context": {
          let context = state;
          if (optional.includeResearch) {
            this.runs.setCurrentPhase(runId, "research");
            context = yield* this.phases.research.run(context, store);
          }
          this.runs.setCurrentPhase(runId, phaseOf(context));
          state = yield* this.phases.plan.run(context, store);
          break;
        }
        case "plan": {
          let planned = state;
          if (optional.includeDataModel) {
            this.runs.setCurrentPhase(runId, "data-model");
            planned = yield* this.phases.dataModel.run(planned, store);
          }
          this.runs.setCurrentPhase(runId, phaseOf(planned));
          const { taskList, draft } = yield* this.phases.tasks.run(planned, store);
          this.runs.setCurrentPhase(runId, "approval");
          yield { type: "approval_requested", request: this.gate.open(runId, taskList, draft) };
          return;
        }
        case "taskList": {
          this.runs.setCurrentPhase(runId, phaseOf(state));
          const output = yield* this.phases.implementation.run(state, store);
          yield {
            type: "completed",
            result: { ...output, cancelled: false, techStack: state.taskList.context.techStack }
          };
          return;
        }
      }
    }
  }

  // Phase errors become an explicit failure event so the drain loop can stop on it.
  private async *guard(runId: string, stream: PhaseStream<void>): AsyncGenerator<PipelineEvent, void, undefined> {
    try {
      yield* stream;
    } catch (error: unknown) {
      yield {
        type: "failed",
        phase: this.runs.get(runId)?.currentPhase ?? "routing",
        message: error instanceof Error ? error.message : String(error),
        cause: error
      };
    }
  }

  private async drive(runId: string, stream: PhaseStream<void>): Promise<RunOutcome> {
    let request: ApprovalRequest | undefined;
    let result: PipelineResult | undefined;

    for await (const event of this.guard(runId, stream)) {
      this.runs.record(runId, event);
      switch (event.type) {
        case "progress":
          break;
        case "approval_requested":
          request = event.request;
          break;
        case "completed":
          result = event.result;
          break;
        case "failed":
          this.runs.updateStatus(runId, "failed", { error: event.message });
          throw new PipelineFailure(event.phase, event.message, event.cause);
      }
    }

    if (request) {
      this.runs.updateStatus(runId, "waiting_approval", { pendingApprovalId: request.id });
      return { status: "awaiting_approval", runId, request };
    }

    if (result) {
      this.runs.updateStatus(runId, result.cancelled ? "cancelled" : "success", { result });
      return { status: "finished", runId, result };
    }

    const phase = this.runs.get(runId)?.currentPhase ?? "routing";
    const message = "Pipeline stream ended without a result or approval request.";
    this.runs.updateStatus(runId, "failed", { error: message });
    throw new PipelineFailure(phase, message);
  }
}
