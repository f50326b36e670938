export type ArtifactName =
  | "governing-principles"
  | "feature-requirement"
  | "research"
  | "plan"
  | "data-model"
  | "task-list"
  | "implementation-log";

export type PhaseName =
  | "routing"
  | "research"
  | "plan"
  | "data-model"
  | "tasks"
  | "approval"
  | "implementation";

export type RunStatus = "running" | "waiting_approval" | "success" | "cancelled" | "failed";

export interface WorkflowContext {
  readonly principles: string;
  readonly requirement: string;
  readonly baseDir: string;
  readonly techStack: string;
}

export interface PlanArtifact {
  text: string;
  context: WorkflowContext;
}

export interface TaskListArtifact {
  text: string;
  taskCount: number;
  planText: string;
  context: WorkflowContext;
}

export interface TaskItem {
  id: string;
  description: string;
  filePath: string;
  contentKind: string;
  parallel: boolean;
}

export interface CodeBlock {
  declaredKind: string;
  associatedFilePath?: string;
  body: string;
}

export type PipelineState =
  | { kind: "context"; context: WorkflowContext }
  | { kind: "plan"; plan: PlanArtifact }
  | { kind: "taskList"; taskList: TaskListArtifact };

export type ContextState = Extract<PipelineState, { kind: "context" }>;
export type PlanState = Extract<PipelineState, { kind: "plan" }>;
export type TaskListState = Extract<PipelineState, { kind: "taskList" }>;

export type ApprovalStatus = "pending" | "approved" | "rejected";

export interface ApprovalDraft {
  summary: string;
  preview: string;
  taskCount: number;
}

export interface ApprovalRequest extends ApprovalDraft {
  id: string;
  runId: string;
  status: ApprovalStatus;
  requestedAt: string;
  decidedAt?: string;
  decidedBy?: string;
  note?: string;
}

export interface ImplementationOutput {
  implementation: string;
  generatedFiles: string[];
  fileCount: number;
}

export interface PipelineResult extends ImplementationOutput {
  cancelled: boolean;
  techStack: string;
}

export type PipelineEvent =
  | {
      type: "progress";
      phase: PhaseName;
      message: string;
      level?: "info" | "warn";
      data?: Record<string, unknown>;
    }
  | { type: "approval_requested"; request: ApprovalRequest }
  | { type: "completed"; result: PipelineResult }
  | { type: "failed"; phase: PhaseName; message: string; cause?: unknown };

export type RunOutcome =
  | { status: "awaiting_approval"; runId: string; request: ApprovalRequest }
  | { status: "finished"; runId: string; result: PipelineResult };

export interface RunInput {
  baseDir: string;
  techStack?: string;
  includeResearch?: boolean;
  includeDataModel?: boolean;
}

export interface RunState {
  id: string;
  status: RunStatus;
  input: RunInput;
  currentPhase?: PhaseName;
  pendingApprovalId?: string;
  result?: PipelineResult;
  error?: string;
  startedAt: string;
  endedAt?: string;
}

export interface RunEvent {
  id: string;
  runId: string;
  timestamp: string;
  type: PipelineEvent["type"];
  phase?: PhaseName;
  message: string;
  data?: Record<string, unknown>;
}
