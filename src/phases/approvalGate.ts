import { ApprovalNotFoundError, ApprovalQueue } from "../services/approvalQueue";
import type { ApprovalDraft, ApprovalRequest, TaskListArtifact, TaskListState, WorkflowContext } from "../types";

interface Continuation {
  runId: string;
  taskList: TaskListArtifact;
}

export type GateDecision =
  | { status: "approved"; runId: string; request: ApprovalRequest; state: TaskListState }
  | { status: "rejected"; runId: string; request: ApprovalRequest; context: WorkflowContext };

/**
 * Human gate between task generation and implementation. Each request is
 * decided exactly once; the continuation it holds is what the run resumes
 * from, so nothing is re-read from disk after approval.
 */
export class ApprovalGate {
  private readonly continuations = new Map<string, Continuation>();

  constructor(private readonly queue: ApprovalQueue = new ApprovalQueue()) {}

  open(runId: string, taskList: TaskListArtifact, draft: ApprovalDraft): ApprovalRequest {
    const request = this.queue.create({ runId, ...draft });
    this.continuations.set(request.id, { runId, taskList });
    return request;
  }

  get(requestId: string): ApprovalRequest | undefined {
    return this.queue.get(requestId);
  }

  pending(runId?: string): ApprovalRequest[] {
    return this.queue.listPending(runId);
  }

  decide(requestId: string, approved: boolean, note?: string, decidedBy?: string): GateDecision {
    const request = this.queue.decide(requestId, approved, note, decidedBy);
    const continuation = this.continuations.get(requestId);
    this.continuations.delete(requestId);
    if (!continuation) {
      throw new ApprovalNotFoundError(requestId);
    }

    if (!approved) {
      return { status: "rejected", runId: continuation.runId, request, context: continuation.taskList.context };
    }

    return {
      status: "approved",
      runId: continuation.runId,
      request,
      state: { kind: "taskList", taskList: continuation.taskList }
    };
  }
}
