import { randomUUID } from "node:crypto";
import type { ApprovalDraft, ApprovalRequest } from "../types";

export interface CreateApprovalInput extends ApprovalDraft {
  runId: string;
}

export class ApprovalNotFoundError extends Error {
  constructor(readonly requestId: string) {
    super(`Approval request not found: ${requestId}`);
    this.name = "ApprovalNotFoundError";
  }
}

export class ApprovalAlreadyDecidedError extends Error {
  constructor(readonly request: ApprovalRequest) {
    super(`Approval request ${request.id} was already ${request.status}.`);
    this.name = "ApprovalAlreadyDecidedError";
  }
}

export class ApprovalQueue {
  private readonly approvals = new Map<string, ApprovalRequest>();

  constructor(private readonly idFactory: () => string = () => randomUUID()) {}

  create(input: CreateApprovalInput): ApprovalRequest {
    const approval: ApprovalRequest = {
      id: this.idFactory(),
      runId: input.runId,
      summary: input.summary,
      preview: input.preview,
      taskCount: input.taskCount,
      status: "pending",
      requestedAt: new Date().toISOString()
    };

    this.approvals.set(approval.id, approval);
    return { ...approval };
  }

  get(id: string): ApprovalRequest | undefined {
    const approval = this.approvals.get(id);
    return approval ? { ...approval } : undefined;
  }

  listPending(runId?: string): ApprovalRequest[] {
    return [...this.approvals.values()]
      .filter((item) => item.status === "pending" && (!runId || item.runId === runId))
      .sort((a, b) => (a.requestedAt > b.requestedAt ? -1 : 1))
      .map((item) => ({ ...item }));
  }

  decide(id: string, approved: boolean, note?: string, decidedBy = "user"): ApprovalRequest {
    const current = this.approvals.get(id);
    if (!current) {
      throw new ApprovalNotFoundError(id);
    }
    if (current.status !== "pending") {
      throw new ApprovalAlreadyDecidedError({ ...current });
    }

    const decided: ApprovalRequest = {
      ...current,
      status: approved ? "approved" : "rejected",
      decidedAt: new Date().toISOString(),
      decidedBy,
      ...(note ? { note } : {})
    };

    this.approvals.set(id, decided);
    return { ...decided };
  }
}
