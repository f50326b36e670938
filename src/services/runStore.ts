import { randomUUID } from "node:crypto";
import { EventEmitter } from "node:events";
import type { PhaseName, PipelineEvent, PipelineResult, RunEvent, RunInput, RunState, RunStatus } from "../types";

const toRunEvent = (runId: string, event: PipelineEvent): Omit<RunEvent, "id" | "timestamp"> => {
  switch (event.type) {
    case "progress":
      return {
        runId,
        type: event.type,
        phase: event.phase,
        message: event.message,
        data: event.level === "warn" ? { ...event.data, level: "warn" } : event.data
      };
    case "approval_requested":
      return {
        runId,
        type: event.type,
        phase: "approval",
        message: event.request.summary,
        data: {
          requestId: event.request.id,
          taskCount: event.request.taskCount,
          preview: event.request.preview
        }
      };
    case "completed":
      return {
        runId,
        type: event.type,
        phase: event.result.cancelled ? "approval" : "implementation",
        message: event.result.cancelled
          ? "Workflow cancelled by user."
          : `Implementation complete. Generated ${event.result.fileCount} code files.`,
        data: {
          cancelled: event.result.cancelled,
          fileCount: event.result.fileCount,
          generatedFiles: event.result.generatedFiles
        }
      };
    case "failed":
      return { runId, type: event.type, phase: event.phase, message: event.message };
  }
};

export class RunStore {
  private readonly runs = new Map<string, RunState>();
  private readonly events = new Map<string, RunEvent[]>();
  private readonly emitter = new EventEmitter();

  constructor(private readonly idFactory: () => string = () => randomUUID()) {}

  create(input: RunInput): RunState {
    const run: RunState = {
      id: this.idFactory(),
      status: "running",
      input,
      startedAt: new Date().toISOString()
    };
    this.runs.set(run.id, run);
    this.events.set(run.id, []);
    return run;
  }

  get(runId: string): RunState | undefined {
    return this.runs.get(runId);
  }

  all(): RunState[] {
    return [...this.runs.values()].sort((a, b) => (a.startedAt > b.startedAt ? -1 : 1));
  }

  setCurrentPhase(runId: string, phase: PhaseName): void {
    const current = this.runs.get(runId);
    if (!current) return;
    current.currentPhase = phase;
  }

  updateStatus(runId: string, status: RunStatus, details: { result?: PipelineResult; error?: string; pendingApprovalId?: string } = {}): void {
    const current = this.runs.get(runId);
    if (!current) return;

    current.status = status;
    current.pendingApprovalId = status === "waiting_approval" ? details.pendingApprovalId : undefined;
    if (status === "success" || status === "cancelled" || status === "failed") {
      current.endedAt = new Date().toISOString();
      current.result = details.result;
      current.error = details.error;
    }
  }

  record(runId: string, event: PipelineEvent): RunEvent {
    const entry: RunEvent = {
      id: randomUUID(),
      timestamp: new Date().toISOString(),
      ...toRunEvent(runId, event)
    };
    const list = this.events.get(runId) ?? [];
    list.push(entry);
    this.events.set(runId, list);
    this.emitter.emit(`run:${runId}`, entry);
    this.emitter.emit("run:*", entry);
    return entry;
  }

  getEvents(runId: string): RunEvent[] {
    return [...(this.events.get(runId) ?? [])];
  }

  subscribe(runId: string, handler: (event: RunEvent) => void): () => void {
    const channel = `run:${runId}`;
    this.emitter.on(channel, handler);
    return () => this.emitter.off(channel, handler);
  }

  subscribeAll(handler: (event: RunEvent) => void): () => void {
    this.emitter.on("run:*", handler);
    return () => this.emitter.off("run:*", handler);
  }
}
