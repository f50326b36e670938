import { config } from "../config";
import type { TextGeneratorLike } from "../llm/textGenerator";
import { countUncheckedTasks } from "../parsing/taskItemParser";
import { buildTasksPrompt } from "../prompts/pipelinePrompts";
import type { ArtifactStoreLike } from "../services/artifactStore";
import type { ApprovalDraft, PlanState, TaskListArtifact } from "../types";
import { type PhaseStream, progress } from "./events";

export const TRUNCATION_MARKER = "\n... (truncated)";

export interface TaskPhaseOutput {
  taskList: TaskListArtifact;
  draft: ApprovalDraft;
}

// Counted in code points so a cut never splits a surrogate pair.
export const buildTaskPreview = (text: string, limit: number): string => {
  const length = Math.max(0, limit);
  const codePoints = Array.from(text);
  return codePoints.length > length ? `${codePoints.slice(0, length).join("")}${TRUNCATION_MARKER}` : text;
};

export const buildApprovalDraft = (text: string, taskCount: number, previewChars: number): ApprovalDraft => ({
  summary: `Generated ${taskCount} tasks. Please review tasks.md and approve to proceed with implementation.`,
  preview: buildTaskPreview(text, previewChars),
  taskCount
});

export class TaskPhase {
  constructor(
    private readonly generator: TextGeneratorLike,
    private readonly previewChars = config.taskPreviewChars
  ) {}

  async *run(state: PlanState, store: ArtifactStoreLike): PhaseStream<TaskPhaseOutput> {
    const { plan } = state;
    yield progress("tasks", "Breaking the plan down into tasks.");

    const text = await this.generator.generate(buildTasksPrompt(plan.context, plan.text));
    const savedTo = await store.write("task-list", text);
    const taskCount = countUncheckedTasks(text);
    yield progress("tasks", `Generated ${taskCount} tasks (${text.length} chars).`, { path: savedTo, taskCount });

    return {
      taskList: { text, taskCount, planText: plan.text, context: plan.context },
      draft: buildApprovalDraft(text, taskCount, this.previewChars)
    };
  }
}
