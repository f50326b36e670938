import { countUncheckedTasks } from "../parsing/taskItemParser";
import type { ArtifactStoreLike } from "../services/artifactStore";
import type { ArtifactName, PipelineState, WorkflowContext } from "../types";

export type StartPhase = PipelineState["kind"];

export interface RouteInput {
  techStack: string;
}

export interface WorkspaceReport {
  constitutionExists: boolean;
  specExists: boolean;
  researchGenerated: boolean;
  planGenerated: boolean;
  dataModelGenerated: boolean;
  tasksGenerated: boolean;
  implementationGenerated: boolean;
  startPhase: StartPhase;
  tasks?: {
    hasCheckboxes: boolean;
    hasTaskIds: boolean;
    uncheckedCount: number;
  };
}

/**
 * Decides where a run enters the pipeline from the artifacts already on disk.
 * A task list is only honoured together with its plan, and is then treated as
 * approved: the run goes straight to implementation without the approval gate.
 */
export const selectStartPhase = (listing: Iterable<ArtifactName>): StartPhase => {
  const present = new Set(listing);
  if (present.has("plan") && present.has("task-list")) return "taskList";
  if (present.has("plan")) return "plan";
  return "context";
};

export const loadContext = async (store: ArtifactStoreLike, input: RouteInput): Promise<WorkflowContext> => {
  const principles = await store.read("governing-principles");
  const requirement = await store.read("feature-requirement");

  return Object.freeze({
    principles,
    requirement,
    baseDir: store.baseDir,
    techStack: input.techStack
  });
};

export const routePipeline = async (store: ArtifactStoreLike, input: RouteInput): Promise<PipelineState> => {
  const context = await loadContext(store, input);
  const startPhase = selectStartPhase(await store.list());

  switch (startPhase) {
    case "taskList": {
      const planText = await store.read("plan");
      const text = await store.read("task-list");
      return {
        kind: "taskList",
        taskList: { text, taskCount: countUncheckedTasks(text), planText, context }
      };
    }
    case "plan":
      return { kind: "plan", plan: { text: await store.read("plan"), context } };
    case "context":
      return { kind: "context", context };
  }
};

export const inspectWorkspace = async (store: ArtifactStoreLike): Promise<WorkspaceReport> => {
  const listing = await store.list();
  const present = new Set(listing);
  const report: WorkspaceReport = {
    constitutionExists: present.has("governing-principles"),
    specExists: present.has("feature-requirement"),
    researchGenerated: present.has("research"),
    planGenerated: present.has("plan"),
    dataModelGenerated: present.has("data-model"),
    tasksGenerated: present.has("task-list"),
    implementationGenerated: present.has("implementation-log"),
    startPhase: selectStartPhase(listing)
  };

  if (report.tasksGenerated) {
    const tasks = await store.read("task-list");
    report.tasks = {
      hasCheckboxes: tasks.includes("- [ ]"),
      hasTaskIds: /\bT\d+\b/.test(tasks),
      uncheckedCount: countUncheckedTasks(tasks)
    };
  }

  return report;
};
