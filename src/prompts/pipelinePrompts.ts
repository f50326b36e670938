import type { TaskItem, WorkflowContext } from "../types";

const section = (title: string, body: string): string => `## ${title}\n\n${body.trim() || "(empty)"}`;

export const buildPlanPrompt = (context: WorkflowContext): string =>
  [
    "# Task: Create an implementation plan",
    "Write the complete implementation plan in Markdown for the feature below.",
    "Respect every governing principle and include a Constitution Check section that maps each principle to the plan.",
    "Cover architecture, project structure (with concrete file paths), data model, interfaces and testing strategy.",
    section("Governing Principles", context.principles),
    section("Feature Requirement", context.requirement),
    section("Technology Stack", context.techStack)
  ].join("\n\n");

export const buildResearchPrompt = (context: WorkflowContext): string =>
  [
    "# Task: Research the technology choices",
    "Write a research document in Markdown that settles the technical decisions before planning.",
    "For each technology in the stack give the Decision, Rationale, Alternatives Considered and Trade-offs.",
    "Then list best practices for the stack: project structure, naming, testing and error handling.",
    section("Technology Stack", context.techStack),
    section("Feature Requirement", context.requirement)
  ].join("\n\n");

export const buildDataModelPrompt = (context: WorkflowContext, planText: string): string =>
  [
    "# Task: Define the data model",
    "Extract every entity the feature needs and document it in Markdown.",
    "For each entity write a `## EntityName` heading, a short description and a field table with the columns",
    "Field | Type | Required | Constraints | Description, followed by its relationships and validation rules.",
    section("Feature Requirement", context.requirement),
    section("Implementation Plan", planText)
  ].join("\n\n");

export const buildTasksPrompt = (context: WorkflowContext, planText: string): string =>
  [
    "# Task: Break the plan into implementation tasks",
    "Return a Markdown task list. Every task is one line in this exact format:",
    "- [ ] T001 [P] Description of the work in `relative/path/to/file.ext`",
    "Number ids sequentially (T001, T002, ...). Add [P] only when the task can run in parallel with its neighbours.",
    "Each task must target exactly one file, quoted in backticks at the end of the line.",
    section("Governing Principles", context.principles),
    section("Feature Requirement", context.requirement),
    section("Implementation Plan", planText)
  ].join("\n\n");

export const buildTaskItemPrompt = (
  context: WorkflowContext,
  planText: string,
  taskListText: string,
  item: TaskItem
): string =>
  [
    `# Task ${item.id}: implement a single file`,
    `Implement only the file \`${item.filePath}\` for this task: ${item.description}`,
    "Return the complete file content in one fenced code block, preceded by a line of the form:",
    `**File**: ${item.filePath}`,
    item.contentKind ? `Use a \`${item.contentKind}\` fence.` : "Tag the fence with the file's language.",
    section("Governing Principles", context.principles),
    section("Feature Requirement", context.requirement),
    section("Implementation Plan", planText),
    section("Full Task List (for cross-reference)", taskListText)
  ].join("\n\n");
