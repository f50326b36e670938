import { vi } from "vitest";
import type { PhaseStream } from "../../src/phases/events";
import {
  ArtifactNotFoundError,
  type ArtifactStoreLike,
  UnsafePathError,
  artifactFiles,
  artifactNames
} from "../../src/services/artifactStore";
import type { ArtifactName, PipelineEvent, WorkflowContext } from "../../src/types";

export class FakeArtifactStore implements ArtifactStoreLike {
  readonly artifacts = new Map<ArtifactName, string>();
  readonly outputs = new Map<string, string>();

  constructor(
    readonly baseDir = "/workspace",
    initial: Partial<Record<ArtifactName, string>> = {}
  ) {
    for (const name of artifactNames) {
      const text = initial[name];
      if (text !== undefined) this.artifacts.set(name, text);
    }
  }

  async exists(name: ArtifactName): Promise<boolean> {
    return this.artifacts.has(name);
  }

  async read(name: ArtifactName): Promise<string> {
    const text = this.artifacts.get(name);
    if (text === undefined) {
      throw new ArtifactNotFoundError(name, `${this.baseDir}/${artifactFiles[name]}`);
    }
    return text;
  }

  async write(name: ArtifactName, text: string): Promise<string> {
    this.artifacts.set(name, text);
    return `${this.baseDir}/${artifactFiles[name]}`;
  }

  async writeOutput(relativePath: string, text: string): Promise<string> {
    if (relativePath.split("/").includes("..")) {
      throw new UnsafePathError(relativePath);
    }
    this.outputs.set(relativePath, text);
    return `${this.baseDir}/outputs/${relativePath}`;
  }

  async list(): Promise<ArtifactName[]> {
    return artifactNames.filter((name) => this.artifacts.has(name));
  }
}

export const createGenerator = (respond: (prompt: string) => string | Promise<string>) => {
  const prompts: string[] = [];
  const generate = vi.fn(async (prompt: string) => {
    prompts.push(prompt);
    return respond(prompt);
  });
  return { generate, prompts };
};

export const drain = async <T>(stream: PhaseStream<T>): Promise<{ events: PipelineEvent[]; result: T }> => {
  const events: PipelineEvent[] = [];
  while (true) {
    const next = await stream.next();
    if (next.done) return { events, result: next.value };
    events.push(next.value);
  }
};

export const messagesOf = (events: PipelineEvent[]): string[] =>
  events.flatMap((event) => (event.type === "progress" ? [event.message] : []));

export const testContext: WorkflowContext = {
  principles: "Keep modules small.",
  requirement: "Users can sign up with an email address.",
  baseDir: "/workspace",
  techStack: "Python 3.10+"
};

export const sourceDocuments: Partial<Record<ArtifactName, string>> = {
  "governing-principles": testContext.principles,
  "feature-requirement": testContext.requirement
};

export const PLAN_TEXT = "# Implementation Plan\n\nA user model and a settings module.";

export const TASKS_TEXT = [
  "# Tasks",
  "",
  "- [ ] T001 Create user model in `src/models/user.py`",
  "- [ ] T002 [P] Add settings in `src/config.py`",
  "- [ ] T003 Initialize project"
].join("\n");

export const codeResponse = (body: string): string => `Here is the file.\n\n\`\`\`python\n${body}\n\`\`\`\n`;

export const RESEARCH_TEXT = "# Research\n\nUse the standard library where it is enough.";

export const DATA_MODEL_TEXT = "# Data Model\n\n## User\n\n| Field | Type |\n|-------|------|\n| email | String |";

export const pipelineResponder = (prompt: string): string => {
  if (prompt.startsWith("# Task: Research the technology choices")) return RESEARCH_TEXT;
  if (prompt.startsWith("# Task: Define the data model")) return DATA_MODEL_TEXT;
  if (prompt.startsWith("# Task: Create an implementation plan")) return PLAN_TEXT;
  if (prompt.startsWith("# Task: Break the plan")) return TASKS_TEXT;
  const id = /^# Task (T\d+)/.exec(prompt)?.[1] ?? "unknown";
  return codeResponse(`print("${id}")`);
};
