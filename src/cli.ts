#!/usr/bin/env node
import { createInterface } from "node:readline/promises";
import { assertConfig, config } from "./config";
import { inspectWorkspace } from "./orchestrator/phaseRouter";
import { PipelineFailure } from "./orchestrator/pipelineRunner";
import { createPipeline } from "./pipeline";
import { ArtifactStore } from "./services/artifactStore";
import type { ApprovalRequest, RunEvent } from "./types";

const getArgValue = (name: string): string | undefined => {
  const marker = `--${name}`;
  const index = process.argv.findIndex((arg) => arg === marker);
  if (index === -1) return undefined;
  return process.argv[index + 1];
};

const hasFlag = (name: string): boolean => process.argv.includes(`--${name}`);

const parseBoolean = (value: string | undefined, fallback: boolean): boolean => {
  if (!value) return fallback;
  const normalized = value.trim().toLowerCase();
  if (["true", "1", "yes", "y", "on"].includes(normalized)) return true;
  if (["false", "0", "no", "n", "off"].includes(normalized)) return false;
  return fallback;
};

const printEvent = (event: RunEvent): void => {
  const phaseText = event.phase ? ` [${event.phase}]` : "";
  console.log(`[${event.timestamp}]${phaseText} ${event.type}: ${event.message}`);
  if (event.type === "approval_requested" && typeof event.data?.preview === "string") {
    console.log(`\n${event.data.preview}\n`);
  }
};

const askForApproval = async (request: ApprovalRequest): Promise<boolean> => {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    while (true) {
      const answer = (await rl.question(`${request.summary}\nApprove? (yes/no) `)).trim().toLowerCase();
      if (["yes", "y"].includes(answer)) return true;
      if (["no", "n"].includes(answer)) return false;
      console.log("Please answer yes or no.");
    }
  } finally {
    rl.close();
  }
};

const printStatus = async (baseDir: string): Promise<void> => {
  const report = await inspectWorkspace(new ArtifactStore(baseDir));
  console.log(`Workspace: ${baseDir}`);
  console.log(`  constitution.md    ${report.constitutionExists ? "present" : "missing"}`);
  console.log(`  spec.md            ${report.specExists ? "present" : "missing"}`);
  console.log(`  research.md        ${report.researchGenerated ? "generated" : "not generated"}`);
  console.log(`  plan.md            ${report.planGenerated ? "generated" : "not generated"}`);
  console.log(`  data-model.md      ${report.dataModelGenerated ? "generated" : "not generated"}`);
  console.log(`  tasks.md           ${report.tasksGenerated ? "generated" : "not generated"}`);
  console.log(`  implementation.md  ${report.implementationGenerated ? "generated" : "not generated"}`);
  if (report.tasks) {
    console.log(
      `  tasks: checkboxes=${report.tasks.hasCheckboxes} ids=${report.tasks.hasTaskIds} unchecked=${report.tasks.uncheckedCount}`
    );
  }
  console.log(`Next run starts at: ${report.startPhase}`);
};

const main = async (): Promise<void> => {
  const baseDir = getArgValue("base-dir")?.trim() || config.baseDir;

  if (hasFlag("status")) {
    await printStatus(baseDir);
    return;
  }

  assertConfig();

  const techStack = getArgValue("tech-stack")?.trim() || config.techStack;
  const autoApprove = parseBoolean(getArgValue("auto-approve"), false);
  const includeResearch = parseBoolean(getArgValue("research"), false);
  const includeDataModel = parseBoolean(getArgValue("data-model"), false);

  const { runs, runner } = createPipeline({ techStack });
  const unsubscribe = runs.subscribeAll(printEvent);

  try {
    const result = await runner.runToCompletion({ baseDir, techStack, includeResearch, includeDataModel }, (request) =>
      autoApprove ? true : askForApproval(request)
    );

    if (result.cancelled) {
      console.log("\nWorkflow cancelled. Existing artifacts were kept.");
      return;
    }

    console.log(`\nFinal status: success (${result.fileCount} code files, tech stack: ${result.techStack})`);
    for (const file of result.generatedFiles) {
      console.log(`  ${file}`);
    }
  } finally {
    unsubscribe();
  }
};

main().catch((error: unknown) => {
  if (error instanceof PipelineFailure) {
    console.error(`\nFinal status: failed [${error.phase}] ${error.message}`);
  } else {
    const message = error instanceof Error ? error.message : String(error);
    console.error(message);
    console.error(
      'Usage: npm run cli -- --base-dir <dir> [--tech-stack "Python 3.10+"] [--auto-approve true|false] [--research true|false] [--data-model true|false] [--status]'
    );
  }
  process.exit(1);
});
