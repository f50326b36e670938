import type { TextGeneratorLike } from "../llm/textGenerator";
import { extractCodeBlocks, selectBlockForFile } from "../parsing/codeBlockExtractor";
import { type TaskItemParserOptions, parseTaskItems } from "../parsing/taskItemParser";
import { buildTaskItemPrompt } from "../prompts/pipelinePrompts";
import type { ArtifactStoreLike } from "../services/artifactStore";
import type { ImplementationOutput, TaskItem, TaskListState } from "../types";
import { type PhaseStream, progress, warning } from "./events";

const IMPLEMENTATION_LOG_TITLE = "# Implementation";

const sectionTitle = (item: TaskItem): string => `## ${item.id}: ${item.description}`;

export class ImplementationPhase {
  constructor(
    private readonly generator: TextGeneratorLike,
    private readonly parserOptions: TaskItemParserOptions = {}
  ) {}

  async *run(state: TaskListState, store: ArtifactStoreLike): PhaseStream<ImplementationOutput> {
    const { taskList } = state;
    const { context } = taskList;
    const items = parseTaskItems(taskList.text, this.parserOptions);
    yield progress("implementation", `Implementing ${items.length} file tasks one at a time.`, {
      taskIds: items.map((item) => item.id)
    });

    const sections: string[] = [IMPLEMENTATION_LOG_TITLE];
    const generatedFiles: string[] = [];

    for (const [index, item] of items.entries()) {
      yield progress("implementation", `[${index + 1}/${items.length}] ${item.id} -> ${item.filePath}`, {
        taskId: item.id,
        filePath: item.filePath
      });

      try {
        const prompt = buildTaskItemPrompt(context, taskList.planText, taskList.text, item);
        const response = await this.generator.generate(prompt);
        sections.push(`${sectionTitle(item)}\n\n${response}`);

        const block = selectBlockForFile(extractCodeBlocks(response), item.filePath);
        if (!block) {
          yield warning("implementation", `No code block found for ${item.id}; nothing saved.`, { taskId: item.id });
          continue;
        }

        const savedPath = await store.writeOutput(item.filePath, block.body);
        generatedFiles.push(savedPath);
        yield progress("implementation", `Saved ${item.filePath}.`, { taskId: item.id, path: savedPath });
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        sections.push(`${sectionTitle(item)}\n\n**ERROR**: Failed to implement ${item.id}: ${message}`);
        yield warning("implementation", `${item.id} failed: ${message}`, { taskId: item.id });
      }
    }

    const implementation = `${sections.join("\n\n")}\n`;
    const logPath = await store.write("implementation-log", implementation);
    yield progress("implementation", `Implementation log saved. Generated ${generatedFiles.length} code files.`, {
      path: logPath
    });

    return { implementation, generatedFiles, fileCount: generatedFiles.length };
  }
}
