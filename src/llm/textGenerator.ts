export interface TextGeneratorLike {
  generate(prompt: string): Promise<string>;
}

interface CompletionLlmLike {
  complete(system: string, user: string): Promise<string>;
}

export const defaultGeneratorInstructions = [
  "You are an expert technical architect and code generator.",
  "Always return the complete deliverable itself: the full plan, the full task list or every requested file.",
  "Never answer with meta-commentary, summaries, placeholders or questions about whether to proceed.",
  "Start directly with the content (for example \"# Implementation Plan\").",
  "Generated code must be idiomatic, documented and free of syntax errors."
].join(" ");

export class LlmTextGenerator implements TextGeneratorLike {
  constructor(
    private readonly llm: CompletionLlmLike,
    private readonly instructions = defaultGeneratorInstructions
  ) {}

  generate(prompt: string): Promise<string> {
    return this.llm.complete(this.instructions, prompt);
  }
}
