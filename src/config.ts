import dotenv from "dotenv";
import path from "node:path";

dotenv.config();

const toInt = (value: string | undefined, fallback: number): number => {
  const parsed = Number.parseInt(value ?? "", 10);
  return Number.isFinite(parsed) ? parsed : fallback;
};

export const config = {
  port: toInt(process.env.PORT, 3000),
  openaiApiKey: process.env.OPENAI_API_KEY ?? "",
  openaiBaseUrl: process.env.OPENAI_BASE_URL ?? "https://api.openai.com/v1",
  model: process.env.OPENAI_MODEL ?? "gpt-4.1-mini",
  baseDir: path.resolve(process.env.BASE_DIR ?? process.cwd()),
  techStack: process.env.TECH_STACK?.trim() || "Python 3.10+",
  taskPreviewChars: toInt(process.env.TASK_PREVIEW_CHARS, 500),
  outputDirName: process.env.OUTPUT_DIR_NAME?.trim() || "outputs"
};

export const assertConfig = (): void => {
  if (!config.openaiApiKey) {
    throw new Error("OPENAI_API_KEY is required. Add it to .env or shell env.");
  }
};
