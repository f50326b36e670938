import fs from "node:fs/promises";
import path from "node:path";
import { config } from "../config";
import type { ArtifactName } from "../types";

export const artifactFiles: Record<ArtifactName, string> = {
  "governing-principles": "constitution.md",
  "feature-requirement": "spec.md",
  research: "research.md",
  plan: "plan.md",
  "data-model": "data-model.md",
  "task-list": "tasks.md",
  "implementation-log": "implementation.md"
};

export const artifactNames: readonly ArtifactName[] = [
  "governing-principles",
  "feature-requirement",
  "research",
  "plan",
  "data-model",
  "task-list",
  "implementation-log"
];

export class ArtifactNotFoundError extends Error {
  constructor(
    readonly artifact: ArtifactName,
    readonly filePath: string
  ) {
    super(`Required artifact "${artifact}" not found: ${filePath}`);
    this.name = "ArtifactNotFoundError";
  }
}

export class UnsafePathError extends Error {
  constructor(readonly requestedPath: string) {
    super(`Unsafe output path rejected: ${requestedPath}`);
    this.name = "UnsafePathError";
  }
}

export interface ArtifactStoreLike {
  readonly baseDir: string;
  exists(name: ArtifactName): Promise<boolean>;
  read(name: ArtifactName): Promise<string>;
  write(name: ArtifactName, text: string): Promise<string>;
  writeOutput(relativePath: string, text: string): Promise<string>;
  list(): Promise<ArtifactName[]>;
}

const isInside = (candidate: string, root: string): boolean => {
  const relative = path.relative(root, candidate);
  return relative !== "" && !relative.startsWith("..") && !path.isAbsolute(relative);
};

const isMissingFileError = (error: unknown): boolean =>
  typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";

export class ArtifactStore implements ArtifactStoreLike {
  readonly baseDir: string;
  readonly outputDir: string;

  constructor(baseDir: string, outputDirName = config.outputDirName) {
    this.baseDir = path.resolve(baseDir);
    this.outputDir = path.resolve(this.baseDir, outputDirName);
  }

  pathOf(name: ArtifactName): string {
    return path.join(this.baseDir, artifactFiles[name]);
  }

  async exists(name: ArtifactName): Promise<boolean> {
    try {
      const stat = await fs.stat(this.pathOf(name));
      return stat.isFile();
    } catch (error: unknown) {
      if (isMissingFileError(error)) return false;
      throw error;
    }
  }

  async read(name: ArtifactName): Promise<string> {
    const filePath = this.pathOf(name);
    try {
      return await fs.readFile(filePath, "utf8");
    } catch (error: unknown) {
      if (isMissingFileError(error)) {
        throw new ArtifactNotFoundError(name, filePath);
      }
      throw error;
    }
  }

  async write(name: ArtifactName, text: string): Promise<string> {
    const filePath = this.pathOf(name);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, text, "utf8");
    return filePath;
  }

  resolveOutputPath(relativePath: string): string {
    const cleaned = relativePath.trim().replace(/\\/g, "/").replace(/^\/+/, "");
    const absolute = path.resolve(this.outputDir, cleaned);
    if (!cleaned || !isInside(absolute, this.outputDir)) {
      throw new UnsafePathError(relativePath);
    }
    return absolute;
  }

  async writeOutput(relativePath: string, text: string): Promise<string> {
    const absolute = this.resolveOutputPath(relativePath);
    await fs.mkdir(path.dirname(absolute), { recursive: true });
    await fs.writeFile(absolute, text, "utf8");
    return absolute;
  }

  async list(): Promise<ArtifactName[]> {
    const present = await Promise.all(artifactNames.map(async (name) => ((await this.exists(name)) ? name : undefined)));
    return present.filter((name): name is ArtifactName => name !== undefined);
  }
}
