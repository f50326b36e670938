import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ArtifactNotFoundError, ArtifactStore, UnsafePathError } from "../../src/services/artifactStore";

describe("ArtifactStore", () => {
  let baseDir = "";

  beforeEach(async () => {
    baseDir = await fs.mkdtemp(path.join(os.tmpdir(), "artifact-store-"));
  });

  afterEach(async () => {
    await fs.rm(baseDir, { recursive: true, force: true });
  });

  it("writes and reads artifacts under their fixed file names", async () => {
    const store = new ArtifactStore(baseDir, "outputs");

    const savedTo = await store.write("plan", "# Plan\n");

    expect(savedTo).toBe(path.join(baseDir, "plan.md"));
    expect(await store.read("plan")).toBe("# Plan\n");
    expect(await store.exists("plan")).toBe(true);
    expect(await store.exists("task-list")).toBe(false);
  });

  it("raises ArtifactNotFoundError for a missing artifact", async () => {
    const store = new ArtifactStore(baseDir, "outputs");

    const error = await store.read("governing-principles").catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ArtifactNotFoundError);
    expect(error).toMatchObject({
      artifact: "governing-principles",
      filePath: path.join(baseDir, "constitution.md")
    });
  });

  it("lists present artifacts in pipeline order", async () => {
    const store = new ArtifactStore(baseDir, "outputs");
    await fs.writeFile(path.join(baseDir, "tasks.md"), "- [ ] T001 a", "utf8");
    await fs.writeFile(path.join(baseDir, "spec.md"), "requirement", "utf8");
    await fs.writeFile(path.join(baseDir, "constitution.md"), "principles", "utf8");

    expect(await store.list()).toEqual(["governing-principles", "feature-requirement", "task-list"]);
  });

  it("writes generated files under the output directory, creating parents", async () => {
    const store = new ArtifactStore(baseDir, "outputs");

    const savedTo = await store.writeOutput("src/models/user.py", "class User: ...\n");

    expect(savedTo).toBe(path.join(baseDir, "outputs", "src", "models", "user.py"));
    expect(await fs.readFile(savedTo, "utf8")).toBe("class User: ...\n");
  });

  it("keeps absolute-looking paths inside the output directory", async () => {
    const store = new ArtifactStore(baseDir, "outputs");
    expect(store.resolveOutputPath("/etc/app.conf")).toBe(path.join(baseDir, "outputs", "etc", "app.conf"));
  });

  it("rejects paths that escape the output directory", async () => {
    const store = new ArtifactStore(baseDir, "outputs");

    await expect(store.writeOutput("../escape.py", "x")).rejects.toBeInstanceOf(UnsafePathError);
    await expect(store.writeOutput("src/../../escape.py", "x")).rejects.toBeInstanceOf(UnsafePathError);
    await expect(store.writeOutput("  ", "x")).rejects.toBeInstanceOf(UnsafePathError);
  });
});
