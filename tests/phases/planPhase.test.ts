import { describe, expect, it } from "vitest";
import { PlanPhase } from "../../src/phases/planPhase";
import { FakeArtifactStore, createGenerator, drain, messagesOf, sourceDocuments, testContext } from "../helpers/fakes";

describe("PlanPhase", () => {
  it("prompts with principles, requirement and tech stack and saves the plan", async () => {
    const store = new FakeArtifactStore("/workspace", sourceDocuments);
    const generator = createGenerator(() => "# Implementation Plan");

    const { events, result } = await drain(new PlanPhase(generator).run({ kind: "context", context: testContext }, store));

    expect(generator.generate).toHaveBeenCalledOnce();
    expect(generator.prompts[0]).toContain("## Governing Principles\n\nKeep modules small.");
    expect(generator.prompts[0]).toContain("## Feature Requirement\n\nUsers can sign up with an email address.");
    expect(generator.prompts[0]).toContain("## Technology Stack\n\nPython 3.10+");
    expect(store.artifacts.get("plan")).toBe("# Implementation Plan");
    expect(result).toEqual({ kind: "plan", plan: { text: "# Implementation Plan", context: testContext } });
    expect(messagesOf(events)).toEqual(["Generating implementation plan.", "Plan saved (21 chars)."]);
  });

  it("persists an empty plan unchanged", async () => {
    const store = new FakeArtifactStore("/workspace", sourceDocuments);
    const generator = createGenerator(() => "");

    const { result } = await drain(new PlanPhase(generator).run({ kind: "context", context: testContext }, store));

    expect(store.artifacts.get("plan")).toBe("");
    expect(result.plan.text).toBe("");
  });

  it("propagates generation failures", async () => {
    const store = new FakeArtifactStore("/workspace", sourceDocuments);
    const generator = createGenerator(() => {
      throw new Error("model unavailable");
    });

    await expect(drain(new PlanPhase(generator).run({ kind: "context", context: testContext }, store))).rejects.toThrow(
      "model unavailable"
    );
    expect(store.artifacts.has("plan")).toBe(false);
  });
});
