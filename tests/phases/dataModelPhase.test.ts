import { describe, expect, it } from "vitest";
import { DataModelPhase } from "../../src/phases/dataModelPhase";
import { FakeArtifactStore, PLAN_TEXT, createGenerator, drain, messagesOf, sourceDocuments, testContext } from "../helpers/fakes";

describe("DataModelPhase", () => {
  it("derives entities from the plan and saves data-model.md", async () => {
    const store = new FakeArtifactStore("/workspace", sourceDocuments);
    const generator = createGenerator(() => "# Data Model");
    const state = { kind: "plan", plan: { text: PLAN_TEXT, context: testContext } } as const;

    const { events, result } = await drain(new DataModelPhase(generator).run(state, store));

    expect(generator.prompts[0].split("\n")[0]).toBe("# Task: Define the data model");
    expect(generator.prompts[0]).toContain(`## Implementation Plan\n\n${PLAN_TEXT}`);
    expect(store.artifacts.get("data-model")).toBe("# Data Model");
    expect(result).toBe(state);
    expect(messagesOf(events)).toEqual(["Deriving the data model from the plan.", "Data model saved (12 chars)."]);
    expect(events[1]).toMatchObject({ phase: "data-model", data: { path: "/workspace/data-model.md" } });
  });
});
