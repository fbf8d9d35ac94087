import { describe, expect, it } from "vitest";
import { WorkflowEngine } from "../../src/orchestrator/engine";
import {
  EmptyCaseTextError,
  GenerationUnavailableError,
  InvalidSessionStateError
} from "../../src/orchestrator/errors";
import { READINESS_MARKER } from "../../src/orchestrator/readiness";
import { deferred, FakeGateway } from "../support/fake-gateway";

const CASE_TEXT = "Patient reports chest pain";

async function engineAtValidation(gateway: FakeGateway) {
  const engine = new WorkflowEngine({ gateway });
  gateway.enqueue("Symptoms: chest pain", "Chest pain <- myocardial ischemia");
  await engine.advance(CASE_TEXT);
  await engine.advance();
  await engine.advance();
  return engine;
}

describe("WorkflowEngine", () => {
  it("starts a case and runs extraction on the recorded case text", async () => {
    const gateway = new FakeGateway().enqueue("Symptoms: chest pain");
    const engine = new WorkflowEngine({ gateway });

    const initial = await engine.advance(CASE_TEXT);
    expect(initial.text).toBe(CASE_TEXT);
    expect(engine.currentStage).toBe("extraction");

    const extraction = await engine.advance();
    expect(extraction.text).toBe("Symptoms: chest pain");
    expect(engine.currentStage).toBe("causal_analysis");
    expect(engine.getResult("extraction")?.text).toBe("Symptoms: chest pain");
    expect(engine.status("extraction")).toBe("completed");
    expect(engine.status("causal_analysis")).toBe("not_started");
    expect(gateway.calls[0]?.payload.endsWith(`Case Details:\n${CASE_TEXT}`)).toBe(true);
  });

  it("repeats validation until the output is ready, keeping only the latest attempt", async () => {
    const gateway = new FakeGateway();
    const engine = await engineAtValidation(gateway);
    expect(engine.currentStage).toBe("validation");

    gateway.enqueue("Missing: troponin", "Missing: ECG", "Missing: blood pressure");
    for (let attempt = 0; attempt < 3; attempt += 1) {
      const result = await engine.advance();
      expect(result.ready).toBe(false);
      expect(engine.currentStage).toBe("validation");
    }
    expect(engine.getResult("validation")?.text).toBe("Missing: blood pressure");

    gateway.enqueue(`All covered.\n${READINESS_MARKER}`);
    const ready = await engine.advance("blood pressure 150/90");
    expect(ready.ready).toBe(true);
    expect(engine.currentStage).toBe("counterfactual");
    expect(gateway.lastCall?.payload.endsWith("Additional Information:\nblood pressure 150/90")).toBe(true);
  });

  it("runs the whole pipeline and stays complete", async () => {
    const gateway = new FakeGateway();
    const engine = new WorkflowEngine({ gateway });

    await engine.advance(CASE_TEXT);
    while (!engine.isTerminal) {
      await engine.advance();
    }

    expect(gateway.calls).toHaveLength(9);
    expect(engine.latestStage).toBe("visualization");
    expect(Object.keys(engine.snapshot())).toEqual([
      "initial",
      "extraction",
      "causal_analysis",
      "validation",
      "counterfactual",
      "diagnosis",
      "treatment_planning",
      "patient_specific",
      "final_plan",
      "visualization"
    ]);

    const again = await engine.advance();
    expect(again).toBe(engine.getResult("visualization"));
    expect(engine.currentStage).toBe("complete");
    expect(gateway.calls).toHaveLength(9);
  });

  it("requires case text on the first advance", async () => {
    const engine = new WorkflowEngine({ gateway: new FakeGateway() });
    await expect(engine.advance("  ")).rejects.toBeInstanceOf(EmptyCaseTextError);
    expect(engine.currentStage).toBe("initial");
    expect(engine.results().size).toBe(0);
  });

  it("leaves state untouched when generation fails", async () => {
    const gateway = new FakeGateway().enqueue("Symptoms: chest pain", new Error("upstream 500"));
    const engine = new WorkflowEngine({ gateway });
    await engine.advance(CASE_TEXT);
    await engine.advance();

    await expect(engine.advance()).rejects.toBeInstanceOf(GenerationUnavailableError);

    expect(engine.currentStage).toBe("causal_analysis");
    expect(engine.status("causal_analysis")).toBe("not_started");
    expect(engine.results().size).toBe(2);
    expect(engine.latestStage).toBe("extraction");
    expect(engine.busy).toBe(false);
  });

  it("reruns the latest stage in place", async () => {
    const gateway = new FakeGateway().enqueue("Symptoms: chest pain", "Symptoms: chest pain; diabetes");
    const engine = new WorkflowEngine({ gateway });
    await engine.advance(CASE_TEXT);
    await engine.advance();

    const rerun = await engine.rerun("extraction", "patient has diabetes");

    expect(rerun.text).toBe("Symptoms: chest pain; diabetes");
    expect(engine.currentStage).toBe("causal_analysis");
    expect(engine.results().size).toBe(2);
  });

  it("only reruns the most recent stage", async () => {
    const engine = new WorkflowEngine({ gateway: new FakeGateway() });
    await expect(engine.rerun("extraction")).rejects.toThrow("Cannot rerun extraction while no stage has run");

    await engine.advance(CASE_TEXT);
    await engine.advance();
    await expect(engine.rerun("initial")).rejects.toThrow(
      "Cannot rerun initial while extraction is the latest stage"
    );
  });

  it("clears everything on reset", async () => {
    const engine = new WorkflowEngine({ gateway: new FakeGateway() });
    await engine.advance(CASE_TEXT);
    await engine.advance();

    engine.reset();

    expect(engine.currentStage).toBe("initial");
    expect(engine.latestStage).toBeUndefined();
    expect(engine.snapshot()).toEqual({});
    expect(engine.status("extraction")).toBe("not_started");
  });

  it("rejects a second operation while a stage is running", async () => {
    const pending = deferred<string>();
    const gateway = new FakeGateway().enqueue(() => pending.promise);
    const engine = new WorkflowEngine({ gateway });
    await engine.advance(CASE_TEXT);

    const first = engine.advance();
    expect(engine.busy).toBe(true);
    await expect(engine.advance()).rejects.toThrow("Cannot advance while another operation is in progress");
    expect(() => engine.reset()).toThrow(InvalidSessionStateError);

    pending.resolve("Symptoms: chest pain");
    await expect(first).resolves.toMatchObject({ stage: "extraction", text: "Symptoms: chest pain" });
    expect(engine.busy).toBe(false);
    expect(engine.currentStage).toBe("causal_analysis");
  });
});
