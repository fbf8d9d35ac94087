import { Annotation, StateGraph, START, END } from "@langchain/langgraph";

import { successor } from "./catalog";
import { compose } from "./context";
import { isWorkflowError, type WorkflowError } from "./errors";
import { toGenerationUnavailable, withTimeout, type GenerationGateway } from "./gateway";
import { isReady } from "./readiness";
import type { ConversationTurn, GenerationMode, Stage, StageResult } from "./types";

const StageRunState = Annotation.Root({
  stage: Annotation<Stage>(),
  humanText: Annotation<string | undefined>(),
  results: Annotation<ReadonlyMap<Stage, StageResult>>(),
  conversation: Annotation<readonly ConversationTurn[]>(),
  payload: Annotation<string>(),
  mode: Annotation<GenerationMode>(),
  text: Annotation<string>(),
  ready: Annotation<boolean | undefined>(),
  nextStage: Annotation<Stage>(),
  failure: Annotation<WorkflowError | undefined>()
});

export type StageRunState = typeof StageRunState.State;
type StageRunUpdate = typeof StageRunState.Update;

export type StageGraphRuntime = {
  gateway: GenerationGateway;
  timeoutMs: number;
};

async function composeNode(state: StageRunState): Promise<StageRunUpdate> {
  try {
    const payload = compose(state.stage, state.results, state.humanText);
    const mode: GenerationMode = state.conversation.length > 0 ? "history" : "prompt";
    return { payload, mode };
  } catch (error) {
    if (isWorkflowError(error)) {
      return { failure: error };
    }
    throw error;
  }
}

function createGenerateNode(runtime: StageGraphRuntime) {
  return async (state: StageRunState): Promise<StageRunUpdate> => {
    try {
      const text = await withTimeout(runtime.timeoutMs, (signal) =>
        state.mode === "history"
          ? runtime.gateway.generateFromHistory(state.payload, state.conversation, { signal })
          : runtime.gateway.generateFromPrompt(state.payload, { signal })
      );
      return { text };
    } catch (error) {
      return { failure: toGenerationUnavailable(error) };
    }
  };
}

async function assessReadinessNode(state: StageRunState): Promise<StageRunUpdate> {
  const ready = isReady(state.text);
  return {
    ready,
    nextStage: ready ? successor(state.stage) : state.stage
  };
}

async function routeNode(state: StageRunState): Promise<StageRunUpdate> {
  return { nextStage: successor(state.stage) };
}

function afterCompose(state: StageRunState) {
  return state.failure ? END : "generate";
}

function afterGenerate(state: StageRunState) {
  if (state.failure) return END;
  return state.stage === "validation" ? "assess_readiness" : "route";
}

/** compose → generate → (assess_readiness | route). Failures short-circuit to END. */
export function createStageGraph(runtime: StageGraphRuntime) {
  const graph = new StateGraph(StageRunState)
    .addNode("compose", composeNode)
    .addNode("generate", createGenerateNode(runtime))
    .addNode("assess_readiness", assessReadinessNode)
    .addNode("route", routeNode)
    .addEdge(START, "compose")
    .addConditionalEdges("compose", afterCompose, ["generate", END])
    .addConditionalEdges("generate", afterGenerate, ["assess_readiness", "route", END])
    .addEdge("assess_readiness", END)
    .addEdge("route", END);

  return graph.compile({ name: "stage-executor" });
}

export type StageGraph = ReturnType<typeof createStageGraph>;
