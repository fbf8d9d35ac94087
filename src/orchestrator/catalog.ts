import { UnknownStageError } from "./errors";
import { STAGES, type Stage } from "./types";

type StageDefinition = {
  /** Label used when this stage's text feeds a later stage. */
  label: string;
  dependsOn: readonly Stage[];
  acceptsSupplement: boolean;
  generates: boolean;
};

const CATALOG: Record<Stage, StageDefinition> = {
  initial: { label: "Case Details", dependsOn: [], acceptsSupplement: false, generates: false },
  extraction: { label: "Extracted Factors", dependsOn: ["initial"], acceptsSupplement: false, generates: true },
  causal_analysis: { label: "Causal Links", dependsOn: ["extraction"], acceptsSupplement: false, generates: true },
  validation: {
    label: "Validation",
    dependsOn: ["extraction", "causal_analysis"],
    acceptsSupplement: true,
    generates: true
  },
  counterfactual: {
    label: "Counterfactual Analysis",
    dependsOn: ["extraction", "causal_analysis", "validation"],
    acceptsSupplement: false,
    generates: true
  },
  diagnosis: { label: "Diagnosis", dependsOn: ["counterfactual"], acceptsSupplement: false, generates: true },
  treatment_planning: { label: "Treatment Options", dependsOn: ["diagnosis"], acceptsSupplement: false, generates: true },
  patient_specific: {
    label: "Patient-Specific Plan",
    dependsOn: ["diagnosis", "treatment_planning"],
    acceptsSupplement: true,
    generates: true
  },
  final_plan: {
    label: "Final Treatment Plan",
    dependsOn: ["treatment_planning", "patient_specific"],
    acceptsSupplement: false,
    generates: true
  },
  visualization: { label: "Causal Graph", dependsOn: ["causal_analysis"], acceptsSupplement: false, generates: true },
  complete: { label: "Complete", dependsOn: [], acceptsSupplement: false, generates: false }
};

export { STAGES };

export function isStage(value: unknown): value is Stage {
  return typeof value === "string" && STAGES.some((stage) => stage === value);
}

export function assertStage(value: string): Stage {
  if (!isStage(value)) {
    throw new UnknownStageError(value);
  }
  return value;
}

function definitionOf(stage: string): StageDefinition {
  return CATALOG[assertStage(stage)];
}

export function dependencies(stage: string): Stage[] {
  return [...definitionOf(stage).dependsOn];
}

export function sectionLabel(stage: string): string {
  return definitionOf(stage).label;
}

export function acceptsSupplement(stage: string): boolean {
  return definitionOf(stage).acceptsSupplement;
}

export function generatesText(stage: string): boolean {
  return definitionOf(stage).generates;
}

export function stageIndex(stage: string): number {
  return STAGES.indexOf(assertStage(stage));
}

export function successor(stage: string): Stage {
  const index = stageIndex(stage);
  return STAGES[index + 1] ?? "complete";
}

export function isTerminalStage(stage: Stage): boolean {
  return stage === "complete";
}
