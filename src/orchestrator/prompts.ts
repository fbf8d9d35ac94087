import { READINESS_MARKER } from "./readiness";
import type { Stage } from "./types";

const EXTRACTION_PROMPT = [
  "You are a clinical reasoning assistant helping a physician build a causal model of a patient case.",
  "Read the case details below and extract every medically relevant factor.",
  "",
  "Group the factors under these headings:",
  "- Symptoms",
  "- Signs and examination findings",
  "- Risk factors and history",
  "- Investigations and results",
  "- Medications and exposures",
  "",
  "List one factor per line. Do not speculate about diagnoses yet."
].join("\n");

const CAUSAL_ANALYSIS_PROMPT = [
  "Using the extracted factors below, describe the plausible causal relationships between them.",
  "Write one relationship per line in the form `Cause → Effect`, followed by a short justification.",
  "Mark relationships that are uncertain with (uncertain). Do not introduce factors that are not listed."
].join("\n");

const VALIDATION_PROMPT = [
  "Review the extracted factors and causal links below and decide whether the information is complete enough",
  "to reason about differential diagnoses.",
  "",
  "If anything important is missing, list each missing item with a short follow-up question for the physician.",
  `If nothing important is missing, answer with the exact text "${READINESS_MARKER}" on its own line, followed by a one-sentence summary.`,
  `Only write "${READINESS_MARKER}" when no follow-up questions remain.`
].join("\n");

const COUNTERFACTUAL_PROMPT = [
  "Perform a counterfactual analysis of the case below.",
  "For each candidate cause, ask: had this cause been absent, would the observed findings still be expected?",
  "Separate causes that explain the presentation from those that merely co-occur with it."
].join("\n");

const DIAGNOSIS_PROMPT = [
  "Based on the counterfactual analysis below, rank the differential diagnoses from most to least likely.",
  "For each diagnosis give the supporting causal chain and the findings that argue against it."
].join("\n");

const TREATMENT_PROMPT = [
  "Propose treatment options for the ranked diagnoses below.",
  "Label each option as one of:",
  "- ✅ Causal Treatment (addresses the underlying cause)",
  "- ✅ Preventative Treatment (prevents progression or recurrence)",
  "- ❌ Symptomatic Treatment (relieves symptoms only)"
].join("\n");

const PATIENT_SPECIFIC_PROMPT = [
  "Adapt the treatment options below to this particular patient.",
  "Account for comorbidities, contraindications, interactions and any patient-specific information provided.",
  "State which options you keep, modify or drop, and why."
].join("\n");

const FINAL_PLAN_PROMPT = [
  "Combine the treatment options and the patient-specific plan below into a final treatment plan.",
  "Order the steps, give monitoring points, and note when the plan should be reassessed."
].join("\n");

const VISUALIZATION_PROMPT = [
  "Convert the causal links below into a Mermaid flowchart (`flowchart LR`).",
  "Use one node per factor and one edge per causal link; label uncertain edges with `?`.",
  "Return only the Mermaid source."
].join("\n");

export const STAGE_PROMPTS: Partial<Record<Stage, string>> = {
  extraction: EXTRACTION_PROMPT,
  causal_analysis: CAUSAL_ANALYSIS_PROMPT,
  validation: VALIDATION_PROMPT,
  counterfactual: COUNTERFACTUAL_PROMPT,
  diagnosis: DIAGNOSIS_PROMPT,
  treatment_planning: TREATMENT_PROMPT,
  patient_specific: PATIENT_SPECIFIC_PROMPT,
  final_plan: FINAL_PLAN_PROMPT,
  visualization: VISUALIZATION_PROMPT
};

export function getStagePrompt(stage: Stage): string | undefined {
  return STAGE_PROMPTS[stage];
}
