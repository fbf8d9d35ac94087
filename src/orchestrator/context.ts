import { acceptsSupplement, assertStage, dependencies, sectionLabel } from "./catalog";
import { MissingDependencyError } from "./errors";
import { getStagePrompt } from "./prompts";
import type { Stage, StageResult } from "./types";

const SUPPLEMENT_LABEL = "Additional Information";

type ResultsView = ReadonlyMap<Stage, StageResult>;

function section(label: string, body: string) {
  return `${label}:\n${body}`;
}

/**
 * Labeled sections for every declared dependency, in catalog order, plus the
 * supplement for stages that take one. Only earlier stages are read.
 */
export function composeContext(stage: string, results: ResultsView, humanText?: string): string {
  const target = assertStage(stage);
  const sections = dependencies(target).map((dependency) => {
    const result = results.get(dependency);
    if (!result) {
      throw new MissingDependencyError(target, dependency);
    }
    return section(sectionLabel(dependency), result.text);
  });

  const supplement = humanText?.trim();
  if (supplement && acceptsSupplement(target)) {
    sections.push(section(SUPPLEMENT_LABEL, supplement));
  }

  return sections.join("\n\n");
}

export function compose(stage: string, results: ResultsView, humanText?: string): string {
  const target = assertStage(stage);
  const context = composeContext(target, results, humanText);
  const instructions = getStagePrompt(target);
  if (!instructions) {
    return context;
  }
  return `${instructions}\n\n${context}`;
}
