import { createHash } from "node:crypto";
import yazl from "yazl";
import { sectionLabel, stageIndex } from "../orchestrator/catalog";
import type { Stage, StageResult } from "../orchestrator/types";

type ReportFile = { name: string; stage: Stage; content: string };

export type ExportManifest = {
  generated_at: string;
  session_id: string;
  stages: Array<{ stage: Stage; file: string; sha256: string; ready: boolean | null }>;
};

export function reportFileName(stage: Stage) {
  return `${String(stageIndex(stage)).padStart(2, "0")}-${stage}.md`;
}

export function renderStageMarkdown(result: StageResult) {
  return `# ${sectionLabel(result.stage)}\n\n${result.text.trim()}\n`;
}

export function buildReportFiles(results: ReadonlyMap<Stage, StageResult>): ReportFile[] {
  return [...results.values()]
    .sort((a, b) => stageIndex(a.stage) - stageIndex(b.stage))
    .map((result) => ({
      name: reportFileName(result.stage),
      stage: result.stage,
      content: renderStageMarkdown(result)
    }));
}

export function buildManifest(
  sessionId: string,
  results: ReadonlyMap<Stage, StageResult>,
  generatedAt = new Date()
): ExportManifest {
  return {
    generated_at: generatedAt.toISOString(),
    session_id: sessionId,
    stages: buildReportFiles(results).map((file) => ({
      stage: file.stage,
      file: file.name,
      sha256: sha256String(file.content),
      ready: results.get(file.stage)?.ready ?? null
    }))
  };
}

export function createZipStream(params: {
  results: ReadonlyMap<Stage, StageResult>;
  manifest: ExportManifest;
}): { stream: NodeJS.ReadableStream; finalize: () => void } {
  const zip = new yazl.ZipFile();

  for (const file of buildReportFiles(params.results)) {
    zip.addBuffer(Buffer.from(file.content, "utf8"), file.name, { mtime: new Date(0) });
  }

  const manifestBuf = Buffer.from(JSON.stringify(params.manifest, null, 2), "utf8");
  zip.addBuffer(manifestBuf, "manifest.json", { mtime: new Date(0) });

  return { stream: zip.outputStream, finalize: () => zip.end() };
}

export function sha256String(input: string) {
  return createHash("sha256").update(input).digest("hex");
}
