import { acceptsSupplement, sectionLabel } from "../orchestrator/catalog";
import { isWorkflowError } from "../orchestrator/errors";
import type { CaseSession, CaseStatus } from "../services/case-sessions";

/** Line-oriented terminal the case loop talks through. */
export type ConsoleIO = {
  ask(question: string): Promise<string>;
  print(text?: string): void;
};

export type CaseOutcome = "new" | "quit";

type Choice = "approve" | "refine" | "retry" | "new" | "quit";

type Menu = { prompt: string; question: string; choices: Record<string, Choice> };

const REVIEW_MENU: Menu = {
  prompt: "Options: 1. Approve  2. Refine  3. New case  4. Quit",
  question: "Choose option (1-4): ",
  choices: { "1": "approve", a: "approve", "2": "refine", r: "refine", "3": "new", n: "new", "4": "quit", q: "quit" }
};

// Shown when the stage after an approval failed to generate.
const RETRY_MENU: Menu = {
  prompt: "Options: 1. Retry  2. New case  3. Quit",
  question: "Choose option (1-3): ",
  choices: { "1": "retry", t: "retry", "2": "new", n: "new", "3": "quit", q: "quit" }
};

export function printOutput(io: ConsoleIO, status: CaseStatus): void {
  if (status.pendingText === null) return;
  io.print(`\n=== ${sectionLabel(status.stage)} ===`);
  io.print(status.pendingText);
  if (status.stage === "validation") {
    io.print(status.ready ? "\n(Ready to proceed.)" : "\n(Validation will run again on the next submission.)");
  }
}

export async function readCaseText(io: ConsoleIO): Promise<string> {
  io.print("\nEnter case details, finishing with an empty line (type 'exit' to quit):");
  const lines: string[] = [];
  for (;;) {
    const line = await io.ask(lines.length === 0 ? "> " : "  ");
    if (lines.length === 0 && line.trim().toLowerCase() === "exit") return "";
    if (!line.trim()) {
      if (lines.length > 0) break;
      continue;
    }
    lines.push(line);
  }
  return lines.join("\n");
}

async function askChoice(io: ConsoleIO, menu: Menu): Promise<Choice> {
  for (;;) {
    io.print(`\n${menu.prompt}`);
    const answer = (await io.ask(menu.question)).trim().toLowerCase();
    const choice = menu.choices[answer];
    if (choice) return choice;
    io.print("Invalid choice. Please try again.");
  }
}

function report(io: ConsoleIO, error: unknown): void {
  if (isWorkflowError(error)) {
    io.print(`\n[${error.code}] ${error.message}`);
    if (error.retryable) io.print("Nothing was recorded; try again.");
    return;
  }
  throw error;
}

/**
 * Walks one case through the approval loop until it completes or the user
 * picks New case or Quit. A stage that fails after an approval can be retried
 * with the same supplement.
 */
export async function runCase(session: CaseSession, io: ConsoleIO, caseText: string): Promise<CaseOutcome> {
  let status: CaseStatus;
  try {
    status = await session.startCase(caseText);
  } catch (error) {
    report(io, error);
    return "new";
  }
  printOutput(io, status);

  let supplement = "";
  for (;;) {
    const menu = status.state === "awaiting_input" ? RETRY_MENU : REVIEW_MENU;
    const choice = await askChoice(io, menu);
    if (choice === "new" || choice === "quit") return choice;

    try {
      if (choice === "refine") {
        const text = await io.ask("\nDescribe the improvement: ");
        status = await session.refine(text);
        printOutput(io, status);
        continue;
      }

      if (choice === "approve") {
        status = session.approve();
        if (status.isTerminal) {
          io.print("\nCase complete.");
          return "new";
        }
        supplement = acceptsSupplement(status.nextStage)
          ? await io.ask(`\nAdditional information for ${sectionLabel(status.nextStage)} (optional): `)
          : "";
      }

      status = await session.submit(supplement);
      printOutput(io, status);
    } catch (error) {
      report(io, error);
      status = session.status();
    }
  }
}
