#!/usr/bin/env node
/**
 * Interactive console for one patient case.
 *
 * Reads the case, shows the extracted factors, then walks the pipeline one
 * stage at a time. Each stage output waits for Approve, Refine, New case or
 * Quit, as in the HTTP approval mode. A stage that fails to generate offers
 * Retry instead.
 *
 * Usage:
 *   npm run console
 *   npm run console -- --case-file case.txt
 *   npm run console -- --verbose
 */

import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { createInterface } from "node:readline/promises";
import { parseArgs } from "node:util";
import pino from "pino";

import { env } from "../env";
import { createLogger } from "../libs/logger";
import { createGatewayFromEnv } from "../libs/openai";
import { CaseSession } from "../services/case-sessions";
import { readCaseText, runCase, type ConsoleIO } from "./case-loop";

const HELP = `Usage: case-console [--case-file <path>] [--verbose]

Options:
  --case-file <path>  Read the case details from a file instead of the prompt
  --verbose           Log stage events to stderr
  -h, --help          Show help`;

function print(text = "") {
  process.stdout.write(`${text}\n`);
}

async function main(): Promise<number> {
  const { values } = parseArgs({
    options: {
      "case-file": { type: "string" },
      verbose: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false }
    }
  });

  if (values.help) {
    print(HELP);
    return 0;
  }

  const logger = createLogger(values.verbose ? "debug" : "warn", "case-console", pino.destination(2));
  const gateway = createGatewayFromEnv(env);
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  const io: ConsoleIO = { ask: (question) => rl.question(question), print };

  print("Medical Case Analysis Console");
  print("=============================");

  try {
    let caseText = values["case-file"] ? readFileSync(resolve(values["case-file"]), "utf8") : "";
    for (;;) {
      if (!caseText.trim()) {
        caseText = await readCaseText(io);
        if (!caseText.trim()) return 0;
      }
      const session = new CaseSession({
        mode: "approval",
        gateway,
        timeoutMs: env.GENERATION_TIMEOUT_MS,
        logger
      });
      const next = await runCase(session, io, caseText);
      if (next === "quit") return 0;
      caseText = "";
    }
  } finally {
    rl.close();
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
    process.exitCode = 1;
  }
);
