import pino, { type DestinationStream, type LevelWithSilent, type Logger } from "pino";

export function createLogger(
  level: LevelWithSilent,
  name = "causal-case-workflow",
  destination?: DestinationStream
): Logger {
  return destination ? pino({ name, level }, destination) : pino({ name, level });
}

export const silentLogger: Logger = pino({ level: "silent" });
