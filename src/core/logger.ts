import pino, { type Logger, type LevelWithSilent } from "pino";

const loggers = new Set<Logger>();

// Every module logger writes here; addLogFile() attaches more destinations.
const destinations = pino.multistream([{ level: "trace", stream: process.stdout }]);

function defaultLevel(): string {
  return process.env["LOG_LEVEL"] ?? "info";
}

/** Named module logger. Every logger created here follows {@link setLogLevel}. */
export function createLogger(name: string): Logger {
  const logger = pino({ name, level: defaultLevel() }, destinations);
  loggers.add(logger);
  return logger;
}

export function setLogLevel(level: LevelWithSilent): void {
  for (const logger of loggers) {
    logger.level = level;
  }
}

/** Also append every log line to `filepath`, creating its directory. */
export function addLogFile(filepath: string): void {
  destinations.add({
    level: "trace",
    stream: pino.destination({ dest: filepath, mkdir: true, sync: true }),
  });
}
