import pino from "pino";

let _logger: pino.Logger | null = null;

export function getLogger(): pino.Logger {
  if (_logger) return _logger;
  // Reports go to stdout, so logs stay on stderr.
  _logger = pino(
    {
      name: "codereview",
      level: process.env.LOG_LEVEL ?? "info",
    },
    pino.destination(2)
  );
  return _logger;
}

export function createChildLogger(
  bindings: Record<string, unknown>
): pino.Logger {
  return getLogger().child(bindings);
}
