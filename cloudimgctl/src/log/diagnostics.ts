export type Diagnostic = {
  level: "error" | "warn" | "info";
  code: string;
  message: string;
  details?: Record<string, unknown>;
};

export type OutputFormat = "human" | "jsonl";

export interface Logger {
  log(d: Diagnostic): void;
}

export function diag(
  level: Diagnostic["level"],
  code: string,
  message: string,
  details?: Record<string, unknown>,
): Diagnostic {
  return details ? { level, code, message, details } : { level, code, message };
}

type Sink = { write(chunk: string): unknown };

/**
 * Render diagnostics as JSON lines on stdout, or as plain text with
 * info on stdout and warn/error on stderr.
 */
export function createLogger(
  format: OutputFormat,
  streams: { stdout: Sink; stderr: Sink } = { stdout: process.stdout, stderr: process.stderr },
): Logger {
  return {
    log(d: Diagnostic): void {
      if (format === "jsonl") {
        streams.stdout.write(JSON.stringify(d) + "\n");
        return;
      }
      const line = d.level === "info" ? d.message : `${d.level}: ${d.message}`;
      (d.level === "info" ? streams.stdout : streams.stderr).write(line + "\n");
    },
  };
}

export const silentLogger: Logger = {
  log(): void {},
};
