// Error taxonomy for schema derivation

import type { KeyRef, ParityReport } from "./model.js";
import { keyRefId } from "./model.js";

export class SchemaError extends Error {
  /**
   * @param message error message
   * @param cause source error (if any)
   * @param meta additional metadata (if any)
   */
  public constructor(
    message: string,
    public override readonly cause?: unknown,
    public readonly meta: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
    if (cause instanceof Error) {
      this.stack += `\nCaused by: ${cause.stack}`;
    }
  }
}

/** A raw release document or the curated baseline cannot be obtained. */
export class InputUnavailable extends SchemaError {}

/** The diff and the curated base do not describe the same release or format. */
export class VersionMismatch extends SchemaError {
  public constructor(message: string, expected: string, found: string) {
    super(message, undefined, { expected, found });
  }
}

export class PostconditionViolation extends SchemaError {
  public constructor(
    message: string,
    public readonly report: ParityReport
  ) {
    super(`${message}\n${formatParityReport(report)}`, undefined, { report });
  }
}

export class SerializationWriteFailure extends SchemaError {
  public constructor(
    public readonly path: string,
    cause: unknown
  ) {
    super(
      `Failed to write ${path}: ${cause instanceof Error ? cause.message : String(cause)}`,
      cause,
      { path }
    );
  }
}

export class SchemaParseError extends SchemaError {}

export class ConfigError extends SchemaError {}

function refs(list: KeyRef[]): string {
  return list.map(keyRefId).join(", ");
}

export function formatParityReport(report: ParityReport): string {
  const lines: string[] = [];
  if (report.missing_sections.length > 0)
    lines.push(`  missing sections: ${report.missing_sections.join(", ")}`);
  if (report.extra_sections.length > 0)
    lines.push(`  unexpected sections: ${report.extra_sections.join(", ")}`);
  if (report.missing_keys.length > 0)
    lines.push(`  missing keys: ${refs(report.missing_keys)}`);
  if (report.extra_keys.length > 0)
    lines.push(`  unexpected keys: ${refs(report.extra_keys)}`);
  return lines.join("\n");
}
