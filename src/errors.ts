import type { StageName } from "./stage/run_stage.js";

export class UsageError extends Error {
  override name = "UsageError";
}

export class ToolNotFoundError extends Error {
  override name = "ToolNotFoundError";

  constructor(
    readonly tool: string,
    readonly searched: string[],
    detail?: string
  ) {
    super(
      detail ??
        `${tool} not found. Searched: ${searched.length > 0 ? searched.join(", ") : "(nothing)"}`
    );
  }
}

export class DirectoryCreationError extends Error {
  override name = "DirectoryCreationError";

  constructor(
    readonly path: string,
    cause: unknown
  ) {
    super(`Could not create ${path}: ${describeError(cause)}`, { cause });
  }
}

export class StageFailureError extends Error {
  override name = "StageFailureError";

  constructor(
    readonly stage: StageName,
    message: string,
    readonly exitCode: number | null = null
  ) {
    super(message);
  }
}

// Extraction can exit 0 and still leave nothing behind.
export class NoOutputProducedError extends StageFailureError {
  override name = "NoOutputProducedError";

  constructor(dir: string, detail?: string) {
    super("extract", detail ?? `no frames were written to ${dir}`, 0);
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
