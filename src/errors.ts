export type ExecutionRejectionKind = "write" | "no_rows";

/** Raised by the executor when a statement prepares fine but must not be run. */
export class ExecutionRejectedError extends Error {
  kind: ExecutionRejectionKind;

  constructor(message: string, opts: { kind: ExecutionRejectionKind }) {
    super(message);
    this.name = "ExecutionRejectedError";
    this.kind = opts.kind;
  }
}

export class SceneNotFoundError extends Error {
  sceneId: number;

  constructor(sceneId: number) {
    super(`Scene ${sceneId} not found.`);
    this.name = "SceneNotFoundError";
    this.sceneId = sceneId;
  }
}

/** A submission that parsed but cannot be processed as given. */
export class InvalidSubmissionError extends Error {
  field: string;

  constructor(field: string, message: string) {
    super(message);
    this.name = "InvalidSubmissionError";
    this.field = field;
  }
}

export class SuggestionUnavailableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SuggestionUnavailableError";
  }
}
