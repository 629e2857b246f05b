import type { OperationKind } from "./NasTypes.js";

export class FeaturesFlowError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class MalformedGraphError extends FeaturesFlowError {}

export class UnsupportedNodeError extends FeaturesFlowError {
  constructor(
    readonly nodeId: string,
    readonly kind: OperationKind,
    readonly target: string,
    detail?: string,
  ) {
    super(
      `Unsupported node ${nodeId} (op: ${kind}, target: ${target})` +
        (detail ? `: ${detail}` : ""),
    );
  }
}

export class InvalidReshapeError extends FeaturesFlowError {}

export class MissingShapeError extends FeaturesFlowError {
  constructor(readonly nodeId: string, detail: string) {
    super(`Missing shape for node ${nodeId}: ${detail}`);
  }
}
