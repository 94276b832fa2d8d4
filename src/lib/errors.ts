export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === "string") {
    return error;
  }

  return "Unknown error";
}

export class UpstreamSchemaError extends Error {
  constructor(
    readonly city: string,
    readonly issues: string[]
  ) {
    super(`Museum data for "${city}" is malformed: ${issues.join("; ")}`);
    this.name = "UpstreamSchemaError";
  }
}

export class InvalidJsonBodyError extends Error {
  constructor() {
    super("Request body must be valid JSON.");
    this.name = "InvalidJsonBodyError";
  }
}
