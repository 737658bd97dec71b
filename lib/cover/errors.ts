export type CoverRequestIssue = {
  path: string;
  message: string;
};

export class InvalidCoverRequestError extends Error {
  readonly code: string = "INVALID_COVER_REQUEST";
  readonly issues: CoverRequestIssue[];

  constructor(issues: CoverRequestIssue[], message = "Cover request is invalid") {
    super(`${message}: ${issues.map((issue) => `${issue.path || "request"} ${issue.message}`).join("; ")}`);
    this.name = "InvalidCoverRequestError";
    this.issues = issues;
  }
}

export class InvalidCoverDimensionsError extends InvalidCoverRequestError {
  override readonly code = "INVALID_DIMENSIONS";

  constructor(issues: CoverRequestIssue[]) {
    super(issues, "Cover dimensions are out of range");
    this.name = "InvalidCoverDimensionsError";
  }
}

export class CoverImageLoadError extends Error {
  readonly code = "COVER_IMAGE_LOAD_FAILED";
  readonly filePath: string;

  constructor(filePath: string, reason: string, options?: { cause?: unknown }) {
    super(`Could not load cover image "${filePath}": ${reason}`, options);
    this.name = "CoverImageLoadError";
    this.filePath = filePath;
  }
}
