export class ValidationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(issues.join("; "));
    this.name = "ValidationError";
    this.issues = issues;
  }
}

export class DuplicateKeyError extends Error {
  readonly key: string;

  constructor(key: string, message: string) {
    super(message);
    this.name = "DuplicateKeyError";
    this.key = key;
  }
}
