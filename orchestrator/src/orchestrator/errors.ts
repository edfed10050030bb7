export class MalformedItemError extends Error {
  constructor(
    public readonly itemId: string,
    public readonly source: string,
    public readonly reason: string,
  ) {
    super(`Malformed item ${source}:${itemId || "<no id>"}: ${reason}`);
    this.name = "MalformedItemError";
  }
}

export class KeywordSetError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "KeywordSetError";
  }
}
