export class RuleParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RuleParseError";
  }
}

export class ConversionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConversionError";
  }
}

export class AllowlistClipperError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AllowlistClipperError";
  }
}
