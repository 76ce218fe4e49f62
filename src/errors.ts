export class MarkupParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MarkupParseError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
