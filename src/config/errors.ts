export class ConfigValidationError extends Error {
  constructor(
    public readonly variable: string,
    public readonly reason: string
  ) {
    super(`${variable}: ${reason}`);
    this.name = 'ConfigValidationError';
  }
}
