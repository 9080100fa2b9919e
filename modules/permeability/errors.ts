export class ShapeError extends Error {
  constructor(
    message: string,
    public readonly expected?: number,
    public readonly actual?: number,
  ) {
    super(message);
    this.name = "ShapeError";
  }
}

export class DomainError extends Error {
  constructor(
    message: string,
    public readonly values: readonly number[] = [],
  ) {
    super(message);
    this.name = "DomainError";
  }
}
