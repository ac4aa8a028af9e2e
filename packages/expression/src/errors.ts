export class ExpressionError extends Error {
  constructor(
    message: string,
    public readonly expression?: string
  ) {
    super(expression === undefined ? message : `${message} in "${expression}"`);
    this.name = 'ExpressionError';
  }
}
