/**
 * Error carrying an HTTP status and a machine-readable code.
 * The error handler middleware uses both when rendering the response.
 */
export class ServiceError extends Error {
  readonly statusCode: number;
  readonly code: string;

  constructor(message: string, statusCode: number, code: string) {
    super(message);
    this.name = "ServiceError";
    this.statusCode = statusCode;
    this.code = code;
  }
}
