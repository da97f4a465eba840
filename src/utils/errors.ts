export class AppError extends Error {
  public readonly status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = new.target.name;
    this.status = status;
  }
}

/** Bad or missing user input. */
export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

/** Operation invoked out of order, e.g. a plan before the profile. */
export class StateError extends AppError {
  constructor(message = "Please submit your information first") {
    super(message, 409);
  }
}

/**
 * External API failure. `message` is shown to the user; `detail` is only
 * logged.
 */
export class UpstreamError extends AppError {
  public readonly service: string;
  public readonly detail: string;

  constructor(service: string, detail: string) {
    super(
      "The nutrition or AI service is unavailable. Please try again.",
      502
    );
    this.service = service;
    this.detail = detail;
  }
}
