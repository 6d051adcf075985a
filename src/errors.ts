export type ErrorDetails = Record<string, string | number | string[] | undefined>;

export abstract class AppError extends Error {
  public readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.code = code;
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  protected details(): ErrorDetails {
    return {};
  }

  toJSON(): { code: string; message: string } & ErrorDetails {
    return { code: this.code, message: this.message, ...this.details() };
  }
}

export class ValidationError extends AppError {
  constructor(message: string, public readonly field?: string) {
    super(message, "VALIDATION_ERROR");
  }

  protected details(): ErrorDetails {
    return { field: this.field };
  }
}

export class ConfigurationError extends AppError {
  constructor(public readonly missing: string[]) {
    super(`Missing configuration: ${missing.join(", ")}`, "CONFIGURATION_ERROR");
  }

  protected details(): ErrorDetails {
    return { missing: this.missing };
  }
}

export class UpstreamError extends AppError {
  constructor(
    public readonly service: string,
    message: string,
    public readonly status?: number,
  ) {
    super(`${service}: ${message}`, "UPSTREAM_ERROR");
  }

  protected details(): ErrorDetails {
    return { service: this.service, status: this.status };
  }
}

export class FetchError extends AppError {
  constructor(
    public readonly url: string,
    message: string,
    public readonly status?: number,
  ) {
    super(message, "FETCH_ERROR");
  }

  protected details(): ErrorDetails {
    return { url: this.url, status: this.status };
  }
}
