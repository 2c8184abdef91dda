interface BaseErrorParams<T extends string> {
  name: T;
  id: number;
  message: string;
  httpStatusCode: number;
}

export abstract class BaseError<T extends string = string> extends Error {
  declare name: T;

  public id: number;

  public httpStatusCode: number;

  constructor({ name, id, message, httpStatusCode }: BaseErrorParams<T>) {
    super(message || name || "Error");
    this.name = name;
    this.id = id;
    this.message = message;
    this.httpStatusCode = httpStatusCode;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toString() {
    return `Error ${this.id} (${this.name}): ${this.message}\n\n${this.stack}`;
  }

  toJson() {
    return {
      error: true,
      name: this.name,
      id: this.id,
      message: this.message,
    };
  }
}

export class InternalServerError extends BaseError<"InternalServerError"> {
  constructor({
    message,
  }: { message?: string } = {}) {
    super({
      name: "InternalServerError",
      id: 100,
      message:
        message ||
        "An internal server error occurred. Please try again or contact support.",
      httpStatusCode: 500,
    });
  }
}

export class NotFoundError extends BaseError<"NotFoundError"> {
  constructor({ endpointName }: { endpointName: string }) {
    super({
      name: "NotFoundError",
      id: 103,
      message: `${endpointName} is not a valid URL.`,
      httpStatusCode: 404,
    });
  }
}

export class ValidationError extends BaseError<"ValidationError"> {
  constructor({ message }: { message: string }) {
    super({
      name: "ValidationError",
      id: 104,
      message,
      httpStatusCode: 400,
    });
  }
}

export class InvalidInputError extends BaseError<"InvalidInputError"> {
  constructor({ message }: { message?: string } = {}) {
    super({
      name: "InvalidInputError",
      id: 105,
      message: message || "No valid numeric input was provided.",
      httpStatusCode: 400,
    });
  }
}

export class RequestError extends BaseError<"RequestError"> {
  constructor({
    message,
    httpStatusCode = 400,
  }: { message: string; httpStatusCode?: number }) {
    super({
      name: "RequestError",
      id: 106,
      message,
      httpStatusCode,
    });
  }
}
