import { ZodError } from "zod";

export type HttpErrorCode =
  | "bad_request"
  | "not_found"
  | "conflict"
  | "method_not_allowed"
  | "payload_too_large"
  | "internal";

interface HttpErrorOptions {
  status: number;
  code: HttpErrorCode;
  message: string;
  detail?: string;
}

export class HttpError extends Error {
  readonly status: number;
  readonly code: HttpErrorCode;
  readonly detail?: string;

  constructor(options: HttpErrorOptions) {
    super(options.message);
    this.name = "HttpError";
    this.status = options.status;
    this.code = options.code;
    this.detail = options.detail;
  }
}

export function badRequest(message: string, detail?: string): HttpError {
  return new HttpError({ status: 400, code: "bad_request", message, detail });
}

export function notFound(message: string): HttpError {
  return new HttpError({ status: 404, code: "not_found", message });
}

export function conflict(message: string): HttpError {
  return new HttpError({ status: 409, code: "conflict", message });
}

export function formatZodIssues(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join(".");
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join("; ");
}

export function toHttpError(error: unknown): HttpError {
  if (error instanceof HttpError) {
    return error;
  }

  if (error instanceof ZodError) {
    return badRequest("Invalid request", formatZodIssues(error));
  }

  return new HttpError({
    status: 500,
    code: "internal",
    message: "Internal server error",
    detail: error instanceof Error ? error.message : String(error),
  });
}

/** Body sent to clients; internal details stay in the log. */
export function renderHttpError(error: HttpError): { error: { code: HttpErrorCode; message: string; detail?: string } } {
  if (error.status >= 500) {
    return { error: { code: error.code, message: error.message } };
  }
  return {
    error: {
      code: error.code,
      message: error.message,
      ...(error.detail ? { detail: error.detail } : {}),
    },
  };
}
