import { NextResponse } from "next/server";

import type { ErrorResponse } from "@/lib/analysis-types";

export class ApiError extends Error {
  readonly status: number;
  readonly headers: Record<string, string>;

  constructor(
    status: number,
    message: string,
    options: { cause?: unknown; headers?: Record<string, string> } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = "ApiError";
    this.status = status;
    this.headers = options.headers ?? {};
  }
}

const describeError = (error: unknown) => {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === "string" ? error : null;
};

const detailFor = (error: unknown) => {
  if (error instanceof ApiError) {
    return describeError(error.cause) ?? error.message;
  }
  return describeError(error);
};

export const buildErrorBody = (
  status: number,
  message: string,
  detail: string | null
): ErrorResponse => ({
  error: message,
  detail,
  status_code: status,
});

export const toErrorResponse = (error: unknown, { debug }: { debug: boolean }) => {
  const status = error instanceof ApiError ? error.status : 500;
  const message = error instanceof ApiError ? error.message : "Internal server error";
  const detail = debug ? detailFor(error) : null;

  if (status >= 500) {
    console.error("[api-error]", JSON.stringify({ status, message, detail: detailFor(error) }));
  } else {
    console.warn("[api-error]", JSON.stringify({ status, message }));
  }

  return NextResponse.json(buildErrorBody(status, message, detail), {
    status,
    headers: error instanceof ApiError ? error.headers : undefined,
  });
};

export const notFoundResponse = () =>
  NextResponse.json(buildErrorBody(404, "Not found", null), { status: 404 });
