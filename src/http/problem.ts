import { isIndexError } from "../core/errors.js";

export interface FieldError {
  path: string;
  message: string;
}

export interface Problem {
  type: string;
  title: string;
  status: number;
  detail?: string;
  instance?: string;
  code?: string;
  requestId?: string;
  errors?: FieldError[];
}

export const PROBLEM_CONTENT_TYPE = "application/problem+json";

export function problem(params: Omit<Problem, "type" | "title"> & { code: string }): Problem {
  const type = `https://errors.text-index.local/${params.code.toLowerCase().replace(/_/g, "-")}`;
  const title = codeToTitle(params.code);
  return {
    type,
    title,
    status: params.status,
    detail: params.detail,
    instance: params.instance,
    code: params.code,
    requestId: params.requestId,
    errors: params.errors,
  };
}

/** Maps a thrown value to a problem; anything that is not an IndexError is a 500. */
export function problemFromError(e: unknown, instance: string, requestId: string): Problem {
  if (isIndexError(e)) {
    const status = e.code === "NOT_FOUND" ? 404 : 400;
    return problem({ status, code: e.code, detail: e.message, instance, requestId });
  }
  return problem({ status: 500, code: "INTERNAL", detail: "internal error", instance, requestId });
}

function codeToTitle(code: string): string {
  switch (code) {
    case "INVALID_ARGUMENT":
      return "Invalid argument";
    case "INVALID_INPUT":
      return "Invalid input";
    case "UNSUPPORTED_MEDIA_TYPE":
      return "Unsupported media type";
    case "NOT_FOUND":
      return "Not found";
    default:
      return "Internal error";
  }
}
