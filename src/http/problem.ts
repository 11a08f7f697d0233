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

export type ProblemCode = "INVALID_ARGUMENT" | "UNSUPPORTED_MEDIA_TYPE" | "NOT_FOUND" | "INTERNAL";

export const PROBLEM_CONTENT_TYPE = "application/problem+json";

export function problem(params: { status: number; code: ProblemCode; detail?: string; instance?: string; errors?: FieldError[]; requestId?: string }): Problem {
  const type = `https://errors.phrase-engine.local/${params.code.toLowerCase().replace(/_/g, "-")}`;
  const title = TITLES[params.code];
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

const TITLES: Record<ProblemCode, string> = {
  INVALID_ARGUMENT: "Invalid argument",
  UNSUPPORTED_MEDIA_TYPE: "Unsupported media type",
  NOT_FOUND: "Not found",
  INTERNAL: "Internal error",
};
