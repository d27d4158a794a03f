export interface FieldError {
  path: string;
  message: string;
}

export type ProblemCode = "INVALID_ARGUMENT" | "UNPROCESSABLE_ENTITY";

export interface Problem {
  type: string;
  title: string;
  code: ProblemCode;
  detail?: string;
  errors?: FieldError[];
}

export function problem(params: { code: ProblemCode; detail?: string; errors?: FieldError[] }): Problem {
  const type = `https://errors.fp-growth.local/${params.code.toLowerCase().replace(/_/g, "-")}`;
  return {
    type,
    title: codeToTitle(params.code),
    code: params.code,
    detail: params.detail,
    errors: params.errors,
  };
}

function codeToTitle(code: ProblemCode): string {
  switch (code) {
    case "INVALID_ARGUMENT":
      return "Invalid argument";
    case "UNPROCESSABLE_ENTITY":
      return "Unprocessable entity";
  }
}

/** Thrown by the public entry points when caller input is rejected. */
export class MiningError extends Error {
  readonly problem: Problem;

  constructor(p: Problem) {
    const fields = p.errors?.map((e) => `${e.path} ${e.message}`).join("; ");
    super(fields ? `${p.detail ?? p.title}: ${fields}` : p.detail ?? p.title);
    this.name = "MiningError";
    this.problem = p;
  }

  get code(): ProblemCode {
    return this.problem.code;
  }

  get errors(): FieldError[] {
    return this.problem.errors ?? [];
  }
}
