type ErrorWithCode = Error & { code?: unknown };
const MAX_ERROR_STACK_LENGTH = 4 * 1024;
const MAX_NESTED_ERRORS = 20;

export type StructuredError = {
  type: "error" | "non_error";
  name?: string;
  message: string;
  code?: string;
  stack?: string;
  details?: unknown;
  /** Members of an AggregateError, serialized without stacks. */
  errors?: StructuredError[];
};

export function toJsonSafe(value: unknown): unknown {
  try {
    return JSON.parse(
      JSON.stringify(value, (_key, current) => (typeof current === "bigint" ? current.toString() : current)),
    );
  } catch {
    return String(value);
  }
}

function truncateErrorStack(stack: string | undefined): string | undefined {
  if (!stack || stack.length <= MAX_ERROR_STACK_LENGTH) {
    return stack;
  }

  const omittedChars = stack.length - MAX_ERROR_STACK_LENGTH;
  return `${stack.slice(0, MAX_ERROR_STACK_LENGTH)}... [truncated ${omittedChars} chars]`;
}

function readCode(error: ErrorWithCode): string | undefined {
  const rawCode = error.code;
  const stringCode = rawCode === null || rawCode === undefined ? undefined : String(rawCode);
  return stringCode && stringCode.length > 0 ? stringCode : undefined;
}

/**
 * Serializes unknown error values into structured JSON-friendly fields.
 * AggregateError members are expanded one level deep, capped at 20 entries.
 */
export function toStructuredError(error: unknown, includeStack = true): StructuredError {
  return serializeError(error, includeStack, true);
}

function serializeError(error: unknown, includeStack: boolean, expandMembers: boolean): StructuredError {
  if (error instanceof Error) {
    const structured: StructuredError = {
      type: "error",
      name: error.name,
      message: error.message,
      code: readCode(error),
      stack: includeStack ? truncateErrorStack(error.stack) : undefined,
    };

    if (error instanceof AggregateError && expandMembers) {
      const members: unknown[] = Array.isArray(error.errors) ? error.errors : [];
      structured.errors = members.slice(0, MAX_NESTED_ERRORS).map((member) => serializeError(member, false, false));
    }

    return structured;
  }

  if (typeof error === "string") {
    return {
      type: "non_error",
      message: error,
    };
  }

  return {
    type: "non_error",
    message: "Non-Error thrown",
    details: toJsonSafe(error),
  };
}
