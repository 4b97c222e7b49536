import {
  BadRequestException,
  HttpException,
  InternalServerErrorException,
  NotFoundException,
  type ValidationError,
} from "@nestjs/common";
import { errorMessage, InvalidRequestError, PinNotFoundError } from "../common/errors.js";

export type PinsvcErrorReason = "BAD_REQUEST" | "NOT_FOUND" | "INTERNAL_SERVER_ERROR";

/** Error body of the Pinning Services API. */
export interface PinsvcErrorBody {
  error: {
    reason: PinsvcErrorReason;
    details: string;
  };
}

export function pinsvcErrorBody(reason: PinsvcErrorReason, details: string): PinsvcErrorBody {
  return { error: { reason, details } };
}

function flattenConstraints(errors: ValidationError[]): string[] {
  const messages: string[] = [];
  for (const error of errors) {
    if (error.constraints) {
      messages.push(...Object.values(error.constraints));
    }
    if (error.children?.length) {
      messages.push(...flattenConstraints(error.children));
    }
  }
  return messages;
}

/** `exceptionFactory` for body validation: every failed constraint, joined into one error body. */
export function validationExceptionFactory(errors: ValidationError[]): BadRequestException {
  return new BadRequestException(pinsvcErrorBody("BAD_REQUEST", flattenConstraints(errors).join("; ")));
}

/**
 * Maps a service failure to the HTTP response the client sees.
 * Cluster failures are not classified further: they all surface as 500 with the remote message.
 */
export function toHttpException(error: unknown): HttpException {
  if (error instanceof HttpException) {
    return error;
  }
  if (error instanceof InvalidRequestError) {
    return new BadRequestException(pinsvcErrorBody("BAD_REQUEST", error.message), { cause: error });
  }
  if (error instanceof PinNotFoundError) {
    return new NotFoundException(pinsvcErrorBody("NOT_FOUND", error.message), { cause: error });
  }
  return new InternalServerErrorException(pinsvcErrorBody("INTERNAL_SERVER_ERROR", errorMessage(error)), {
    cause: error,
  });
}
