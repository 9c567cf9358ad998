import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus } from "@nestjs/common";
import type { Response } from "express";
import { ZodError } from "zod";

export type ValidationErrorBody = {
  statusCode: number;
  message: string;
  issues: Array<{ path: string; message: string }>;
};

export function toValidationErrorBody(error: ZodError): ValidationErrorBody {
  return {
    statusCode: HttpStatus.BAD_REQUEST,
    message: "Validation failed",
    issues: error.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message
    }))
  };
}

@Catch(ZodError)
export class ZodExceptionFilter implements ExceptionFilter<ZodError> {
  catch(error: ZodError, host: ArgumentsHost): void {
    const res = host.switchToHttp().getResponse<Response>();
    res.status(HttpStatus.BAD_REQUEST).json(toValidationErrorBody(error));
  }
}
