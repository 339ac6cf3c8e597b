import {
    ExceptionFilter,
    Catch,
    ArgumentsHost,
    HttpException,
    HttpStatus,
    Logger,
  } from '@nestjs/common';
  import { Response } from 'express';

  export interface ErrorResponse {
    msg: string;
    error: {
      status: number;
      message: string | string[];
      errors?: Record<string, string[]>;
    };
  }

  @Catch()
  export class GlobalHttpExceptionFilter implements ExceptionFilter {
    private readonly logger = new Logger(GlobalHttpExceptionFilter.name);

    catch(exception: unknown, host: ArgumentsHost) {
      const ctx = host.switchToHttp();
      const response = ctx.getResponse<Response>();

      const errorResponse: ErrorResponse = {
        msg: 'Error',
        error: toErrorBody(exception),
      };

      if (errorResponse.error.status >= HttpStatus.INTERNAL_SERVER_ERROR) {
        this.logger.error(
          exception instanceof Error ? exception.message : String(exception),
          exception instanceof Error ? exception.stack : undefined,
        );
      }

      response.status(errorResponse.error.status).json(errorResponse);
    }
  }

  function toErrorBody(exception: unknown): ErrorResponse['error'] {
    if (!(exception instanceof HttpException)) {
      return {
        status: HttpStatus.INTERNAL_SERVER_ERROR,
        message: 'Internal server error',
      };
    }

    const status = exception.getStatus();
    const res = exception.getResponse();
    if (typeof res === 'string') {
      return { status, message: res };
    }

    const message = 'message' in res && (typeof res.message === 'string' || isStringList(res.message))
      ? res.message
      : exception.message;

    return 'errors' in res && isFieldErrors(res.errors)
      ? { status, message, errors: res.errors }
      : { status, message };
  }

  function isStringList(value: unknown): value is string[] {
    return Array.isArray(value) && value.every((item) => typeof item === 'string');
  }

  function isFieldErrors(value: unknown): value is Record<string, string[]> {
    return typeof value === 'object' && value !== null && !Array.isArray(value)
      && Object.values(value).every(isStringList);
  }
