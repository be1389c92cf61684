import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus, Logger } from "@nestjs/common";
import * as Sentry from "@sentry/node";
import { FastifyReply } from "fastify";
import { AppError, ErrorEnvelope } from "./errors";

export interface AppExceptionFilterOptions {
  exposeErrorDetails: boolean;
  reportToSentry: boolean;
}

@Catch()
export class AppExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(AppExceptionFilter.name);

  constructor(private readonly options: AppExceptionFilterOptions) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    const reply = host.switchToHttp().getResponse<FastifyReply>();
    const envelope = this.toEnvelope(exception);
    if (reply.sent) return;
    void reply.status(envelope.statusCode).send(envelope);
  }

  toEnvelope(exception: unknown): ErrorEnvelope {
    if (exception instanceof AppError) {
      return {
        status: "error",
        message: exception.message,
        statusCode: exception.getStatus(),
        code: exception.code,
        ...(exception.details === undefined ? {} : { details: exception.details }),
      };
    }

    if (exception instanceof HttpException) {
      return {
        status: "error",
        message: this.httpMessage(exception),
        statusCode: exception.getStatus(),
      };
    }

    const error = exception instanceof Error ? exception : new Error(String(exception));
    this.logger.error(`Unhandled error: ${error.message}`, error.stack);
    if (this.options.reportToSentry) Sentry.captureException(error);
    return {
      status: "error",
      message: "Internal server error",
      statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      code: "INTERNAL_ERROR",
      ...(this.options.exposeErrorDetails ? { details: error.message } : {}),
    };
  }

  private httpMessage(exception: HttpException): string {
    const response = exception.getResponse();
    if (typeof response === "string") return response;
    if (typeof response === "object" && response !== null && "message" in response) {
      const message = response.message;
      if (Array.isArray(message)) return message.map(String).join(", ");
      if (typeof message === "string") return message;
    }
    return exception.message;
  }
}
