import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  ConflictException,
  Logger,
} from '@nestjs/common';
import { FastifyReply, FastifyRequest } from 'fastify';

/**
 * Keeps the structured body of scheduling conflicts (conflicts and
 * alternative slots) intact on the wire.
 */
@Catch(ConflictException)
export class ConflictExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(ConflictExceptionFilter.name);

  catch(exception: ConflictException, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<FastifyReply>();
    const request = ctx.getRequest<FastifyRequest>();
    const status = exception.getStatus();
    const exceptionResponse = exception.getResponse();

    const body =
      typeof exceptionResponse === 'string'
        ? {
            statusCode: status,
            error: 'scheduling_conflict',
            message: exceptionResponse,
            conflicts: [],
            alternatives: [],
          }
        : { statusCode: status, ...exceptionResponse };

    this.logger.warn(`${request.method} ${request.url} rejected: ${exception.message}`);
    void response.status(status).send(body);
  }
}
