import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';
import { ContractViolationError } from './analytics.errors';

/**
 * Maps engine contract violations to 400 responses.
 */
@Catch(ContractViolationError)
export class ContractViolationFilter implements ExceptionFilter {
  private readonly logger = new Logger(ContractViolationFilter.name);

  catch(exception: ContractViolationError, host: ArgumentsHost): void {
    this.logger.warn(exception.message);
    const response = host.switchToHttp().getResponse<Response>();
    response.status(HttpStatus.BAD_REQUEST).json({
      statusCode: HttpStatus.BAD_REQUEST,
      error: 'ContractViolation',
      message: exception.message,
      operation: exception.operation,
    });
  }
}
