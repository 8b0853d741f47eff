import { Body, Controller, HttpCode, Logger, Post } from '@nestjs/common';
import { DiagnosticsService } from './diagnostics.service';
import { parseOrThrow } from '../common/query-validation';
import {
  DiagnosticResponse,
  diagnosticQuerySchema,
} from './dto/diagnostic-query.dto';

/**
 * DiagnosticsController
 *
 * POST /api/query answers one structured diagnostic question.
 *
 * @example
 * POST /api/query
 * { "kind": "underperforming_sites", "limit": 3 }
 */
@Controller('api')
export class DiagnosticsController {
  private readonly logger = new Logger(DiagnosticsController.name);

  constructor(private readonly diagnosticsService: DiagnosticsService) {}

  @Post('query')
  @HttpCode(200)
  async query(@Body() body: unknown): Promise<DiagnosticResponse> {
    this.logger.log(`POST /api/query: ${JSON.stringify(body)}`);
    const query = parseOrThrow(diagnosticQuerySchema, body);
    return this.diagnosticsService.answer(query);
  }
}
