import { BadRequestException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { DiagnosticsController } from './diagnostics.controller';
import { DiagnosticsService } from './diagnostics.service';

describe('DiagnosticsController', () => {
  let controller: DiagnosticsController;
  let mockDiagnosticsService: { answer: jest.Mock };

  beforeEach(async () => {
    mockDiagnosticsService = {
      answer: jest.fn().mockResolvedValue({
        summary: 'ok',
        data: null,
        chart_type: null,
        columns: null,
      }),
    };

    const module: TestingModule = await Test.createTestingModule({
      controllers: [DiagnosticsController],
      providers: [
        { provide: DiagnosticsService, useValue: mockDiagnosticsService },
      ],
    }).compile();

    controller = module.get<DiagnosticsController>(DiagnosticsController);
  });

  it('should pass a validated query to the service', async () => {
    await controller.query({ kind: 'rmse_above', threshold: 2.5 });

    expect(mockDiagnosticsService.answer).toHaveBeenCalledWith({
      kind: 'rmse_above',
      threshold: 2.5,
    });
  });

  it('should reject an invalid body before reaching the service', async () => {
    await expect(controller.query({ kind: 'site_metrics' })).rejects.toThrow(
      BadRequestException,
    );
    expect(mockDiagnosticsService.answer).not.toHaveBeenCalled();
  });
});
