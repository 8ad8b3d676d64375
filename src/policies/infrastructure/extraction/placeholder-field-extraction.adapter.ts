import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  ExtractionRequest,
  ExtractionResult,
  FieldExtractionServicePort,
} from '../../domain/ports/field-extraction.service.port';
import { AllConfigType } from '../../../config/config.type';

/**
 * Stand-in for the extraction pipeline.
 *
 * Returns a single fixed field so ingestion can be exercised end to end
 * without a model. Swap for a real adapter behind FieldExtractionServicePort.
 */
@Injectable()
export class PlaceholderFieldExtractionAdapter
  implements FieldExtractionServicePort
{
  private readonly logger = new Logger(PlaceholderFieldExtractionAdapter.name);

  constructor(private readonly configService: ConfigService<AllConfigType>) {}

  async extractFields(request: ExtractionRequest): Promise<ExtractionResult> {
    const modelVersion = this.configService.getOrThrow(
      'policies.extractionModelVersion',
      { infer: true },
    );

    this.logger.debug(
      `[EXTRACT] tenantId=${request.tenantId}, bytes=${request.document.length}, model=${modelVersion}`,
    );

    return {
      fields: [
        {
          name: 'example_field',
          value: 'This is a placeholder',
          confidence: 0.95,
          sourcePage: 1,
          citation: 'Sample citation',
          modelVersion,
        },
      ],
      pageCount: 1,
    };
  }
}
