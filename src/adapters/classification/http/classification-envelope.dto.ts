import { IsNumber, IsOptional, IsString, ValidateIf } from 'class-validator';
import { Type } from 'class-transformer';

export const SUCCESS_ENVELOPE_STATUS = 'success';

/**
 * Response body of the classification service
 *
 * Only a success envelope has to carry a numeric data field.
 */
export class ClassificationEnvelopeDto {
  @IsString()
  status!: string;

  @ValidateIf((o: ClassificationEnvelopeDto) => o.status === SUCCESS_ENVELOPE_STATUS)
  @IsOptional()
  @Type(() => Number)
  @IsNumber({ allowNaN: false, allowInfinity: false })
  data?: number | null;
}
