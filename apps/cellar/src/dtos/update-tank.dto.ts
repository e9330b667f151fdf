import { IsNotEmpty, IsOptional, IsString, Matches, MaxLength } from 'class-validator';
import { QUANTITY_FORMAT_MESSAGE, QUANTITY_PATTERN } from '../common/quantity';

export class UpdateTankDto {
  @IsString()
  @IsNotEmpty()
  label!: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  newLabel?: string;

  @IsOptional()
  @IsString()
  @Matches(QUANTITY_PATTERN, { message: `newCapacity ${QUANTITY_FORMAT_MESSAGE}` })
  newCapacity?: string;
}
