import { IsNotEmpty, IsString, Matches, MaxLength } from 'class-validator';
import { QUANTITY_FORMAT_MESSAGE, QUANTITY_PATTERN } from '../common/quantity';

export class CreateTankDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  label!: string;

  // decimal text in the canonical volume unit, e.g. "120.5"
  @IsString()
  @Matches(QUANTITY_PATTERN, { message: `capacity ${QUANTITY_FORMAT_MESSAGE}` })
  capacity!: string;
}
