import { IsNotEmpty, IsString } from 'class-validator';

export class TankLabelDto {
  @IsString()
  @IsNotEmpty()
  label!: string;
}
