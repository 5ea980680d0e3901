import {
  IsBoolean,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
} from 'class-validator';

export class MessageDto {
  @IsString()
  @IsNotEmpty({ message: 'userId is required.' })
  userId!: string;

  @IsString()
  @IsNotEmpty({ message: 'Say something for me to record.' })
  @MaxLength(2000)
  text!: string;
}

export class CancelDto {
  @IsString()
  @IsNotEmpty({ message: 'userId is required.' })
  userId!: string;

  // Also drop the records waiting for a new account
  @IsOptional()
  @IsBoolean()
  discardNewAccountStash?: boolean;
}
