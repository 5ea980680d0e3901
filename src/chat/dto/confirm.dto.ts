import { ArrayMaxSize, ArrayNotEmpty, IsArray, IsNotEmpty, IsString } from 'class-validator';

export class ConfirmDto {
  @IsString()
  @IsNotEmpty({ message: 'userId is required.' })
  userId!: string;

  // Checked event by event by the event guardrails
  @IsArray()
  @ArrayNotEmpty({ message: 'Nothing to save.' })
  @ArrayMaxSize(50)
  events!: unknown[];
}
