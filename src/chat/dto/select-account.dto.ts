import { Type } from 'class-transformer';
import {
  IsIn,
  IsNotEmpty,
  IsString,
  ValidateIf,
  ValidateNested,
} from 'class-validator';
import { SelectedAccountType } from '../../follow-up/follow-up.types';

const SELECTED_ACCOUNT_TYPES: SelectedAccountType[] = ['account', 'credit_card'];

export class SelectedAccountDto {
  @IsString()
  @IsNotEmpty()
  id!: string;

  @IsString()
  @IsNotEmpty()
  displayName!: string;

  @IsIn(SELECTED_ACCOUNT_TYPES)
  type!: SelectedAccountType;

  @IsString()
  icon!: string;

  // Required for cards
  @ValidateIf((o: SelectedAccountDto) => o.type === 'credit_card')
  @IsString()
  @IsNotEmpty({ message: 'cardIdentifier is required for a credit card.' })
  cardIdentifier?: string | null;
}

export class SelectAccountDto {
  @IsString()
  @IsNotEmpty({ message: 'userId is required.' })
  userId!: string;

  @ValidateNested()
  @Type(() => SelectedAccountDto)
  account!: SelectedAccountDto;
}
