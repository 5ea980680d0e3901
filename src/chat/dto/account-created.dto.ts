import { Type } from 'class-transformer';
import { IsIn, IsNotEmpty, IsString, ValidateNested } from 'class-validator';
import { ASSET_TYPES, AssetType } from '../../follow-up/accounts';

export class NewAccountDto {
  @IsString()
  @IsNotEmpty()
  id!: string;

  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsIn([...ASSET_TYPES])
  type!: AssetType;
}

export class AccountCreatedDto {
  @IsString()
  @IsNotEmpty({ message: 'userId is required.' })
  userId!: string;

  @ValidateNested()
  @Type(() => NewAccountDto)
  account!: NewAccountDto;
}
