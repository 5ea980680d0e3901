/**
 * Account inventory model as supplied by the account/card collaborators.
 */
export type AssetType =
  | 'BANK'
  | 'INVESTMENT'
  | 'CASH'
  | 'CREDIT_CARD'
  | 'DIGITAL_WALLET'
  | 'LOAN'
  | 'MORTGAGE'
  | 'SAVINGS'
  | 'RETIREMENT'
  | 'CRYPTO'
  | 'PROPERTY'
  | 'VEHICLE'
  | 'OTHER_ASSET'
  | 'OTHER_LIABILITY';

export const ASSET_TYPES: readonly AssetType[] = [
  'BANK',
  'INVESTMENT',
  'CASH',
  'CREDIT_CARD',
  'DIGITAL_WALLET',
  'LOAN',
  'MORTGAGE',
  'SAVINGS',
  'RETIREMENT',
  'CRYPTO',
  'PROPERTY',
  'VEHICLE',
  'OTHER_ASSET',
  'OTHER_LIABILITY',
];

/** Accounts that can fund an expense or receive income */
export const LIQUID_ASSET_TYPES: readonly AssetType[] = [
  'BANK',
  'CASH',
  'DIGITAL_WALLET',
  'SAVINGS',
  'OTHER_ASSET',
];

/** Accounts that can hold securities or coins */
export const INVESTMENT_ASSET_TYPES: readonly AssetType[] = [
  'INVESTMENT',
  'CRYPTO',
  'RETIREMENT',
];

const ASSET_TYPE_ICONS: Record<AssetType, string> = {
  BANK: 'creditcard.fill',
  INVESTMENT: 'chart.line.uptrend.xyaxis',
  CASH: 'banknote.fill',
  CREDIT_CARD: 'creditcard.circle.fill',
  DIGITAL_WALLET: 'iphone.gen3',
  LOAN: 'arrow.down.circle.fill',
  MORTGAGE: 'house.fill',
  SAVINGS: 'building.columns.fill',
  RETIREMENT: 'figure.walk',
  CRYPTO: 'bitcoinsign.circle.fill',
  PROPERTY: 'building.2.fill',
  VEHICLE: 'car.fill',
  OTHER_ASSET: 'dollarsign.circle.fill',
  OTHER_LIABILITY: 'minus.circle.fill',
};

export interface Account {
  id: string;
  name: string;
  type: AssetType;
}

export interface Card {
  id: string;
  name: string;
  cardIdentifier: string; // e.g. last four digits
}

export function isAssetType(value: unknown): value is AssetType {
  return typeof value === 'string' && ASSET_TYPES.some((t) => t === value);
}

export function assetTypeIcon(type: AssetType): string {
  return ASSET_TYPE_ICONS[type];
}

export function isLiquidAccount(account: Account): boolean {
  return LIQUID_ASSET_TYPES.includes(account.type);
}

export function isInvestmentAccount(account: Account): boolean {
  return INVESTMENT_ASSET_TYPES.includes(account.type);
}
