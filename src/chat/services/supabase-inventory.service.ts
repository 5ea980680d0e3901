import { Inject, Injectable, Logger } from '@nestjs/common';
import { SupabaseClient } from '@supabase/supabase-js';
import { Account, Card, isAssetType } from '../../follow-up/accounts';
import { AccountInventory, CardInventory } from '../contracts';

function isRow(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export function toAccount(row: unknown): Account | null {
  if (!isRow(row)) return null;
  const { id, name, type } = row;
  if (typeof id !== 'string' || typeof name !== 'string' || !isAssetType(type)) {
    return null;
  }
  return { id, name, type };
}

export function toCard(row: unknown): Card | null {
  if (!isRow(row)) return null;
  const { id, name, card_identifier } = row;
  if (
    typeof id !== 'string' ||
    typeof name !== 'string' ||
    typeof card_identifier !== 'string'
  ) {
    return null;
  }
  return { id, name, cardIdentifier: card_identifier };
}

/**
 * Reads the user's accounts and credit cards. Every call hits the database;
 * eligibility is always decided on a fresh snapshot.
 */
@Injectable()
export class SupabaseInventoryService implements AccountInventory, CardInventory {
  private readonly log = new Logger(SupabaseInventoryService.name);

  constructor(@Inject('SUPABASE') private readonly supabase: SupabaseClient) {}

  async listAccounts(userId: string): Promise<Account[]> {
    const { data, error } = await this.supabase
      .from('accounts')
      .select('id, name, type')
      .eq('user_id', userId)
      .order('name');

    if (error) {
      this.log.error(`[listAccounts] ${error.message}`);
      return [];
    }
    return this.collect(data, toAccount, 'account');
  }

  async listCards(userId: string): Promise<Card[]> {
    const { data, error } = await this.supabase
      .from('credit_cards')
      .select('id, name, card_identifier')
      .eq('user_id', userId)
      .order('name');

    if (error) {
      this.log.error(`[listCards] ${error.message}`);
      return [];
    }
    return this.collect(data, toCard, 'card');
  }

  private collect<T>(
    rows: unknown[] | null,
    map: (row: unknown) => T | null,
    label: string,
  ): T[] {
    const items: T[] = [];
    for (const row of rows ?? []) {
      const item = map(row);
      if (item) {
        items.push(item);
      } else {
        this.log.warn(`Skipping malformed ${label} row`);
      }
    }
    return items;
  }
}
