import type { Item, ItemStore, Logger } from '@concierge/core';
import { normalizeCustomerId } from './lookup-engine.js';
import { resilientCall, type CredentialRefresh } from './resilient-call.js';
import type { TravelTables } from './types.js';

export type ProfileResult =
  | { kind: 'flights'; customerId: string; flights: Item[] }
  | { kind: 'not_found'; customerId: string; message: string };

export interface ProfileOptions {
  store: ItemStore;
  logger: Logger;
  tables: TravelTables;
  now?: () => Date;
  refresh?: CredentialRefresh;
}

export function profileNotFoundMessage(customerId: string): string {
  return `Sorry we couldn't locate you in our records with Customer ID# ${customerId}. Could you please check your details again?`;
}

/**
 * Departure as a local time, from `departureDate` (YYYY-MM-DD) and
 * `departureTime` (HH:MM). Null when either is missing or malformed.
 */
export function departureOf(item: Item): Date | null {
  const date = item['departureDate'];
  const time = item['departureTime'];
  if (typeof date !== 'string' || typeof time !== 'string') return null;

  const d = /^(\d{4})-(\d{2})-(\d{2})$/.exec(date);
  const t = /^(\d{2}):(\d{2})$/.exec(time);
  if (!d || !t) return null;

  const departure = new Date(
    Number(d[1]),
    Number(d[2]) - 1,
    Number(d[3]),
    Number(t[1]),
    Number(t[2]),
  );
  return Number.isNaN(departure.getTime()) ? null : departure;
}

function sortKey(item: Item): string {
  return `${String(item['departureDate'])} ${String(item['departureTime'])}`;
}

/**
 * Upcoming flights for a customer, soonest first.
 */
export async function customerProfile(customerId: string, options: ProfileOptions): Promise<ProfileResult> {
  const { logger, tables } = options;
  const now = options.now ?? (() => new Date());
  const id = normalizeCustomerId(customerId);
  logger.info({ customerId: id }, 'Customer profile lookup');

  const items = await resilientCall(
    (store) => store.queryByKey(tables.profiles, { attribute: 'customerId', value: id }),
    { store: options.store, logger, operation: 'customer_profile', refresh: options.refresh },
  );

  if (items.length === 0) {
    return { kind: 'not_found', customerId: id, message: profileNotFoundMessage(id) };
  }

  const cutoff = now().getTime();
  const upcoming: Item[] = [];
  for (const item of items) {
    const departure = departureOf(item);
    if (!departure) {
      logger.warn({ customerId: id, bookingReference: item['bookingReference'] ?? null }, 'Skipping flight with malformed departure');
      continue;
    }
    if (departure.getTime() > cutoff) upcoming.push(item);
  }

  upcoming.sort((a, b) => sortKey(a).localeCompare(sortKey(b)));
  return { kind: 'flights', customerId: id, flights: upcoming };
}
