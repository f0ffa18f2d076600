import { isCredentialExpired, type ItemStore, type Logger } from '@concierge/core';
import { SystemUnavailableError, isTravelError } from './errors.js';

/** Retry state for one logical call */
export interface RetryContext {
  attempted: boolean;
}

export type StoreOperation<T> = (store: ItemStore, retry: RetryContext) => Promise<T>;

export type CredentialRefresh = (store: ItemStore) => Promise<ItemStore>;

export interface ResilientCallOptions {
  store: ItemStore;
  logger: Logger;
  /** Name used in log lines */
  operation: string;
  /** Defaults to `store.refreshCredentials()` */
  refresh?: CredentialRefresh;
}

const refreshFromStore: CredentialRefresh = (store) => store.refreshCredentials();

/**
 * Run a store operation, retrying it once with fresh credentials when the
 * first attempt fails with an expired credential.
 *
 * Domain errors pass through untouched. A second expiry, a failed refresh
 * and every other failure become {@link SystemUnavailableError} with the
 * original error as `cause`.
 */
export async function resilientCall<T>(
  run: StoreOperation<T>,
  options: ResilientCallOptions,
): Promise<T> {
  const { logger, operation } = options;
  const refresh = options.refresh ?? refreshFromStore;

  const attempt = async (store: ItemStore, retry: RetryContext): Promise<T> => {
    try {
      return await run(store, retry);
    } catch (error) {
      if (isTravelError(error)) throw error;

      if (isCredentialExpired(error) && !retry.attempted) {
        logger.info({ operation }, 'Credentials expired; refreshing and retrying once');
        let fresh: ItemStore;
        try {
          fresh = await refresh(store);
        } catch (refreshError) {
          logger.error({ err: refreshError, operation }, 'Credential refresh failed');
          throw new SystemUnavailableError(`${operation}: credential refresh failed`, {
            cause: refreshError,
          });
        }
        return attempt(fresh, { attempted: true });
      }

      logger.error({ err: error, operation, retried: retry.attempted }, 'Store operation failed');
      throw new SystemUnavailableError(`${operation}: store unavailable`, { cause: error });
    }
  };

  return attempt(options.store, { attempted: false });
}
