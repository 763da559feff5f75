import type { Notice } from '../../entities/Notice';

export const FILTERED = '[Filtered]';

type KeyPredicate = (key: string) => boolean;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function filterHash(hash: Record<string, unknown>, shouldFilter: KeyPredicate): void {
  for (const [key, value] of Object.entries(hash)) {
    if (shouldFilter(key)) {
      hash[key] = FILTERED;
    } else if (isPlainObject(value)) {
      // nested objects may be shared with the caller; filter a copy
      const copy = { ...value };
      filterHash(copy, shouldFilter);
      hash[key] = copy;
    }
  }
}

/**
 * Replaces the value of every key for which `shouldFilter` holds in the
 * notice's params, session and environment
 */
export function filterNoticeKeys(notice: Notice, shouldFilter: KeyPredicate): void {
  filterHash(notice.params, shouldFilter);
  filterHash(notice.session, shouldFilter);
  filterHash(notice.environment, shouldFilter);
}
