import type { Notice } from '../../entities/Notice';
import { matchesAny, type KeyPattern } from '../../../../../shared/validation/schemas';
import type { INoticeFilter } from './INoticeFilter';
import { filterNoticeKeys } from './keysFilter';

/**
 * Redacts every key that matches one of the patterns
 *
 * @example
 * ```typescript
 * notifier.addFilter(new KeysBlacklistFilter(['password', /token/i]));
 * ```
 */
export class KeysBlacklistFilter implements INoticeFilter {
  public constructor(private readonly patterns: readonly KeyPattern[]) {}

  public filter(notice: Notice): void {
    filterNoticeKeys(notice, (key) => matchesAny(key, this.patterns));
  }
}
