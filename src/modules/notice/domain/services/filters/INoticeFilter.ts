import type { Notice } from '../../entities/Notice';

/**
 * Filter stage
 *
 * Receives every notice before delivery and may mutate it in place
 * (redact params, rewrite backtraces, add context) or call `notice.ignore()`.
 */
export interface INoticeFilter {
  filter(notice: Notice): void;
}

export type NoticeFilterFunction = (notice: Notice) => void;

/**
 * Anything accepted by `addFilter`
 */
export type NoticeFilter = INoticeFilter | NoticeFilterFunction;
