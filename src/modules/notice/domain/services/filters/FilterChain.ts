import type { Notice } from '../../entities/Notice';
import type { INoticeFilter, NoticeFilter, NoticeFilterFunction } from './INoticeFilter';

function isFilterFunction(filter: NoticeFilter): filter is NoticeFilterFunction {
  return typeof filter === 'function';
}

/**
 * FilterChain
 *
 * Ordered list of filter stages applied to every notice before delivery.
 * Stages run in registration order and all of them run, even after one has
 * marked the notice ignored.
 *
 * Registering copies the stage list, so a pass in progress keeps iterating
 * the list it started with.
 */
export class FilterChain {
  private stages: readonly INoticeFilter[] = [];

  public addFilter(filter: NoticeFilter): void {
    const stage: INoticeFilter = isFilterFunction(filter) ? { filter } : filter;
    this.stages = [...this.stages, stage];
  }

  public refine(notice: Notice): void {
    const stages = this.stages;
    for (const stage of stages) {
      stage.filter(notice);
    }
  }

  public get size(): number {
    return this.stages.length;
  }
}
