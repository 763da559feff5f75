import type { Notice } from '../../entities/Notice';
import type { INoticeFilter } from './INoticeFilter';

export const PROJECT_ROOT = '/PROJECT_ROOT';

/**
 * Rewrites backtrace paths under the application's root directory to start
 * with `/PROJECT_ROOT`, so the same frame groups together across hosts
 */
export class RootDirectoryFilter implements INoticeFilter {
  private readonly root: string;

  public constructor(rootDirectory: string) {
    this.root = rootDirectory.replace(/\/+$/, '');
  }

  public filter(notice: Notice): void {
    for (const error of notice.errors) {
      for (const frame of error.backtrace) {
        if (frame.file === this.root || frame.file.startsWith(`${this.root}/`)) {
          frame.file = PROJECT_ROOT + frame.file.slice(this.root.length);
        }
      }
    }
  }
}
