import type { StackFrame } from '../value-objects/Backtrace';
import { Truncator } from '../../../../shared/serialization/Truncator';

export type NoticeParams = Record<string, unknown>;

/**
 * One captured error: the notice's own error first, then its causes
 */
export interface NoticeError {
  type: string;
  message: string;
  backtrace: StackFrame[];
}

/**
 * The document posted to the notices endpoint
 */
export interface NoticePayload {
  errors: NoticeError[];
  context: Record<string, unknown>;
  environment: Record<string, unknown>;
  session: Record<string, unknown>;
  params: NoticeParams;
}

export interface NoticeProps {
  errors: NoticeError[];
  context?: Record<string, unknown>;
  params?: NoticeParams;
}

/**
 * Largest serialized notice the collection endpoint accepts, in bytes
 */
export const MAX_NOTICE_SIZE = 64000;

// String lengths tried, in order, when a notice is too large
const TRUNCATION_LIMITS = [1024, 512, 256, 128, 64];

/**
 * Notice entity
 *
 * Mutable report built from one captured error. Filter stages mutate it in
 * place (redact params, rewrite backtraces, add context) and may mark it
 * ignored; senders only read it.
 *
 * **Invariant:** an ignored notice is never delivered. `ignore()` is one-way.
 */
export class Notice {
  public readonly errors: NoticeError[];
  public readonly context: Record<string, unknown>;
  public readonly environment: Record<string, unknown> = {};
  public readonly session: Record<string, unknown> = {};
  public readonly params: NoticeParams;

  /**
   * Scratch space for filters; never serialized
   */
  public readonly stash = new Map<string, unknown>();

  private ignoredFlag = false;

  public constructor(props: NoticeProps) {
    this.errors = props.errors;
    this.context = props.context ?? {};
    this.params = props.params ?? {};
  }

  public get ignored(): boolean {
    return this.ignoredFlag;
  }

  public ignore(): void {
    this.ignoredFlag = true;
  }

  /**
   * Merges params into the existing ones; keys in `params` win on conflict
   */
  public mergeParams(params: NoticeParams): this {
    Object.assign(this.params, params);
    return this;
  }

  public toPayload(): NoticePayload {
    return {
      errors: this.errors,
      context: this.context,
      environment: this.environment,
      session: this.session,
      params: this.params,
    };
  }

  /**
   * Serializes the notice to JSON no larger than `maxSize` bytes.
   *
   * When the full document is too large, every string is cut to successively
   * shorter lengths until it fits.
   *
   * @returns JSON text, or null if the notice cannot be made small enough
   */
  public serialize(maxSize: number = MAX_NOTICE_SIZE): string | null {
    const payload = this.toPayload();

    const full = JSON.stringify(new Truncator().truncate(payload));
    if (Buffer.byteLength(full, 'utf8') <= maxSize) {
      return full;
    }

    for (const limit of TRUNCATION_LIMITS) {
      const truncated = JSON.stringify(new Truncator(limit).truncate(payload));
      if (Buffer.byteLength(truncated, 'utf8') <= maxSize) {
        return truncated;
      }
    }

    return null;
  }

  public toString(): string {
    const [first] = this.errors;
    return first ? `Notice(${first.type}: ${first.message})` : 'Notice()';
  }
}
