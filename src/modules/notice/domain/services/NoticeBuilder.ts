import os from 'os';
import { inspect } from 'util';
import { Notice, type NoticeError, type NoticeParams } from '../entities/Notice';
import {
  captureBacktrace,
  defaultStackCapture,
  isLibraryFrame,
  parseStack,
  type FramePredicate,
  type StackCapture,
} from '../value-objects/Backtrace';
import type { NotifierSettings } from '../../../../shared/validation/schemas';

export const NOTIFIER_INFO = { name: 'faultline', version: '0.1.0' } as const;

// Own error plus this many causes at most
const MAX_NESTED_ERRORS = 3;

/**
 * Anything shaped like an Error: real Errors, errors from another realm,
 * or plain objects carrying a name and message
 */
export interface ErrorLike {
  name: string;
  message: string;
  stack?: string;
  cause?: unknown;
}

/**
 * What a caller handed to notify/buildNotice, classified once at the boundary
 */
export type NoticeSource =
  | { kind: 'notice'; notice: Notice }
  | { kind: 'error'; error: ErrorLike }
  | { kind: 'value'; value: unknown };

export function isErrorLike(value: unknown): value is ErrorLike {
  if (value instanceof Error) {
    return true;
  }
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const name: unknown = Reflect.get(value, 'name');
  const message: unknown = Reflect.get(value, 'message');
  return typeof name === 'string' && typeof message === 'string';
}

export function classifyInput(input: unknown): NoticeSource {
  if (input instanceof Notice) {
    return { kind: 'notice', notice: input };
  }
  if (isErrorLike(input)) {
    return { kind: 'error', error: input };
  }
  return { kind: 'value', value: input };
}

/**
 * Human-readable label of a source, used in error and rejection messages
 */
export function describeSource(source: NoticeSource): string {
  switch (source.kind) {
    case 'notice':
      return source.notice.toString();
    case 'error':
      return `${source.error.name}: ${source.error.message}`;
    case 'value':
      return textOf(source.value);
  }
}

function textOf(value: unknown): string {
  return typeof value === 'string' ? value : inspect(value);
}

/**
 * Context shared by every notice of one notifier
 */
export function buildNoticeContext(
  settings: Pick<NotifierSettings, 'environment' | 'appVersion' | 'rootDirectory'>
): Record<string, unknown> {
  const context: Record<string, unknown> = {
    notifier: { ...NOTIFIER_INFO },
    os: `${os.platform()} ${os.release()}`,
    hostname: os.hostname(),
    language: `node/${process.version}`,
    severity: 'error',
  };
  if (settings.environment !== undefined) context.environment = settings.environment;
  if (settings.appVersion !== undefined) context.version = settings.appVersion;
  if (settings.rootDirectory !== undefined) context.rootDirectory = settings.rootDirectory;
  return context;
}

export interface NoticeBuilderOptions {
  context: Record<string, unknown>;
  captureStack?: StackCapture;
  isInternalFrame?: FramePredicate;
}

/**
 * NoticeBuilder
 *
 * Turns a classified NoticeSource into a Notice:
 * - an existing notice gets the new params merged in and is returned as-is
 * - an error keeps its own stack; one without a usable stack gets a
 *   synthesized backtrace pointing at the caller
 * - any other value becomes a generic `Error` with its text as message
 */
export class NoticeBuilder {
  private readonly context: Record<string, unknown>;
  private readonly captureStack: StackCapture;
  private readonly isInternalFrame: FramePredicate;

  public constructor(options: NoticeBuilderOptions) {
    this.context = options.context;
    this.captureStack = options.captureStack ?? defaultStackCapture;
    this.isInternalFrame = options.isInternalFrame ?? isLibraryFrame;
  }

  public build(source: NoticeSource, params: NoticeParams = {}): Notice {
    switch (source.kind) {
      case 'notice':
        return source.notice.mergeParams(params);
      case 'error':
        return this.fromError(source.error, params);
      case 'value':
        return this.fromError({ name: 'Error', message: textOf(source.value) }, params);
    }
  }

  private fromError(error: ErrorLike, params: NoticeParams): Notice {
    return new Notice({
      errors: this.collectErrors(error),
      context: structuredClone(this.context),
      params: { ...params },
    });
  }

  private collectErrors(error: ErrorLike): NoticeError[] {
    const errors: NoticeError[] = [];
    let current: unknown = error;

    while (isErrorLike(current) && errors.length < MAX_NESTED_ERRORS) {
      let backtrace = typeof current.stack === 'string' ? parseStack(current.stack) : [];
      if (errors.length === 0 && backtrace.length === 0) {
        backtrace = captureBacktrace(this.captureStack, this.isInternalFrame);
      }

      errors.push({
        type: current.name || 'Error',
        message: current.message,
        backtrace,
      });
      current = current.cause;
    }

    return errors;
  }
}
