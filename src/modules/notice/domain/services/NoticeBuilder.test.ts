import { Notice } from '../entities/Notice';
import type { StackFrame } from '../value-objects/Backtrace';
import {
  NOTIFIER_INFO,
  NoticeBuilder,
  buildNoticeContext,
  classifyInput,
  describeSource,
  isErrorLike,
} from './NoticeBuilder';

const CAPTURED_STACK = [
  'Error',
  '    at capture (/lib/faultline/dist/Notifier.js:10:5)',
  '    at Notifier.notify (/lib/faultline/dist/Notifier.js:20:7)',
  '    at handler (/srv/app/routes.js:42:13)',
  '    at next (/srv/app/router.js:7:3)',
].join('\n');

const isInternal = (frame: StackFrame): boolean => frame.file.startsWith('/lib/faultline/');

function createBuilder(capture: () => string = () => CAPTURED_STACK): NoticeBuilder {
  return new NoticeBuilder({
    context: { environment: 'production', severity: 'error' },
    captureStack: capture,
    isInternalFrame: isInternal,
  });
}

describe('classifyInput', () => {
  it('should classify notices, errors and other values', () => {
    const notice = new Notice({ errors: [] });
    const error = new Error('boom');

    expect(classifyInput(notice)).toEqual({ kind: 'notice', notice });
    expect(classifyInput(error)).toEqual({ kind: 'error', error });
    expect(classifyInput('boom')).toEqual({ kind: 'value', value: 'boom' });
  });

  it('should treat objects with a string name and message as errors', () => {
    expect(isErrorLike({ name: 'TypeError', message: 'bad' })).toBe(true);
    expect(isErrorLike({ name: 'TypeError' })).toBe(false);
    expect(isErrorLike(null)).toBe(false);
    expect(isErrorLike(42)).toBe(false);
  });
});

describe('describeSource', () => {
  it('should describe each kind of input', () => {
    expect(describeSource(classifyInput(new TypeError('bad')))).toBe('TypeError: bad');
    expect(describeSource(classifyInput('plain text'))).toBe('plain text');
    expect(describeSource(classifyInput({ code: 7 }))).toBe('{ code: 7 }');
  });
});

describe('buildNoticeContext', () => {
  it('should include runtime details and the configured environment', () => {
    const context = buildNoticeContext({
      environment: 'staging',
      appVersion: '1.2.3',
      rootDirectory: '/srv/app',
    });

    expect(context).toMatchObject({
      notifier: NOTIFIER_INFO,
      language: `node/${process.version}`,
      severity: 'error',
      environment: 'staging',
      version: '1.2.3',
      rootDirectory: '/srv/app',
    });
    expect(typeof context.hostname).toBe('string');
  });

  it('should omit settings that are not configured', () => {
    const context = buildNoticeContext({
      environment: undefined,
      appVersion: undefined,
      rootDirectory: undefined,
    });

    expect(context).not.toHaveProperty('environment');
    expect(context).not.toHaveProperty('version');
    expect(context).not.toHaveProperty('rootDirectory');
  });
});

describe('NoticeBuilder', () => {
  describe('build', () => {
    it('should return the same notice with params merged', () => {
      const builder = createBuilder();
      const notice = new Notice({ errors: [], params: { a: 1 } });

      const result = builder.build({ kind: 'notice', notice }, { b: 2 });

      expect(result).toBe(notice);
      expect(result.params).toEqual({ a: 1, b: 2 });
    });

    it('should keep the stack of an error that has one', () => {
      const capture = jest.fn(() => CAPTURED_STACK);
      const builder = createBuilder(capture);
      const error = new Error('boom');
      error.stack = 'Error: boom\n    at work (/srv/app/job.js:3:9)';

      const notice = builder.build({ kind: 'error', error });

      expect(notice.errors).toEqual([
        {
          type: 'Error',
          message: 'boom',
          backtrace: [{ file: '/srv/app/job.js', line: 3, column: 9, function: 'work' }],
        },
      ]);
      expect(capture).not.toHaveBeenCalled();
    });

    it('should synthesize a backtrace starting at the caller for an error without a stack', () => {
      const builder = createBuilder();

      const notice = builder.build({ kind: 'error', error: { name: 'CustomError', message: 'no stack' } });

      expect(notice.errors[0]?.backtrace).toEqual([
        { file: '/srv/app/routes.js', line: 42, column: 13, function: 'handler' },
        { file: '/srv/app/router.js', line: 7, column: 3, function: 'next' },
      ]);
    });

    it('should wrap a non-error value into a generic error', () => {
      const builder = createBuilder();

      const notice = builder.build({ kind: 'value', value: 'something broke' });

      expect(notice.errors).toHaveLength(1);
      expect(notice.errors[0]?.type).toBe('Error');
      expect(notice.errors[0]?.message).toBe('something broke');
      expect(notice.errors[0]?.backtrace[0]?.file).toBe('/srv/app/routes.js');
    });

    it('should inspect non-string values for the message', () => {
      const builder = createBuilder();

      const notice = builder.build({ kind: 'value', value: { code: 7 } });

      expect(notice.errors[0]?.message).toBe('{ code: 7 }');
    });

    it('should keep the untrimmed stack when every frame is internal', () => {
      const builder = createBuilder(() =>
        ['Error', '    at a (/lib/faultline/dist/a.js:1:1)', '    at b (/lib/faultline/dist/b.js:2:2)'].join('\n')
      );

      const notice = builder.build({ kind: 'value', value: 'x' });

      expect(notice.errors[0]?.backtrace.map((frame) => frame.function)).toEqual(['a', 'b']);
    });

    it('should follow the cause chain up to three errors', () => {
      const builder = createBuilder();
      const root = new Error('root', { cause: new Error('deeper') });
      const middle = new Error('middle', { cause: root });
      const top = new TypeError('top', { cause: middle });

      const notice = builder.build({ kind: 'error', error: top });

      expect(notice.errors.map((error) => `${error.type}: ${error.message}`)).toEqual([
        'TypeError: top',
        'Error: middle',
        'Error: root',
      ]);
    });

    it('should copy params and context into the notice', () => {
      const builder = createBuilder();
      const params = { user: 'bob' };

      const notice = builder.build({ kind: 'value', value: 'x' }, params);
      notice.params.user = 'alice';
      notice.context.severity = 'warning';

      expect(params).toEqual({ user: 'bob' });
      expect(builder.build({ kind: 'value', value: 'y' }).context.severity).toBe('error');
    });
  });
});
