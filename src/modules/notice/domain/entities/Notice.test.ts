import { MAX_NOTICE_SIZE, Notice, type NoticeError } from './Notice';

function createError(overrides: Partial<NoticeError> = {}): NoticeError {
  return {
    type: 'RuntimeError',
    message: 'boom',
    backtrace: [{ file: '/srv/app/job.js', line: 3, column: 9, function: 'run' }],
    ...overrides,
  };
}

describe('Notice', () => {
  describe('ignore', () => {
    it('should start out not ignored', () => {
      const notice = new Notice({ errors: [createError()] });

      expect(notice.ignored).toBe(false);
    });

    it('should stay ignored once ignored', () => {
      const notice = new Notice({ errors: [createError()] });

      notice.ignore();
      notice.ignore();

      expect(notice.ignored).toBe(true);
    });
  });

  describe('mergeParams', () => {
    it('should union params with later keys winning', () => {
      const notice = new Notice({ errors: [createError()], params: { a: 1, b: 2 } });

      const result = notice.mergeParams({ b: 3, c: 4 });

      expect(result).toBe(notice);
      expect(notice.params).toEqual({ a: 1, b: 3, c: 4 });
    });
  });

  describe('toPayload', () => {
    it('should expose every section', () => {
      const notice = new Notice({
        errors: [createError()],
        context: { environment: 'production' },
        params: { user: 'bob' },
      });
      notice.session.id = 's-1';
      notice.environment.PATH = '/usr/bin';

      expect(notice.toPayload()).toEqual({
        errors: [createError()],
        context: { environment: 'production' },
        environment: { PATH: '/usr/bin' },
        session: { id: 's-1' },
        params: { user: 'bob' },
      });
    });

    it('should not include the stash', () => {
      const notice = new Notice({ errors: [createError()] });
      notice.stash.set('request', { id: 1 });

      expect(Object.keys(notice.toPayload())).toEqual([
        'errors',
        'context',
        'environment',
        'session',
        'params',
      ]);
    });
  });

  describe('serialize', () => {
    it('should serialize a small notice unchanged', () => {
      const notice = new Notice({ errors: [createError()], params: { user: 'bob' } });

      const json = notice.serialize();

      expect(json).not.toBeNull();
      expect(JSON.parse(json ?? '')).toEqual({
        errors: [createError()],
        context: {},
        environment: {},
        session: {},
        params: { user: 'bob' },
      });
    });

    it('should truncate long strings when the notice is too large', () => {
      const notice = new Notice({ errors: [createError()], params: { blob: 'x'.repeat(100000) } });

      const json = notice.serialize();

      expect(json).not.toBeNull();
      const parsed: unknown = JSON.parse(json ?? '');
      expect(parsed).toEqual(
        expect.objectContaining({ params: { blob: 'x'.repeat(1024) } })
      );
      expect(Buffer.byteLength(json ?? '', 'utf8')).toBeLessThanOrEqual(MAX_NOTICE_SIZE);
    });

    it('should return null when no truncation makes it fit', () => {
      const notice = new Notice({ errors: [createError()] });

      expect(notice.serialize(10)).toBeNull();
    });

    it('should serialize circular params', () => {
      const loop: Record<string, unknown> = {};
      loop.self = loop;
      const notice = new Notice({ errors: [createError()], params: { loop } });

      const parsed: unknown = JSON.parse(notice.serialize() ?? '');

      expect(parsed).toEqual(expect.objectContaining({ params: { loop: { self: '[Circular]' } } }));
    });

    it('should not modify the notice', () => {
      const notice = new Notice({ errors: [createError()], params: { blob: 'y'.repeat(70000) } });

      notice.serialize();

      expect(notice.params.blob).toBe('y'.repeat(70000));
    });
  });

  describe('toString', () => {
    it('should name the first error', () => {
      const notice = new Notice({ errors: [createError({ type: 'TypeError', message: 'bad' })] });

      expect(notice.toString()).toBe('Notice(TypeError: bad)');
    });
  });
});
