import { Notice } from '../../entities/Notice';
import { KeysWhitelistFilter } from './KeysWhitelistFilter';
import { FILTERED } from './keysFilter';

describe('KeysWhitelistFilter', () => {
  it('should redact every key that is not allowed', () => {
    const notice = new Notice({
      errors: [{ type: 'Error', message: 'boom', backtrace: [] }],
      params: { user: 'bob', password: 'test-password', id: 7 },
    });

    new KeysWhitelistFilter(['user', /^id$/]).filter(notice);

    expect(notice.params).toEqual({ user: 'bob', password: FILTERED, id: 7 });
  });

  it('should recurse into allowed nested objects', () => {
    const notice = new Notice({
      errors: [{ type: 'Error', message: 'boom', backtrace: [] }],
      params: { user: { name: 'bob', email: 'bob@example.test' } },
    });

    new KeysWhitelistFilter(['user', 'name']).filter(notice);

    expect(notice.params).toEqual({ user: { name: 'bob', email: FILTERED } });
  });
});
