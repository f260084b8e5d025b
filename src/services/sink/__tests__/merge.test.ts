import { mergeDefaults } from '../merge';

describe('mergeDefaults', () => {
  it('should let record fields override defaults', () => {
    expect(mergeDefaults({ region: 'us' }, { region: 'eu', msg: 'hi' })).toEqual({ region: 'eu', msg: 'hi' });
  });

  it('should fill every missing key from the defaults', () => {
    expect(mergeDefaults({ region: 'us', env: 'prod' }, { msg: 'hi' })).toEqual({
      region: 'us',
      env: 'prod',
      msg: 'hi',
    });
  });

  it('should keep a record value of null over a default', () => {
    expect(mergeDefaults({ user: 'system' }, { user: null })).toEqual({ user: null });
  });

  it('should not modify its inputs', () => {
    const defaults = { a: 1 };
    const record = { b: 2 };

    mergeDefaults(defaults, record);

    expect(defaults).toEqual({ a: 1 });
    expect(record).toEqual({ b: 2 });
  });
});
