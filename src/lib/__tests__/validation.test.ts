import { validateSubmission } from '../validation';

describe('validateSubmission', () => {
  test('trims both fields', () => {
    expect(validateSubmission({ name: '  Ada ', message: '\n hello \t' })).toEqual({
      ok: true,
      draft: { name: 'Ada', message: 'hello' },
    });
  });

  test('defaults a blank or missing name to Anonymous', () => {
    expect(validateSubmission({ name: '   ', message: 'yo' })).toEqual({ ok: true, draft: { name: 'Anonymous', message: 'yo' } });
    expect(validateSubmission({ message: 'yo' })).toEqual({ ok: true, draft: { name: 'Anonymous', message: 'yo' } });
  });

  test('requires a message', () => {
    expect(validateSubmission({ name: 'Ada', message: '' })).toEqual({ ok: false, code: 'message_required' });
    expect(validateSubmission({ name: 'Ada', message: '   ' })).toEqual({ ok: false, code: 'message_required' });
    expect(validateSubmission({})).toEqual({ ok: false, code: 'message_required' });
  });

  test('accepts fields exactly at the limits', () => {
    const result = validateSubmission({ name: 'n'.repeat(50), message: 'm'.repeat(1000) });
    expect(result.ok).toBe(true);
  });

  test('rejects fields over the limits', () => {
    expect(validateSubmission({ name: 'n'.repeat(51), message: 'hi' })).toEqual({ ok: false, code: 'name_too_long' });
    expect(validateSubmission({ name: 'Ada', message: 'm'.repeat(1001) })).toEqual({ ok: false, code: 'message_too_long' });
  });

  test('reports an empty message before an overlong name', () => {
    expect(validateSubmission({ name: 'n'.repeat(51), message: '' })).toEqual({ ok: false, code: 'message_required' });
    expect(validateSubmission({ name: 'n'.repeat(51), message: 'm'.repeat(1001) })).toEqual({ ok: false, code: 'name_too_long' });
  });

  test('counts characters outside the basic plane once each', () => {
    const smile = '\u{1F600}';
    expect(smile.length).toBe(2);
    expect(validateSubmission({ name: smile.repeat(26), message: 'hi' })).toEqual({
      ok: true,
      draft: { name: smile.repeat(26), message: 'hi' },
    });
    expect(validateSubmission({ name: smile.repeat(50), message: smile.repeat(1000) }).ok).toBe(true);
    expect(validateSubmission({ name: smile.repeat(51), message: 'hi' })).toEqual({ ok: false, code: 'name_too_long' });
    expect(validateSubmission({ name: 'Ada', message: smile.repeat(1001) })).toEqual({ ok: false, code: 'message_too_long' });
  });
});
