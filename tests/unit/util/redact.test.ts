import { scrubMessage, scrubPaths, scrubString } from '../../../src/util/redact.js';

describe('Redaction', () => {
  const home = '/home/tester';

  it('masks the home directory in strings', () => {
    expect(scrubString('/home/tester/corenlp/models/taggers/english.tagger', home)).toBe(
      '~/corenlp/models/taggers/english.tagger',
    );
    expect(scrubString('/opt/corenlp/models', home)).toBe('/opt/corenlp/models');
  });

  it('leaves strings alone when home is the root', () => {
    expect(scrubString('/home/tester/x', '/')).toBe('/home/tester/x');
  });

  it('walks nested objects and arrays', () => {
    const input = { file: '/home/tester/a.gz', list: ['/home/tester/b.gz', 3], nested: { ok: true } };
    expect(scrubPaths(input, true, home)).toEqual({ file: '~/a.gz', list: ['~/b.gz', 3], nested: { ok: true } });
  });

  it('does nothing when disabled', () => {
    const input = { file: '/home/tester/a.gz' };
    expect(scrubPaths(input, false, home)).toBe(input);
    expect(scrubMessage('/home/tester/a.gz', false, home)).toBe('/home/tester/a.gz');
    expect(scrubMessage('/home/tester/a.gz', true, home)).toBe('~/a.gz');
  });

  it('copes with cycles', () => {
    const input: Record<string, unknown> = { file: '/home/tester/a.gz' };
    input.self = input;
    const out = scrubPaths(input, true, home);
    expect(out).toEqual(expect.objectContaining({ file: '~/a.gz' }));
  });
});
