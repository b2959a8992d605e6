import { buildCommand, parseCommand, tokenize } from './parser';

describe('tokenize', () => {
  it('splits on whitespace and honours quotes and escapes', () => {
    expect(tokenize(`node -e "console.log('hi there')" a\\ b ''`)).toEqual([
      'node',
      '-e',
      "console.log('hi there')",
      'a b',
      '',
    ]);
  });

  it('keeps backslashes inside single quotes', () => {
    expect(tokenize(`printf 'a\\nb'`)).toEqual(['printf', 'a\\nb']);
  });
});

describe('parseCommand', () => {
  it('separates leading assignments from the binary', () => {
    expect(parseCommand('CI=1 FORCE_COLOR=0 npx vitest run')).toEqual({
      bin: 'npx',
      args: ['vitest', 'run'],
      env: { CI: '1', FORCE_COLOR: '0' },
      raw: 'CI=1 FORCE_COLOR=0 npx vitest run',
    });
  });

  it('returns an empty binary when only assignments are given', () => {
    expect(parseCommand('A=1').bin).toBe('');
  });
});

describe('buildCommand', () => {
  it('substitutes the selector as a single argument', () => {
    const cmd = buildCommand('npx vitest run {selector}', 'tests/login.test.ts -t "ok"');
    expect(cmd.args).toEqual(['vitest', 'run', 'tests/login.test.ts -t "ok"']);
  });

  it('substitutes inside a larger token', () => {
    expect(buildCommand('pytest --deselect=none -k={selector}', 'login').args).toEqual([
      '--deselect=none',
      '-k=login',
    ]);
  });

  it('drops a bare placeholder for an empty selector', () => {
    expect(buildCommand('npm test -- {selector}', '').args).toEqual(['test', '--']);
  });
});
