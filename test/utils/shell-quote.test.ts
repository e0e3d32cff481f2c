import { escapeRegExp, shellJoin, shellQuote, singleQuote } from '../../src/utils/shell-quote.js';

describe('shell quoting', () => {
  it('leaves safe arguments alone', () => {
    expect(shellQuote('/tmp/tether/abc.log')).toBe('/tmp/tether/abc.log');
    expect(shellQuote('-n')).toBe('-n');
  });

  it('quotes arguments the shell would split or expand', () => {
    expect(shellQuote('a b')).toBe("'a b'");
    expect(shellQuote('$HOME')).toBe("'$HOME'");
    expect(shellQuote('')).toBe("''");
  });

  it('escapes embedded single quotes', () => {
    expect(singleQuote("it's")).toBe("'it'\\''s'");
  });

  it('joins an argument vector', () => {
    expect(shellJoin(['echo', 'hello world', 'x'])).toBe("echo 'hello world' x");
  });

  it('escapes regular expression metacharacters', () => {
    expect(new RegExp(escapeRegExp('/tmp/a.socket')).test('/tmp/aXsocket')).toBe(false);
    expect(new RegExp(escapeRegExp('/tmp/a.socket')).test('/tmp/a.socket')).toBe(true);
  });
});
