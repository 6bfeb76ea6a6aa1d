import { describe, it, expect } from '@jest/globals';
import { joinCommand, quoteRemotePath, shellQuote } from '../../../src/lib/shell';

describe('shell quoting', () => {
  it('should leave safe words alone', () => {
    expect(shellQuote('docker-compose.yml')).toBe('docker-compose.yml');
    expect(shellQuote('/srv/app')).toBe('/srv/app');
  });

  it('should single-quote everything else', () => {
    expect(shellQuote('my app')).toBe("'my app'");
    expect(shellQuote("it's")).toBe("'it'\\''s'");
    expect(shellQuote('')).toBe("''");
    expect(shellQuote('$(reboot)')).toBe("'$(reboot)'");
  });

  it('should keep a leading ~/ expandable', () => {
    expect(quoteRemotePath('~/apps/web')).toBe('~/apps/web');
    expect(quoteRemotePath('~/my apps')).toBe("~/'my apps'");
    expect(quoteRemotePath('~')).toBe('~');
    expect(quoteRemotePath('~root')).toBe("'~root'");
  });

  it('should join quoted arguments', () => {
    expect(joinCommand(['docker', 'compose', '-f', 'my compose.yml', 'up', '-d'])).toBe(
      "docker compose -f 'my compose.yml' up -d",
    );
  });
});
