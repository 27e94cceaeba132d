import { RecordingLogger } from '../__fixtures__/http.fixture';
import { MalformedPatternError } from '../utils/errors';
import { compileDenyPattern, isDenied } from './deny-uri.matcher';

describe('isDenied', () => {
  it('denies nothing with an empty list', () => {
    expect(isDenied([], '/api/widgets')).toBe(false);
  });

  it('denies a uri matching an anchored pattern', () => {
    expect(isDenied(['^/api/'], '/api/widgets')).toBe(true);
    expect(isDenied(['^/api/'], '/home')).toBe(false);
  });

  it('matches anywhere in the uri', () => {
    expect(isDenied(['admin'], '/x/admin/y')).toBe(true);
  });

  it('sees the query string', () => {
    expect(isDenied(['preview=1'], '/page?preview=1')).toBe(true);
  });

  it('is case-sensitive', () => {
    expect(isDenied(['^/API/'], '/api/widgets')).toBe(false);
  });

  it('skips patterns that fail to compile', () => {
    expect(isDenied(['(', '^/api/'], '/api/widgets')).toBe(true);
    expect(isDenied(['('], '/(')).toBe(false);
  });

  it('logs skipped patterns at debug level', () => {
    const logger = new RecordingLogger();

    isDenied(['['], '/', { logger });

    expect(logger.at('debug')).toHaveLength(1);
    expect(logger.entries[0].message).toBe('Skipping deny-uri pattern');
    expect(logger.entries[0].meta?.pattern).toBe('[');
  });

  it('traces each evaluated pattern up to the first match', () => {
    const logger = new RecordingLogger();

    expect(isDenied(['^/a', '^/b', '^/c'], '/b', { logger, trace: true })).toBe(true);
    expect(logger.entries).toEqual([
      { level: 'debug', message: 'Evaluating deny-uri pattern', meta: { uri: '/b', pattern: '^/a' } },
      { level: 'debug', message: 'Evaluating deny-uri pattern', meta: { uri: '/b', pattern: '^/b' } },
    ]);
  });

  it('stays quiet without tracing', () => {
    const logger = new RecordingLogger();

    isDenied(['^/a'], '/b', { logger });

    expect(logger.entries).toHaveLength(0);
  });
});

describe('compileDenyPattern', () => {
  it('compiles without flags', () => {
    expect(compileDenyPattern('^/api/').flags).toBe('');
  });

  it('wraps syntax errors', () => {
    expect(() => compileDenyPattern('[')).toThrow(MalformedPatternError);
  });
});
