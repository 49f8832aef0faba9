import {
  buildStrategyArgs,
  CLIENT_STRATEGIES,
  DEFAULT_STRATEGY_NAME,
  selectStrategies,
} from '../src/download/core/ClientStrategies';

describe('Client strategies', () => {
  it('should end with the default strategy', () => {
    const last = CLIENT_STRATEGIES[CLIENT_STRATEGIES.length - 1];
    expect(last.name).toBe(DEFAULT_STRATEGY_NAME);
    expect(buildStrategyArgs(last)).toEqual([]);
  });

  it('should return the whole table when no names are given', () => {
    expect(selectStrategies().map((s) => s.name)).toEqual([
      'android',
      'ios',
      'tv_embedded',
      'mweb',
      'web',
      'default',
    ]);
  });

  it('should keep table order and always keep the default', () => {
    expect(selectStrategies(['WEB', ' android ']).map((s) => s.name)).toEqual([
      'android',
      'web',
      'default',
    ]);
  });

  it('should pass cookies only to strategies that use them', () => {
    const web = CLIENT_STRATEGIES.find((s) => s.name === 'web');
    const android = CLIENT_STRATEGIES.find((s) => s.name === 'android');

    expect(web && buildStrategyArgs(web, '/tmp/cookies.txt')).toEqual([
      '--extractor-args',
      'youtube:player_client=web',
      '--user-agent',
      'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36',
      '--cookies',
      '/tmp/cookies.txt',
      '--add-header',
      'Accept-Language:en-US,en;q=0.9',
      '--add-header',
      'Origin:https://www.youtube.com',
    ]);
    expect(android && buildStrategyArgs(android, '/tmp/cookies.txt')).not.toContain('--cookies');
  });

  it('should skip the cookies flag when no cookies file exists', () => {
    const web = CLIENT_STRATEGIES.find((s) => s.name === 'web');
    expect(web && buildStrategyArgs(web)).not.toContain('--cookies');
  });
});
