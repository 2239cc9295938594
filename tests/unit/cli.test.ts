import { parseCliArgs } from '../../src';

describe('parseCliArgs', () => {
  it('should take the config file as the only positional argument', () => {
    expect(parseCliArgs(['config.json'])).toEqual({ configFile: 'config.json', testMode: false });
  });

  it.each([['-t'], ['--test_mode']])('should enable test mode with %s', (flag) => {
    expect(parseCliArgs([flag, '/etc/gateway.json'])).toEqual({
      configFile: '/etc/gateway.json',
      testMode: true,
    });
  });
});
