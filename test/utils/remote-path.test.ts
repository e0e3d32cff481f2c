import { hostPath, isRemotePath, parseRemotePath, remotePrefix, sshPrefix, toLocalPath } from '../../src/utils/remote-path.js';

describe('remote paths', () => {
  it('parses user, host, port and path', () => {
    expect(parseRemotePath('ssh://dev@build01:2222/srv/app')).toEqual({
      user: 'dev',
      host: 'build01',
      port: 2222,
      path: '/srv/app',
    });
    expect(parseRemotePath('ssh://build01')).toEqual({ host: 'build01', path: '/' });
    expect(parseRemotePath('/srv/app')).toBeNull();
  });

  it('recognises remote paths', () => {
    expect(isRemotePath('ssh://build01/srv')).toBe(true);
    expect(isRemotePath('/srv')).toBe(false);
  });

  it('rebuilds the prefix without the path', () => {
    expect(remotePrefix({ user: 'dev', host: 'build01', port: 2222 })).toBe('ssh://dev@build01:2222');
    expect(remotePrefix({ host: 'build01' })).toBe('ssh://build01');
  });

  it('strips the prefix for use on the host itself', () => {
    expect(hostPath('ssh://build01/tmp/tether/a.log')).toBe('/tmp/tether/a.log');
    expect(hostPath('/tmp/tether/a.log')).toBe('/tmp/tether/a.log');
  });

  it('maps to a local path only through a configured mount', () => {
    expect(toLocalPath('ssh://build01/tmp/x', { build01: '/mnt/build01' })).toBe('/mnt/build01/tmp/x');
    expect(toLocalPath('ssh://build02/tmp/x', { build01: '/mnt/build01' })).toBeNull();
    expect(toLocalPath('/tmp/x', {})).toBe('/tmp/x');
  });

  it('builds the ssh argv prefix', () => {
    expect(sshPrefix({ user: 'dev', host: 'build01', port: 2222 })).toEqual(['ssh', '-p', '2222', 'dev@build01', '--']);
    expect(sshPrefix({ host: 'build01' })).toEqual(['ssh', 'build01', '--']);
    expect(sshPrefix({ user: 'dev', host: 'build01', port: 2222 }, true)).toEqual([
      'ssh',
      '-t',
      '-p',
      '2222',
      'dev@build01',
      '--',
    ]);
  });
});
