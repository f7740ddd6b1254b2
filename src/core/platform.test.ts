import * as os from 'os';
import { describe, it, expect } from 'vitest';
import { getPlatformInfo, toReleasePlatform } from './platform';

describe('toReleasePlatform', () => {
  it('should map Node.js platform and arch names onto release names', () => {
    expect(toReleasePlatform('win32', 'x64')).toEqual({ system: 'windows', architecture: 'x86_64' });
    expect(toReleasePlatform('win32', 'ia32')).toEqual({ system: 'windows', architecture: 'i686' });
    expect(toReleasePlatform('darwin', 'arm64')).toEqual({ system: 'macos', architecture: 'ARMv8' });
    expect(toReleasePlatform('linux', 'arm')).toEqual({ system: 'linux', architecture: 'ARMv7' });
    expect(toReleasePlatform('freebsd', 'x64')).toEqual({ system: 'freebsd', architecture: 'x86_64' });
  });

  it('should pass unknown names through', () => {
    expect(toReleasePlatform('aix', 'ppc64')).toEqual({ system: 'aix', architecture: 'ppc64' });
  });
});

describe('getPlatformInfo', () => {
  it('should describe the current host', () => {
    expect(getPlatformInfo()).toEqual(toReleasePlatform(os.platform(), os.arch()));
  });
});
