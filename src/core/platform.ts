import * as os from 'os';

export interface PlatformInfo {
  system: string;
  architecture: string;
}

export const systemNames: Readonly<Record<string, string>> = {
  linux: 'linux',
  darwin: 'macos',
  win32: 'windows',
  freebsd: 'freebsd'
};

export const architectureNames: Readonly<Record<string, string>> = {
  ia32: 'i686',
  x64: 'x86_64',
  arm64: 'ARMv8',
  arm: 'ARMv7'
};

// Unknown names pass through so validation reports them as given.
export function toReleasePlatform(platform: string, arch: string): PlatformInfo {
  return {
    system: systemNames[platform] || platform,
    architecture: architectureNames[arch] || arch
  };
}

export function getPlatformInfo(): PlatformInfo {
  return toReleasePlatform(os.platform(), os.arch());
}
