export type System = 'windows' | 'linux' | 'freebsd' | 'macos';
export type Os = 'win' | 'linux' | 'freebsd' | 'macos';
export type Architecture = 'i686' | 'x86_64' | 'ARMv8' | 'ARMv7';
export type Arch = 'x86' | 'x64' | 'aarch64' | 'armv7l';

export const SPECIAL_VERSION_NAMES: readonly string[] = Object.freeze(['latest', 'nightly', 'stable']);

export const VERSION_REGEX = /^v(?<major>\d+)\.(?<minor>\d+)\.(?<patch>\d+)(-(?<status>\w+))?/;

export const VALID_SYSTEM: readonly System[] = Object.freeze(['windows', 'linux', 'freebsd', 'macos'] as const);
export const VALID_OS: readonly Os[] = Object.freeze(['win', 'linux', 'freebsd', 'macos'] as const);

export const sysRules: Readonly<Record<string, string>> = Object.freeze({
  windows: 'winnt'
});

export const osRules: Readonly<Record<string, Os>> = Object.freeze({
  windows: 'win'
});

export const archRules = Object.freeze({
  i686: 'x86',
  x86_64: 'x64',
  ARMv8: 'aarch64',
  ARMv7: 'armv7l'
} satisfies Record<Architecture, Arch>);

// Keys mix the short os with the raw architecture name.
export const osarchRules: Readonly<Record<string, string>> = Object.freeze({
  'win-i686': 'win32',
  'win-x86_64': 'win64',
  'macos-x86_64': 'mac64',
  'linux-ARMv7': 'linux-armv7l',
  'linux-ARMv8': 'linux-aarch64'
});

export const extensionRules = Object.freeze({
  windows: 'exe',
  linux: 'tar.gz',
  macos: 'dmg',
  freebsd: 'tar.gz'
} satisfies Record<System, string>);

export const bitRules = Object.freeze({
  i686: 32,
  x86_64: 64,
  ARMv8: 64,
  ARMv7: 32
} satisfies Record<Architecture, number>);

export const VALID_ARCHITECTURE: readonly Architecture[] = Object.freeze(['i686', 'x86_64', 'ARMv8', 'ARMv7'] as const);
export const VALID_ARCH: readonly Arch[] = Object.freeze(VALID_ARCHITECTURE.map(a => archRules[a]));
