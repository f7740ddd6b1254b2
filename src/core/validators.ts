import {
  type Arch,
  type Architecture,
  type Os,
  SPECIAL_VERSION_NAMES,
  type System,
  VALID_ARCH,
  VALID_ARCHITECTURE,
  VALID_OS,
  VALID_SYSTEM,
  VERSION_REGEX
} from './rules';

function includes<T extends string>(values: readonly T[], value: string): value is T {
  return values.some(v => v === value);
}

export function isSystem(system: string): system is System {
  return includes(VALID_SYSTEM, system);
}

export function isOs(os: string): os is Os {
  return includes(VALID_OS, os);
}

export function isArchitecture(architecture: string): architecture is Architecture {
  return includes(VALID_ARCHITECTURE, architecture);
}

export function isArch(arch: string): arch is Arch {
  return includes(VALID_ARCH, arch);
}

/**
 * Accepts the special names and anything that *starts* with `vX.Y.Z[-status]`,
 * so `v1.2.3xyz` passes too.
 */
export function isVersion(version: string): boolean {
  if (SPECIAL_VERSION_NAMES.includes(version)) {
    return true;
  }
  return VERSION_REGEX.test(version);
}

export function isOsArchitecture(os: string, architecture: string): boolean {
  return isOs(os) && isArchitecture(architecture);
}

/**
 * Whether a release is published for this combination. Does not throw; callers
 * decide how to report a refused combination.
 */
export function isValidRelease(version: string, system: string, architecture: string): boolean {
  if (system === 'windows' && !['i686', 'x86_64'].includes(architecture)) {
    return false;
  }
  if (system === 'macos' && architecture !== 'x86_64') {
    return false;
  }
  if (system === 'freebsd' && architecture !== 'x86_64') {
    return false;
  }
  if (version === 'latest' && (
    !['i686', 'x86_64'].includes(architecture)
    || !['windows', 'macos', 'linux'].includes(system))) {
    return false;
  }
  return true;
}
