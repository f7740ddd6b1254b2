import { NameFilter, capitalize } from './name-filter';
import type { Arch as ArchName, Os as OsName } from './rules';
import { archRules, bitRules, extensionRules, osRules, osarchRules, sysRules } from './rules';
import { isArchitecture, isOsArchitecture, isSystem, isVersion } from './validators';

const stripV = (version: string): string => version.replace(/^v+/, '');
const majorOf = (version: string): string => version.split('.')[0];
const minorOf = (version: string): string => version.split('.').slice(0, 2).join('.');
const patchOf = (version: string): string => version.split('-')[0];

// Version

export const version = new NameFilter('version', 'version', { validate: isVersion });

export const majorVersion = new NameFilter('major_version', 'version', {
  f: v => majorOf(stripV(v)),
  validate: isVersion
});
export const vmajorVersion = new NameFilter('vmajor_version', 'version', { f: majorOf });
export const VmajorVersion = new NameFilter('Vmajor_version', 'version', {
  f: v => capitalize(vmajorVersion.apply(v))
});

export const minorVersion = new NameFilter('minor_version', 'version', {
  f: v => minorOf(stripV(v)),
  validate: isVersion
});
export const vminorVersion = new NameFilter('vminor_version', 'version', { f: minorOf });
export const VminorVersion = new NameFilter('Vminor_version', 'version', {
  f: v => capitalize(vminorVersion.apply(v))
});

export const patchVersion = new NameFilter('patch_version', 'version', {
  f: v => patchOf(stripV(v)),
  validate: isVersion
});
export const vpatchVersion = new NameFilter('vpatch_version', 'version', { f: patchOf });
export const VpatchVersion = new NameFilter('Vpatch_version', 'version', {
  f: v => capitalize(vpatchVersion.apply(v))
});

// System

export const system = new NameFilter('system', 'system', { validate: isSystem });
export const System = new NameFilter('System', 'system', { f: s => capitalize(system.apply(s)) });
export const SYSTEM = new NameFilter('SYSTEM', 'system', { f: s => system.apply(s).toUpperCase() });

export const sys = new NameFilter('sys', 'system', { rules: sysRules, validate: isSystem });
export const Sys = new NameFilter('Sys', 'system', { f: s => capitalize(sys.apply(s)) });
export const SYS = new NameFilter('SYS', 'system', { f: s => sys.apply(s).toUpperCase() });

export const os = new NameFilter<[string], OsName>('os', 'system', { rules: osRules, validate: isSystem });
export const Os = new NameFilter('Os', 'system', { f: s => capitalize(os.apply(s)) });
export const OS = new NameFilter('OS', 'system', { f: s => os.apply(s).toUpperCase() });

export const extension = new NameFilter('extension', 'system', { rules: extensionRules, validate: isSystem });

// Architecture

export const architecture = new NameFilter('architecture', 'architecture', { validate: isArchitecture });

export const arch = new NameFilter<[string], ArchName>('arch', 'architecture', {
  rules: archRules,
  validate: isArchitecture
});
export const Arch = new NameFilter('Arch', 'architecture', { f: a => capitalize(arch.apply(a)) });
export const ARCH = new NameFilter('ARCH', 'architecture', { f: a => arch.apply(a).toUpperCase() });

export const bit = new NameFilter<[string], number>('bit', 'architecture', {
  rules: bitRules,
  validate: isArchitecture
});

// Combined, keyed on "<os>-<architecture>"

export const osarch = new NameFilter<[string, string]>('osarch', 'osarch', {
  f: (o, a) => `${o}-${a}`,
  rules: osarchRules,
  validate: isOsArchitecture
});
export const Osarch = new NameFilter<[string, string]>('Osarch', 'osarch', {
  f: (o, a) => capitalize(osarch.apply(o, a))
});
export const OSarch = new NameFilter<[string, string]>('OSarch', 'osarch', {
  f: (o, a) => osarch.apply(o, a).toUpperCase()
});
