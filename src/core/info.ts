import * as filters from './filters';

export type ReleaseInfo = Record<string, string | number>;

/**
 * Builds the substitution variables for one release. Throws a ValidationError on the
 * first input that fails its check; extra fields are applied last and win on a clash.
 */
export function generateInfo(
  plainVersion: string,
  system: string,
  architecture: string,
  extraFields: Readonly<Record<string, string>> = {}
): ReleaseInfo {
  const os = filters.os.apply(system);
  const arch = filters.arch.apply(architecture);

  const info: ReleaseInfo = {
    system: filters.system.apply(system),
    System: filters.System.apply(system),
    SYSTEM: filters.SYSTEM.apply(system),

    sys: filters.sys.apply(system),
    Sys: filters.Sys.apply(system),
    SYS: filters.SYS.apply(system),

    os,
    Os: filters.Os.apply(system),
    OS: filters.OS.apply(system),

    architecture: filters.architecture.apply(architecture),

    arch,
    Arch: filters.Arch.apply(architecture),
    ARCH: filters.ARCH.apply(architecture),

    osarch: filters.osarch.apply(os, architecture),
    Osarch: filters.Osarch.apply(os, architecture),
    OSarch: filters.OSarch.apply(os, architecture),

    bit: filters.bit.apply(architecture),
    extension: filters.extension.apply(system),

    version: filters.version.apply(plainVersion),
    major_version: filters.majorVersion.apply(plainVersion),
    minor_version: filters.minorVersion.apply(plainVersion),
    patch_version: filters.patchVersion.apply(plainVersion),

    vmajor_version: filters.vmajorVersion.apply(plainVersion),
    vminor_version: filters.vminorVersion.apply(plainVersion),
    vpatch_version: filters.vpatchVersion.apply(plainVersion),

    Vmajor_version: filters.VmajorVersion.apply(plainVersion),
    Vminor_version: filters.VminorVersion.apply(plainVersion),
    Vpatch_version: filters.VpatchVersion.apply(plainVersion)
  };

  return { ...info, ...extraFields };
}
