export { ValidationError } from './errors';
export type { ValidatedField } from './errors';
export { NameFilter, capitalize, identity, noValidate } from './name-filter';
export type { Check, NameFilterOptions, Transform } from './name-filter';
export * as filters from './filters';
export { generateInfo } from './info';
export type { ReleaseInfo } from './info';
export { getPlatformInfo, toReleasePlatform } from './platform';
export type { PlatformInfo } from './platform';
export * from './rules';
export {
  isArch,
  isArchitecture,
  isOs,
  isOsArchitecture,
  isSystem,
  isValidRelease,
  isVersion
} from './validators';
