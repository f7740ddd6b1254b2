import * as core from '@actions/core';
import { getPlatformInfo } from './core/platform';

export interface ActionInputs {
  version: string;
  system: string;
  architecture: string;
  extraFields: Record<string, string>;
  checkRelease: boolean;
}

/** Parses `key=value` lines; blank lines are skipped and the first `=` splits. */
export function parseExtraFields(lines: readonly string[]): Record<string, string> {
  const entries: [string, string][] = [];
  for (const line of lines) {
    if (!line.trim()) continue;
    const separator = line.indexOf('=');
    if (separator === -1) {
      throw new Error(`Invalid extra field "${line}": expected key=value`);
    }
    const key = line.substring(0, separator).trim();
    if (!key) {
      throw new Error(`Invalid extra field "${line}": key is empty`);
    }
    entries.push([key, line.substring(separator + 1).trim()]);
  }
  return Object.fromEntries(entries);
}

export function getInputs(): ActionInputs {
  const platform = getPlatformInfo();
  const checkRelease = core.getInput('check-release');

  return {
    version: core.getInput('version') || 'latest',
    system: core.getInput('system') || platform.system,
    architecture: core.getInput('architecture') || platform.architecture,
    extraFields: parseExtraFields(core.getMultilineInput('extra-fields')),
    checkRelease: checkRelease ? core.getBooleanInput('check-release') : true
  };
}
