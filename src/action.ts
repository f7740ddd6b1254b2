import * as core from '@actions/core';
import { generateInfo } from './core/info';
import { isValidRelease } from './core/validators';
import { getInputs } from './inputs';

export function run(): void {
  try {
    const { version, system, architecture, extraFields, checkRelease } = getInputs();
    core.info(`Generating release info for ${version} on ${system}/${architecture}`);

    if (checkRelease && !isValidRelease(version, system, architecture)) {
      throw new Error(`No ${version} release is available for ${system}/${architecture}`);
    }

    const info = generateInfo(version, system, architecture, extraFields);
    for (const [name, value] of Object.entries(info)) {
      core.debug(`${name}=${value}`);
      core.setOutput(name, String(value));
    }
    core.setOutput('json', JSON.stringify(info));

    core.info(`Set ${Object.keys(info).length} release variables`);
  } catch (error) {
    if (error instanceof Error) {
      core.setFailed(error.message);
    } else {
      core.setFailed(String(error));
    }
  }
}
