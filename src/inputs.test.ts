import { describe, it, expect, vi, beforeEach } from 'vitest';
import * as core from '@actions/core';
import { getPlatformInfo } from './core/platform';
import { getInputs, parseExtraFields } from './inputs';

vi.mock('@actions/core', () => ({
  getInput: vi.fn(),
  getMultilineInput: vi.fn(),
  getBooleanInput: vi.fn()
}));

function setInputs(inputs: Record<string, string>, extraLines: string[] = []): void {
  vi.mocked(core.getInput).mockImplementation((name: string) => inputs[name] ?? '');
  vi.mocked(core.getMultilineInput).mockReturnValue(extraLines);
}

describe('parseExtraFields', () => {
  it('should split each line on the first equals sign', () => {
    expect(parseExtraFields(['name=tool', 'url = https://example.com/dl?a=b'])).toEqual({
      name: 'tool',
      url: 'https://example.com/dl?a=b'
    });
  });

  it('should skip blank lines', () => {
    expect(parseExtraFields(['', '   ', 'a=1'])).toEqual({ a: '1' });
  });

  it('should allow empty values', () => {
    expect(parseExtraFields(['suffix='])).toEqual({ suffix: '' });
  });

  it('should keep keys that name Object.prototype members as own fields', () => {
    const fields = parseExtraFields(['__proto__=x', 'a=1']);
    expect(Object.keys(fields)).toEqual(['__proto__', 'a']);
    expect(Object.getOwnPropertyDescriptor(fields, '__proto__')?.value).toBe('x');
    expect(Object.getPrototypeOf(fields)).toBe(Object.prototype);
  });

  it('should let a later line override an earlier one', () => {
    expect(parseExtraFields(['a=1', 'a=2'])).toEqual({ a: '2' });
  });

  it('should reject lines without a separator', () => {
    expect(() => parseExtraFields(['novalue'])).toThrow('Invalid extra field "novalue": expected key=value');
  });

  it('should reject empty keys', () => {
    expect(() => parseExtraFields([' =x'])).toThrow('Invalid extra field " =x": key is empty');
  });
});

describe('getInputs', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should read every input', () => {
    setInputs({ version: 'v1.0.0', system: 'linux', architecture: 'ARMv7', 'check-release': 'false' }, ['k=v']);
    vi.mocked(core.getBooleanInput).mockReturnValue(false);

    expect(getInputs()).toEqual({
      version: 'v1.0.0',
      system: 'linux',
      architecture: 'ARMv7',
      extraFields: { k: 'v' },
      checkRelease: false
    });
    expect(core.getBooleanInput).toHaveBeenCalledWith('check-release');
  });

  it('should fall back to latest and the host platform', () => {
    setInputs({});
    const platform = getPlatformInfo();

    expect(getInputs()).toEqual({
      version: 'latest',
      system: platform.system,
      architecture: platform.architecture,
      extraFields: {},
      checkRelease: true
    });
    expect(core.getBooleanInput).not.toHaveBeenCalled();
  });
});
