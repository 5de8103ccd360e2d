import { describe, it, expect } from 'vitest';
import { JsonFormat } from './json.js';
import { formatForPath } from './resolve.js';
import { TomlFormat } from './toml.js';

describe('formatForPath', () => {
  it('selects JSON for .json files in any case', () => {
    expect(formatForPath('config.json')).toBeInstanceOf(JsonFormat);
    expect(formatForPath('/etc/app/CONFIG.JSON')).toBeInstanceOf(JsonFormat);
  });

  it('selects TOML for everything else', () => {
    expect(formatForPath('config.toml')).toBeInstanceOf(TomlFormat);
    expect(formatForPath('config')).toBeInstanceOf(TomlFormat);
    expect(formatForPath('config.yaml')).toBeInstanceOf(TomlFormat);
  });
});
