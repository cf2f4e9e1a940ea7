import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '../src/config.js';
import { getAllAdapters, getEnabledAdapters } from '../src/sources.js';

describe('source catalog', () => {
  it('lists every adapter in run order', () => {
    expect(getAllAdapters().map((adapter) => adapter.manifest.id)).toEqual([
      'remotive',
      'weworkremotely',
      'himalayas',
      'relocateme',
      'naukri',
      'linkedin',
    ]);
  });

  it('leaves out disabled sources', () => {
    expect(getEnabledAdapters(['linkedin', 'naukri']).map((adapter) => adapter.manifest.id)).toEqual([
      'remotive',
      'weworkremotely',
      'himalayas',
      'relocateme',
    ]);
  });

  it('rejects unknown source ids', () => {
    expect(() => getEnabledAdapters(['indeed'])).toThrow(ConfigurationError);
  });
});
