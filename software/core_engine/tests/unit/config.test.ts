import { describe, it, expect } from '@jest/globals';
import path from 'node:path';
import { loadEngineConfigFile, parseEngineConfig } from '../../src/config';
import { ConfigurationError } from '../../src/errors';

const fixture = (name: string) => path.join(__dirname, '..', 'fixtures', name);

function configError(fn: () => unknown): ConfigurationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigurationError) return error;
    throw error;
  }
  throw new Error('expected a ConfigurationError');
}

describe('parseEngineConfig', () => {
  it('accepts partial sections', () => {
    expect(parseEngineConfig({ collector: { intervalMs: 5 }, spectral: { gain: 'auto' } })).toEqual({
      collector: { intervalMs: 5 },
      spectral: { gain: 'auto' },
    });
    expect(parseEngineConfig({})).toEqual({});
  });

  it('lists every issue with its path', () => {
    const error = configError(() =>
      parseEngineConfig({ collector: { intervalMs: -1 }, online: { maxChunkBytes: 4096 }, bogus: true }),
    );

    expect(error.code).toBe('INVALID_CONFIGURATION');
    expect(error.issues).toHaveLength(3);
    expect(error.issues).toEqual(
      expect.arrayContaining([
        expect.stringMatching(/^collector\.intervalMs: /),
        expect.stringMatching(/^online\.maxChunkBytes: /),
        expect.stringMatching(/^\(root\): Unrecognized key/),
      ]),
    );
  });

  it('rejects a non-object', () => {
    expect(() => parseEngineConfig('fast please')).toThrow(ConfigurationError);
  });
});

describe('loadEngineConfigFile', () => {
  it('reads and validates a JSON file', async () => {
    const config = await loadEngineConfigFile(fixture('engine.config.json'));

    expect(config.collector).toEqual({ intervalMs: 5, bufferCapacity: 50000 });
    expect(config.spectral?.gain).toBe(20);
    expect(config.monitor?.flakyDevicePatterns).toEqual(['H808S', 'CL800']);
    expect(config.session?.autoMarkThreshold).toBe(0.75);
  });

  it('reports unreadable and invalid files', async () => {
    await expect(loadEngineConfigFile(fixture('missing.config.json'))).rejects.toThrow(/Cannot read config file/);
    await expect(loadEngineConfigFile(fixture('broken.config.json'))).rejects.toThrow(/is not valid JSON/);
  });
});
