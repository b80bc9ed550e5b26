// @vitest-environment node
import { describe, expect, it } from 'vitest';
import { loadConfig } from '../../src/server/config.js';

describe('configuration', () => {
  it('applies defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config).toEqual({
      server: { port: 3001, host: '0.0.0.0' },
      persistence: { backend: 'memory', sqlitePath: '/tmp/store-cost-attribution.sqlite' },
      logLevel: 'info',
      collection: {
        lookbackHours: 1,
        intervalMinutes: 6,
        maxRetryAttempts: 3,
        retryBaseDelayMs: 1000,
        schedulerEnabled: true,
        runOnStartup: false,
        seedDemoData: true
      },
      engine: { windowMinutes: 60, allocationMethod: 'proportional', conservationTolerance: 0.01 },
      analytics: {
        decayHours: 2,
        patternLookbackDays: 7,
        anomalyDeviationThreshold: 2,
        anomalyHighSeverityThreshold: 5,
        spilloverCorrelationThreshold: 0.7,
        predictionMinHistory: 5
      }
    });
  });

  it('coerces numbers, flags and case-insensitive enums', () => {
    const config = loadConfig({
      PORT: '8080',
      ALLOCATION_METHOD: ' Token-Based ',
      LOG_LEVEL: 'DEBUG',
      TIME_WINDOW_MINUTES: '30',
      DECAY_HOURS: '0.5',
      SCHEDULER_ENABLED: 'false',
      PERSISTENCE_BACKEND: 'sqlite'
    });

    expect(config.server.port).toBe(8080);
    expect(config.engine.allocationMethod).toBe('token-based');
    expect(config.engine.windowMinutes).toBe(30);
    expect(config.logLevel).toBe('debug');
    expect(config.analytics.decayHours).toBe(0.5);
    expect(config.collection.schedulerEnabled).toBe(false);
    expect(config.persistence.backend).toBe('sqlite');
  });

  it('rejects invalid values with the offending keys', () => {
    let thrown: unknown;
    try {
      loadConfig({ ALLOCATION_METHOD: 'weighted', DECAY_HOURS: '0' });
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toMatchObject({ code: 'CONFIG_INVALID', recoverable: false });
    expect(thrown).toHaveProperty('details', [
      expect.objectContaining({ path: ['ALLOCATION_METHOD'] }),
      expect.objectContaining({ path: ['DECAY_HOURS'] })
    ]);
  });

  it('freezes the loaded configuration', () => {
    const config = loadConfig({});

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.engine)).toBe(true);
    expect(Object.isFrozen(config.analytics)).toBe(true);
  });
});
