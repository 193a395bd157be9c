import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, loadConfig } from '../lib/config';

describe('loadConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      rulesDir: 'rules',
      signalsDir: 'signals',
      workerPoolSize: 5,
      scheme: 'standard',
      domainWeights: { finance: 0.25, operations: 0.25, marketing: 0.2, people: 0.15, talent: 0.15 },
    });
  });

  it('reads valid values', () => {
    const cfg = loadConfig({
      RULES_DIR: ' /srv/rules ',
      WORKER_POOL_SIZE: '8',
      COMPOSITE_SCHEME: ' Granular ',
      DOMAIN_WEIGHTS: '{"finance":0.4,"marketing":0.6}',
    });
    expect(cfg.rulesDir).toBe('/srv/rules');
    expect(cfg.workerPoolSize).toBe(8);
    expect(cfg.scheme).toBe('granular');
    expect(cfg.domainWeights).toEqual({ finance: 0.4, marketing: 0.6 });
  });

  it('falls back on invalid values', () => {
    const cfg = loadConfig({
      RULES_DIR: '   ',
      WORKER_POOL_SIZE: '100',
      COMPOSITE_SCHEME: 'fancy',
      DOMAIN_WEIGHTS: '{"legal":1}',
    });
    expect(cfg).toEqual({ ...DEFAULT_CONFIG });
    expect(loadConfig({ WORKER_POOL_SIZE: 'many', DOMAIN_WEIGHTS: 'not json' })).toMatchObject({
      workerPoolSize: 5,
      domainWeights: DEFAULT_CONFIG.domainWeights,
    });
  });

  it('rejects negative weights', () => {
    expect(loadConfig({ DOMAIN_WEIGHTS: '{"finance":-1}' }).domainWeights).toBe(DEFAULT_CONFIG.domainWeights);
  });
});
