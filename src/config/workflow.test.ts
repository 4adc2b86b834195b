import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  DEFAULT_SETTINGS,
  loadWorkflowSettings,
  parseCatalog,
  parseDiscountTiers,
  parseSettings,
} from './workflow.js';
import { ConfigurationError } from '../shared/utils/errors.js';

describe('parseSettings', () => {
  it('should split the settings file into quoting and acknowledgment settings', () => {
    expect(parseSettings(DEFAULT_SETTINGS)).toEqual({
      quoting: { taxRate: 0.095, defaultCurrency: 'USD', quoteValidityDays: 7 },
      acknowledgment: { companyName: 'Acme Corp', contactEmail: 'sales@acme.com', slaHours: 24 },
    });
  });

  it('should reject a tax rate outside [0, 1]', () => {
    expect(() => parseSettings({ ...DEFAULT_SETTINGS, tax_rate: 1.5 })).toThrow(
      'Invalid workflow settings: tax_rate: Number must be less than or equal to 1'
    );
  });
});

describe('parseCatalog', () => {
  it('should default the unit and description', () => {
    const catalog = parseCatalog({ 'Widget Pro': { price: 25 } });

    expect(catalog).toEqual({ 'Widget Pro': { price: 25, unit: 'piece', description: '' } });
    expect(Object.isFrozen(catalog)).toBe(true);
  });

  it('should reject non-positive prices', () => {
    expect(() => parseCatalog({ 'Widget Pro': { price: 0 } })).toThrow(ConfigurationError);
  });
});

describe('parseDiscountTiers', () => {
  it('should read an unbounded last tier', () => {
    const tiers = parseDiscountTiers({
      tiers: [
        { min_amount: 0, max_amount: 100, discount: 0.05 },
        { min_amount: 100, max_amount: null, discount: 0.1 },
      ],
    });

    expect(tiers).toEqual([
      { minAmount: 0, maxAmount: 100, discount: 0.05 },
      { minAmount: 100, maxAmount: Number.POSITIVE_INFINITY, discount: 0.1 },
    ]);
  });

  it('should reject an empty range', () => {
    expect(() =>
      parseDiscountTiers({
        tiers: [
          { min_amount: 0, max_amount: 100, discount: 0.05 },
          { min_amount: 100, max_amount: 100, discount: 0.1 },
        ],
      })
    ).toThrow('Invalid discount rules: tier 1 has min_amount 100 >= max_amount 100');
  });

  it('should reject gaps between tiers', () => {
    expect(() =>
      parseDiscountTiers({
        tiers: [
          { min_amount: 0, max_amount: 100, discount: 0.05 },
          { min_amount: 150, discount: 0.1 },
        ],
      })
    ).toThrow('Invalid discount rules: tier 1 leaves a gap after tier 0 (100 -> 150)');
  });

  it('should reject overlapping tiers', () => {
    expect(() =>
      parseDiscountTiers({
        tiers: [
          { min_amount: 0, max_amount: 100, discount: 0.05 },
          { min_amount: 50, max_amount: 200, discount: 0.1 },
        ],
      })
    ).toThrow('Invalid discount rules: tier 1 overlaps tier 0 (100 -> 50)');
  });

  it('should reject an unbounded tier that is not last', () => {
    expect(() =>
      parseDiscountTiers({
        tiers: [
          { min_amount: 0, max_amount: null, discount: 0.05 },
          { min_amount: 100, max_amount: 200, discount: 0.1 },
        ],
      })
    ).toThrow(ConfigurationError);
  });

  it('should reject negative bounds', () => {
    expect(() =>
      parseDiscountTiers({ tiers: [{ min_amount: -1, max_amount: 100, discount: 0.05 }] })
    ).toThrow(ConfigurationError);
  });
});

describe('loadWorkflowSettings', () => {
  let configDir: string;

  beforeEach(() => {
    configDir = mkdtempSync(join(tmpdir(), 'workflow-config-'));
  });

  afterEach(() => {
    rmSync(configDir, { recursive: true, force: true });
  });

  it('should fall back to built-in defaults for missing files', () => {
    const settings = loadWorkflowSettings(configDir);

    expect(settings.quoting.taxRate).toBe(0.095);
    expect(Object.keys(settings.catalog)).toEqual([
      'Widget Pro',
      'Gadget Basic',
      'Tool Kit',
      'Premium Widget',
      'Bulk Pack',
    ]);
    expect(settings.discountTiers).toHaveLength(4);
    expect(Object.isFrozen(settings)).toBe(true);
  });

  it('should read the files in the config directory', () => {
    writeFileSync(
      join(configDir, 'price_list.json'),
      JSON.stringify({ 'Flux Valve': { price: 12.5, unit: 'set' } })
    );

    const settings = loadWorkflowSettings(configDir);

    expect(settings.catalog).toEqual({ 'Flux Valve': { price: 12.5, unit: 'set', description: '' } });
  });

  it('should fail on invalid JSON', () => {
    writeFileSync(join(configDir, 'defaults.json'), '{ not json');

    expect(() => loadWorkflowSettings(configDir)).toThrow(/^Could not read .*defaults\.json/);
  });
});
