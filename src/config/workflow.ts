import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import {
  AcknowledgmentSettings,
  Catalog,
  CatalogEntry,
  DiscountTier,
  QuotingSettings,
  WorkflowSettings,
} from '../shared/types/index.js';
import { ConfigurationError } from '../shared/utils/errors.js';
import { logger } from '../shared/utils/logger.js';

export const SETTINGS_FILE = 'defaults.json';
export const PRICE_LIST_FILE = 'price_list.json';
export const DISCOUNT_RULES_FILE = 'discount_rules.json';

const SettingsFileSchema = z.object({
  tax_rate: z.number().min(0).max(1),
  default_currency: z.string().min(1),
  quote_validity_days: z.number().int().min(0),
  sla_hours: z.number().int().positive(),
  company_name: z.string().min(1),
  contact_email: z.string().email(),
});

const PriceListFileSchema = z.record(
  z.string().trim().min(1),
  z.object({
    price: z.number().positive().finite(),
    unit: z.string().min(1).default('piece'),
    description: z.string().default(''),
  })
);

const DiscountRulesFileSchema = z.object({
  tiers: z.array(
    z.object({
      min_amount: z.number().min(0).finite(),
      // null or omitted means the tier has no upper bound
      max_amount: z.number().finite().nullable().optional(),
      discount: z.number().min(0).max(1),
    })
  ),
});

export type SettingsFile = z.input<typeof SettingsFileSchema>;
export type PriceListFile = z.input<typeof PriceListFileSchema>;
export type DiscountRulesFile = z.input<typeof DiscountRulesFileSchema>;

export const DEFAULT_SETTINGS: SettingsFile = {
  tax_rate: 0.095,
  default_currency: 'USD',
  quote_validity_days: 7,
  sla_hours: 24,
  company_name: 'Acme Corp',
  contact_email: 'sales@acme.com',
};

export const DEFAULT_PRICE_LIST: PriceListFile = {
  'Widget Pro': { price: 25.0, unit: 'piece' },
  'Gadget Basic': { price: 15.5, unit: 'piece' },
  'Tool Kit': { price: 45.0, unit: 'kit' },
  'Premium Widget': { price: 75.0, unit: 'piece' },
  'Bulk Pack': { price: 200.0, unit: 'pack' },
};

export const DEFAULT_DISCOUNT_RULES: DiscountRulesFile = {
  tiers: [
    { min_amount: 0, max_amount: 100, discount: 0.05 },
    { min_amount: 100, max_amount: 500, discount: 0.1 },
    { min_amount: 500, max_amount: 1000, discount: 0.15 },
    { min_amount: 1000, max_amount: null, discount: 0.2 },
  ],
};

function describeIssues(error: z.ZodError): string {
  return error.errors
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

export function parseSettings(raw: unknown): {
  quoting: QuotingSettings;
  acknowledgment: AcknowledgmentSettings;
} {
  const result = SettingsFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(`Invalid workflow settings: ${describeIssues(result.error)}`);
  }

  const data = result.data;
  return {
    quoting: {
      taxRate: data.tax_rate,
      defaultCurrency: data.default_currency,
      quoteValidityDays: data.quote_validity_days,
    },
    acknowledgment: {
      companyName: data.company_name,
      contactEmail: data.contact_email,
      slaHours: data.sla_hours,
    },
  };
}

export function parseCatalog(raw: unknown): Catalog {
  const result = PriceListFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(`Invalid price list: ${describeIssues(result.error)}`);
  }

  const catalog: Record<string, Readonly<CatalogEntry>> = {};
  for (const [name, entry] of Object.entries(result.data)) {
    catalog[name.trim()] = Object.freeze({ ...entry });
  }
  return Object.freeze(catalog);
}

/**
 * Tiers must be listed in ascending order, each starting where the previous one
 * ends. Only the last tier may be unbounded.
 */
export function parseDiscountTiers(raw: unknown): ReadonlyArray<Readonly<DiscountTier>> {
  const result = DiscountRulesFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(`Invalid discount rules: ${describeIssues(result.error)}`);
  }

  const tiers: Readonly<DiscountTier>[] = result.data.tiers.map((tier) =>
    Object.freeze({
      minAmount: tier.min_amount,
      maxAmount: tier.max_amount ?? Number.POSITIVE_INFINITY,
      discount: tier.discount,
    })
  );

  tiers.forEach((tier, index) => {
    if (tier.minAmount >= tier.maxAmount) {
      throw new ConfigurationError(
        `Invalid discount rules: tier ${index} has min_amount ${tier.minAmount} >= max_amount ${tier.maxAmount}`
      );
    }

    const previous = tiers[index - 1];
    if (previous && tier.minAmount !== previous.maxAmount) {
      const problem = tier.minAmount < previous.maxAmount ? 'overlaps' : 'leaves a gap after';
      throw new ConfigurationError(
        `Invalid discount rules: tier ${index} ${problem} tier ${index - 1} (${previous.maxAmount} -> ${tier.minAmount})`
      );
    }
  });

  return Object.freeze(tiers);
}

function readJsonFile(path: string): unknown {
  try {
    return JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Could not read ${path}: ${reason}`);
  }
}

function readOrDefault(configDir: string, file: string, fallback: unknown): unknown {
  const path = join(configDir, file);
  if (!existsSync(path)) {
    logger.warn({ path }, 'Workflow config file missing, using built-in defaults');
    return fallback;
  }
  return readJsonFile(path);
}

/**
 * Load and validate the settings, price list and discount tiers for one run.
 * The returned snapshot is frozen.
 */
export function loadWorkflowSettings(configDir: string): WorkflowSettings {
  const settings = parseSettings(readOrDefault(configDir, SETTINGS_FILE, DEFAULT_SETTINGS));
  const catalog = parseCatalog(readOrDefault(configDir, PRICE_LIST_FILE, DEFAULT_PRICE_LIST));
  const discountTiers = parseDiscountTiers(
    readOrDefault(configDir, DISCOUNT_RULES_FILE, DEFAULT_DISCOUNT_RULES)
  );

  logger.info(
    { configDir, products: Object.keys(catalog).length, tiers: discountTiers.length },
    'Workflow settings loaded'
  );

  return Object.freeze({
    quoting: Object.freeze(settings.quoting),
    acknowledgment: Object.freeze(settings.acknowledgment),
    catalog,
    discountTiers,
  });
}
