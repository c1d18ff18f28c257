/**
 * Symbol Registry
 *
 * Static mapping from canonical ticker to each broker's instrument symbol,
 * listing venue and settlement currency. Pure data: loaded once from
 * `symbols.json`, never mutated. Supporting a new broker means adding rows.
 */

import fs from 'node:fs';
import { z } from 'zod';
import { createLogger } from '../utils/logger.js';
import { UnmappedInstrumentError } from '../utils/errors.js';

const log = createLogger('REGISTRY');

export const BROKERS = ['alpaca', 'swissquote'] as const;

export type BrokerId = (typeof BROKERS)[number];

export function isBrokerId(value: string): value is BrokerId {
  return BROKERS.some(b => b === value);
}

const BrokerIdSchema = z.enum(BROKERS);
const CurrencySchema = z.string().regex(/^[A-Z]{3}$/, 'expected an ISO 4217 code');

const InstrumentSchema = z.object({
  ticker: z.string().min(1),
  displayName: z.string().min(1),
});

const MappingSchema = z.object({
  ticker: z.string().min(1),
  broker: BrokerIdSchema,
  brokerSymbol: z.string().min(1),
  currency: CurrencySchema,
  venue: z.string().min(1),
});

const ProfileSchema = z.object({
  broker: BrokerIdSchema,
  displayName: z.string(),
  fractional: z.boolean(),
  quantityDecimals: z.number().int().min(0).max(9),
});

const SymbolTableSchema = z.object({
  brokers: z.array(ProfileSchema),
  instruments: z.array(InstrumentSchema),
  mappings: z.array(MappingSchema),
});

export type CanonicalInstrument = z.infer<typeof InstrumentSchema>;
export type BrokerSymbolMapping = z.infer<typeof MappingSchema>;
export type BrokerProfile = z.infer<typeof ProfileSchema>;
export type SymbolTable = z.infer<typeof SymbolTableSchema>;

function mappingKey(ticker: string, broker: BrokerId): string {
  return `${ticker}@${broker}`;
}

export class SymbolRegistry {
  private readonly instruments = new Map<string, CanonicalInstrument>();
  private readonly mappings = new Map<string, BrokerSymbolMapping>();
  private readonly profiles = new Map<BrokerId, BrokerProfile>();

  constructor(table: SymbolTable) {
    const problems: string[] = [];

    for (const profile of table.brokers) {
      if (this.profiles.has(profile.broker)) problems.push(`duplicate broker profile '${profile.broker}'`);
      this.profiles.set(profile.broker, Object.freeze({ ...profile }));
    }
    for (const broker of BROKERS) {
      if (!this.profiles.has(broker)) problems.push(`missing broker profile '${broker}'`);
    }

    for (const instrument of table.instruments) {
      if (this.instruments.has(instrument.ticker)) problems.push(`duplicate instrument '${instrument.ticker}'`);
      this.instruments.set(instrument.ticker, Object.freeze({ ...instrument }));
    }

    for (const mapping of table.mappings) {
      const key = mappingKey(mapping.ticker, mapping.broker);
      if (this.mappings.has(key)) problems.push(`duplicate mapping for ${mapping.ticker} on ${mapping.broker}`);
      if (!this.instruments.has(mapping.ticker)) problems.push(`mapping for unknown instrument '${mapping.ticker}'`);
      this.mappings.set(key, Object.freeze({ ...mapping }));
    }

    if (problems.length > 0) {
      throw new Error(`Invalid symbol table: ${problems.join('; ')}`);
    }

    log.debug('Registry loaded', { instruments: this.instruments.size, mappings: this.mappings.size });
  }

  static fromFile(filePath: string): SymbolRegistry {
    const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    return new SymbolRegistry(SymbolTableSchema.parse(raw));
  }

  static fromTable(table: unknown): SymbolRegistry {
    return new SymbolRegistry(SymbolTableSchema.parse(table));
  }

  resolve(ticker: string, broker: BrokerId): BrokerSymbolMapping {
    const mapping = this.mappings.get(mappingKey(ticker, broker));
    if (!mapping) throw new UnmappedInstrumentError(ticker, broker);
    return { ...mapping };
  }

  instrument(ticker: string): CanonicalInstrument | undefined {
    const instrument = this.instruments.get(ticker);
    return instrument ? { ...instrument } : undefined;
  }

  profile(broker: BrokerId): BrokerProfile {
    const profile = this.profiles.get(broker);
    if (!profile) throw new Error(`No profile for broker '${broker}'`);
    return { ...profile };
  }

  mappingsFor(broker: BrokerId): BrokerSymbolMapping[] {
    return [...this.mappings.values()].filter(m => m.broker === broker).map(m => ({ ...m }));
  }
}
