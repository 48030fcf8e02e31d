import { IExtractionStrategy } from '../interfaces/IExtractionStrategy';
import { StrategyId } from '../interfaces/types';
import { ContactInfoExtractor } from '../implementations/ContactInfoExtractor';
import { VendorTableStrategy } from '../strategies/VendorTableStrategy';
import { GenericTableStrategy } from '../strategies/GenericTableStrategy';
import { DefinitionListStrategy } from '../strategies/DefinitionListStrategy';
import { LoggingUtils } from '../utils/LoggingUtils';

/**
 * Priority order of the built-in strategies. The most specific format goes first
 * so that a vendor table is never read with the looser generic-table rules.
 */
export const DEFAULT_STRATEGY_ORDER: readonly StrategyId[] = [
  StrategyId.VENDOR_TABLE,
  StrategyId.GENERIC_TABLE,
  StrategyId.DEFINITION_LIST,
];

export interface StrategyFactoryOptions {
  /** Restrict the chain to these strategies; priority order is kept */
  only?: StrategyId[];
}

/**
 * Builds the ordered extraction strategy chain
 */
export class ExtractionStrategyFactory {
  private static readonly logger = LoggingUtils.createTaggedLogger('strategy-factory');

  static create(
    options: StrategyFactoryOptions = {},
    contacts: ContactInfoExtractor = new ContactInfoExtractor()
  ): IExtractionStrategy[] {
    const selected = options.only && options.only.length > 0
      ? DEFAULT_STRATEGY_ORDER.filter(id => options.only?.includes(id))
      : [...DEFAULT_STRATEGY_ORDER];

    if (options.only && options.only.length > 0) {
      this.logger.debug(`Strategy chain restricted to: ${selected.join(', ')}`);
    }

    return selected.map(id => this.createStrategy(id, contacts));
  }

  static createStrategy(id: StrategyId, contacts: ContactInfoExtractor = new ContactInfoExtractor()): IExtractionStrategy {
    switch (id) {
      case StrategyId.VENDOR_TABLE:
        return new VendorTableStrategy(contacts);
      case StrategyId.GENERIC_TABLE:
        return new GenericTableStrategy(contacts);
      case StrategyId.DEFINITION_LIST:
        return new DefinitionListStrategy(contacts);
    }
  }

  static isStrategyId(value: string): value is StrategyId {
    return Object.values(StrategyId).some(id => id === value);
  }
}
