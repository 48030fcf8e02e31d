import type { CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { IExtractionStrategy } from '../interfaces/IExtractionStrategy';
import { StaffRecord, StrategyId } from '../interfaces/types';
import { ContactInfoExtractor } from '../implementations/ContactInfoExtractor';
import { HtmlUtils } from '../utils/HtmlUtils';
import { LoggingUtils } from '../utils/LoggingUtils';

/**
 * Row class used by the staff directory tables of a widely used college
 * athletics site platform.
 */
export const VENDOR_ROW_SELECTOR = 'tr[class*="s-table-body__row"]';

/**
 * Extracts staff from vendor-styled directory tables.
 *
 * Cell 0 usually carries a headshot, cell 1 the name (often linked to a bio) and
 * cell 2 the title. Rows carry no department, so it is left empty.
 */
export class VendorTableStrategy implements IExtractionStrategy {
  readonly id = StrategyId.VENDOR_TABLE;
  readonly name = 'Vendor Table';

  private readonly logger = LoggingUtils.createTaggedLogger('strategy');

  constructor(private readonly contacts: ContactInfoExtractor = new ContactInfoExtractor()) {}

  extract($: CheerioAPI, sourceUrl: string): StaffRecord[] {
    const rows = $(VENDOR_ROW_SELECTOR).toArray();
    if (rows.length === 0) {
      return [];
    }

    this.logger.info(`Trying vendor table format... found ${rows.length} potential rows`);
    const records = rows.flatMap(row => this.parseRow($, row, sourceUrl));
    this.logger.info(`Extracted ${records.length} entries using vendor table format`);
    return records;
  }

  private parseRow($: CheerioAPI, row: Element, sourceUrl: string): StaffRecord[] {
    const cells = $(row).find('td').toArray();
    if (cells.length < 2) {
      return [];
    }

    const nameCell = cells[1];
    const nameLink = $(nameCell).find('a').first();
    const name = nameLink.length > 0
      ? HtmlUtils.strippedText(nameLink[0])
      : HtmlUtils.strippedText(nameCell);
    if (!name) {
      return [];
    }

    const title = cells.length > 2 ? HtmlUtils.strippedText(cells[2]) : '';
    const { email, phone } = this.contacts.extract($, cells);

    return [{ name, email, title, phone, department: '', sourceUrl }];
  }
}
