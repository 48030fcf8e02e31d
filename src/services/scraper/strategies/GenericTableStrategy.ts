import type { CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { IExtractionStrategy } from '../interfaces/IExtractionStrategy';
import { StaffRecord, StrategyId } from '../interfaces/types';
import { ContactInfoExtractor } from '../implementations/ContactInfoExtractor';
import { HtmlUtils } from '../utils/HtmlUtils';
import { LoggingUtils } from '../utils/LoggingUtils';

export const GENERIC_TABLE_DEFAULT_CATEGORY = 'General';

/** Spanning cells with at least this many characters (code points) are treated as data, not headings */
const HEADING_MAX_LENGTH = 50;

interface TableFold {
  category: string;
  records: StaffRecord[];
}

/**
 * Extracts staff from the first table on the page.
 *
 * Rows that look like section headings ("Football", "Athletics Department")
 * switch the department for the rows beneath them. Other rows are read as
 * [photo,] name, title, ... with contact details anywhere in the row.
 */
export class GenericTableStrategy implements IExtractionStrategy {
  readonly id = StrategyId.GENERIC_TABLE;
  readonly name = 'Generic Table';

  private readonly logger = LoggingUtils.createTaggedLogger('strategy');

  constructor(private readonly contacts: ContactInfoExtractor = new ContactInfoExtractor()) {}

  extract($: CheerioAPI, sourceUrl: string): StaffRecord[] {
    const table = $('table').first();
    if (table.length === 0) {
      return [];
    }

    this.logger.info('Trying generic table format...');
    const { records } = table
      .find('tr')
      .toArray()
      .reduce<TableFold>(
        (fold, row) => this.foldRow($, fold, row, sourceUrl),
        { category: GENERIC_TABLE_DEFAULT_CATEGORY, records: [] }
      );

    this.logger.info(`Extracted ${records.length} entries using generic table format`);
    return records;
  }

  private foldRow($: CheerioAPI, fold: TableFold, row: Element, sourceUrl: string): TableFold {
    const cells = $(row).find('td').toArray();
    // header rows (th only) and empty rows
    if (cells.length === 0) {
      return fold;
    }

    if (this.isHeading($, cells)) {
      const category = HtmlUtils.strippedText(cells[0], ' ');
      if (!category) {
        return fold;
      }
      this.logger.debug(`Detected category: ${category}`);
      return { ...fold, category };
    }

    const record = this.parseDataRow($, cells, fold.category, sourceUrl);
    return record ? { ...fold, records: [...fold.records, record] } : fold;
  }

  /**
   * A heading is a lone non-empty cell, or a first cell with a colspan whose
   * text is short and unlinked.
   */
  private isHeading($: CheerioAPI, cells: Element[]): boolean {
    const first = $(cells[0]);
    const text = HtmlUtils.strippedText(cells[0]);

    if (cells.length === 1 && text !== '') {
      return true;
    }
    return Boolean(first.attr('colspan'))
      && [...text].length < HEADING_MAX_LENGTH
      && first.find('a').length === 0;
  }

  private parseDataRow(
    $: CheerioAPI,
    cells: Element[],
    department: string,
    sourceUrl: string
  ): StaffRecord | null {
    // leading photo column
    const start = $(cells[0]).find('img').length > 0 && cells.length > 1 ? 1 : 0;

    const nameCell = cells[start];
    const nameLink = $(nameCell).find('a').first();
    const name = nameLink.length > 0
      ? HtmlUtils.strippedText(nameLink[0])
      : HtmlUtils.strippedText(nameCell, ' ');
    if (!name) {
      return null;
    }

    const title = cells.length > start + 1 ? HtmlUtils.strippedText(cells[start + 1], ' ') : '';
    const { email, phone } = this.contacts.extract($, cells);

    return { name, email, title, phone, department, sourceUrl };
  }
}
