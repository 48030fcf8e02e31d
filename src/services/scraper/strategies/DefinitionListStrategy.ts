import type { CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { IExtractionStrategy } from '../interfaces/IExtractionStrategy';
import { StaffRecord, StrategyId } from '../interfaces/types';
import { ContactInfoExtractor } from '../implementations/ContactInfoExtractor';
import { HtmlUtils } from '../utils/HtmlUtils';
import { LoggingUtils } from '../utils/LoggingUtils';

export const DEFINITION_LIST_DEFAULT_CATEGORY = 'Unknown Department';

const LEADING_SEPARATORS = /^[,\-–\s]+/;

interface ListFold {
  category: string;
  records: StaffRecord[];
}

/**
 * Split free text into a name and a title at the first run of whitespace.
 *
 * This is a rough heuristic: "Jones – Trainer" gives Jones / Trainer, but a
 * multi-word name such as "Jane Doe Coach" gives Jane / Doe Coach.
 */
export function splitNameAndTitle(text: string): { name: string; title: string } {
  const trimmed = text.trim();
  const gap = /\s+/.exec(trimmed);
  if (!gap) {
    return { name: trimmed, title: '' };
  }

  const name = trimmed.slice(0, gap.index);
  const rest = trimmed.slice(gap.index + gap[0].length);
  return { name, title: rest.replace(LEADING_SEPARATORS, '').trim() };
}

/**
 * Extracts staff from definition lists where each <dt> names a department and
 * the <dd> elements after it hold "Name Title email phone" as free text.
 */
export class DefinitionListStrategy implements IExtractionStrategy {
  readonly id = StrategyId.DEFINITION_LIST;
  readonly name = 'Definition List';

  private readonly logger = LoggingUtils.createTaggedLogger('strategy');

  constructor(private readonly contacts: ContactInfoExtractor = new ContactInfoExtractor()) {}

  extract($: CheerioAPI, sourceUrl: string): StaffRecord[] {
    const lists = $('dl').toArray();
    if (lists.length === 0) {
      return [];
    }

    this.logger.info('Trying definition list format...');
    const records = lists.flatMap(list => this.extractList($, list, sourceUrl));
    this.logger.info(`Extracted ${records.length} entries using definition list format`);
    return records;
  }

  private extractList($: CheerioAPI, list: Element, sourceUrl: string): StaffRecord[] {
    return $(list)
      .find('dt, dd')
      .toArray()
      .reduce<ListFold>(
        (fold, element) => this.foldElement($, fold, element, sourceUrl),
        { category: DEFINITION_LIST_DEFAULT_CATEGORY, records: [] }
      )
      .records;
  }

  private foldElement($: CheerioAPI, fold: ListFold, element: Element, sourceUrl: string): ListFold {
    if (element.name === 'dt') {
      const category = HtmlUtils.strippedText(element, ' ');
      if (!category) {
        return fold;
      }
      this.logger.debug(`Detected category: ${category}`);
      return { ...fold, category };
    }

    const record = this.parseDetail($, element, fold.category, sourceUrl);
    return record ? { ...fold, records: [...fold.records, record] } : fold;
  }

  private parseDetail(
    $: CheerioAPI,
    detail: Element,
    department: string,
    sourceUrl: string
  ): StaffRecord | null {
    const text = HtmlUtils.strippedText(detail, ' ');
    if (!text) {
      return null;
    }

    const { email, phone } = this.contacts.extract($, [detail]);

    let cleaned = text;
    if (email) {
      cleaned = cleaned.replaceAll(email, '');
    }
    if (phone) {
      cleaned = cleaned.replaceAll(phone, '');
    }

    const { name, title } = splitNameAndTitle(cleaned);
    if (!name) {
      return null;
    }

    return { name, email, title, phone, department, sourceUrl };
  }
}
