import type { CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { HtmlUtils } from '../utils/HtmlUtils';

/**
 * Ten-digit North American number, optionally split 3-3-4 by a hyphen, dot or
 * single whitespace character.
 */
export const PHONE_PATTERN = /\b\d{3}[-.\s]?\d{3}[-.\s]?\d{4}\b/;

const MAILTO_PATTERN = /^mailto:/i;

export interface ContactInfo {
  email: string;
  phone: string;
}

/**
 * Finds the first email address and phone number across a list of fragments
 * (table cells, list details). Both are searched independently, so the email may
 * come from a later fragment than the phone.
 */
export class ContactInfoExtractor {
  extract($: CheerioAPI, fragments: Element[]): ContactInfo {
    let email: string | null = null;
    let phone: string | null = null;

    for (const fragment of fragments) {
      if (email === null) {
        email = this.findEmail($, fragment);
      }
      if (phone === null) {
        phone = this.findPhone(fragment);
      }
      if (email !== null && phone !== null) {
        break;
      }
    }

    return { email: email ?? '', phone: phone ?? '' };
  }

  /**
   * Returns null when the fragment has no mail link. A mail link settles the
   * search even when neither its text nor its target yields an address.
   */
  private findEmail($: CheerioAPI, fragment: Element): string | null {
    const link = $(fragment)
      .find('a[href]')
      .filter((_, anchor) => MAILTO_PATTERN.test($(anchor).attr('href') ?? ''))
      .first();

    if (link.length === 0) {
      return null;
    }

    const text = HtmlUtils.strippedText(link[0]);
    if (text.includes('@')) {
      return text;
    }
    return (link.attr('href') ?? '').replace(MAILTO_PATTERN, '');
  }

  private findPhone(fragment: Element): string | null {
    const match = PHONE_PATTERN.exec(HtmlUtils.strippedText(fragment, ' '));
    return match ? match[0] : null;
  }
}
