import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { hasChildren, isTag, isText } from 'domhandler';
import type { AnyNode } from 'domhandler';

// Ruby annotations are left out; <noscript> content counts as page text
const NON_CONTENT_TAGS = new Set(['script', 'style', 'template', 'rt', 'rp']);

/**
 * Utilities for handling HTML content in the scraper service
 */
export class HtmlUtils {
  /**
   * Parse raw HTML into a queryable document. Parsed as a non-scripting
   * client, so markup inside <noscript> becomes elements rather than raw text.
   * @param html The HTML content
   */
  static parseDocument(html: string): CheerioAPI {
    return cheerio.load(html, { scriptingEnabled: false });
  }

  /**
   * Collect the text of every descendant text node, trimming each piece,
   * dropping empty pieces and joining the rest with `separator`.
   *
   * With the default empty separator, `<td> Jane <b>Doe</b> </td>` reads as
   * `JaneDoe`; with `' '` it reads as `Jane Doe`.
   */
  static strippedText(node: AnyNode, separator = ''): string {
    const parts: string[] = [];

    const walk = (current: AnyNode): void => {
      if (isText(current)) {
        const value = current.data.trim();
        if (value) {
          parts.push(value);
        }
        return;
      }
      if (isTag(current) && NON_CONTENT_TAGS.has(current.name)) {
        return;
      }
      if (hasChildren(current)) {
        current.children.forEach(walk);
      }
    };

    walk(node);
    return parts.join(separator);
  }
}
