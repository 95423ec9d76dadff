import type { CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import type { RawOverview } from '../types';
import type { SectionLocator } from './listing-strategies/section-locators';
import { ELEMENT_KEYS } from './listing-strategies/suumo.translations';
import { normalizeSpace, ownTextFragments } from '../utils/dom';

/**
 * OverviewExtractorService
 * Stateless service that turns a label/value overview table into a flat
 * mapping keyed by the raw source label
 */
export class OverviewExtractorService {
  /**
   * @param listLabel - label whose value spans every remaining value cell of its row
   */
  constructor(private readonly listLabel: string = ELEMENT_KEYS.TRAFFIC) {}

  /**
   * Extract the table that follows the heading found by `locator`.
   * A missing section yields `{}`.
   */
  extract($: CheerioAPI, locator: SectionLocator): RawOverview {
    const heading = locator.locate($);

    if (heading.length === 0) {
      console.warn(`⚠️  Overview section not found: ${locator.description}`);
      return {};
    }

    const rows = heading
      .closest('div.secTitleOuterR')
      .nextAll('table')
      .first()
      .children('tbody')
      .children('tr');

    const overview: RawOverview = {};
    rows.each((_, row) => {
      Object.assign(overview, this.parseRow($, row));
    });

    return overview;
  }

  /**
   * Pair label cells with value cells by position.
   * Labels without a value are left out.
   */
  parseRow($: CheerioAPI, row: Element): RawOverview {
    const labels = $(row).children('th').children('div').toArray().flatMap(ownTextFragments);
    const values = $(row).children('td').toArray().flatMap(ownTextFragments);

    const parsed: RawOverview = {};
    labels.forEach((label, index) => {
      if (index >= values.length) {
        return;
      }
      // Several transit lines share one label cell, so the list label takes
      // the rest of the row
      parsed[label] = label === this.listLabel ? values.slice(index) : values[index];
    });

    return parsed;
  }

  /**
   * Text of the value cell in the row whose header contains `label`,
   * whitespace-normalized. Null when no such row exists.
   */
  extractFieldValue($: CheerioAPI, label: string): string | null {
    const row = $('tr')
      .filter((_, tr) =>
        $(tr)
          .children('th')
          .children('div')
          .toArray()
          .some((div) => ownTextFragments(div).some((text) => text.includes(label)))
      )
      .first();

    if (row.length === 0) {
      return null;
    }

    const value = normalizeSpace(row.children('td').first().text());
    return value.length > 0 ? value : null;
  }
}
