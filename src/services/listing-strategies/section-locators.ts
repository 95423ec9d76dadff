import type { Cheerio, CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { ELEMENT_KEYS } from './suumo.translations';
import { ownText } from '../../utils/dom';

const SECTION_HEADING_SELECTOR = 'div.secTitleOuterR > h3.secTitleInnerR';

/**
 * Finds the heading that introduces an overview table on a listing page
 */
export interface SectionLocator {
  readonly description: string;
  locate($: CheerioAPI): Cheerio<Element>;
}

function findHeadingContaining($: CheerioAPI, needle: string): Cheerio<Element> {
  return $(SECTION_HEADING_SELECTOR)
    .filter((_, heading) => ownText(heading).includes(needle))
    .first();
}

/**
 * Property overview: the heading repeats the property's own name followed
 * by a fixed suffix, which tells it apart from neighbouring unit tables.
 */
export class NameSuffixLocator implements SectionLocator {
  readonly description: string;
  private readonly needle: string;

  constructor(propertyName: string, suffix: string = ELEMENT_KEYS.APARTMENT_SUFFIX) {
    this.needle = propertyName + suffix;
    this.description = `heading containing "${this.needle}"`;
  }

  locate($: CheerioAPI): Cheerio<Element> {
    return findHeadingContaining($, this.needle);
  }
}

export class FixedMarkerLocator implements SectionLocator {
  readonly description: string;

  constructor(private readonly marker: string = ELEMENT_KEYS.COMMON_OVERVIEW) {
    this.description = `heading containing "${marker}"`;
  }

  locate($: CheerioAPI): Cheerio<Element> {
    return findHeadingContaining($, this.marker);
  }
}
