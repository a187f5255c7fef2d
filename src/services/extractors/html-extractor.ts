import { JSDOM } from "jsdom";

import { logger } from "../../util/logger.js";
import { ExtractionFailure, SessionFailure, errorMessage } from "../../util/errors.js";
import { extractPhoneNumber, extractPostalCode, normalizeText } from "../../util/text.js";
import { DETAIL_FIELDS, type FieldRule, type SourceDefinition } from "../../util/sources.js";
import type { Extractor } from "../crawler/interfaces.js";
import { createShopRecord, type ShopFields, type ShopRecord } from "../crawler/records.js";
import type { PageFetcher } from "./http-client.js";

export function parseHtml(html: string, url?: string): Document {
  return new JSDOM(html, { url }).window.document;
}

function firstGroup(pattern: string, text: string): string | null {
  const match = new RegExp(pattern).exec(text);
  if (!match) {
    return null;
  }
  return match[1] ?? match[0];
}

// `selector` picks an element (its text, or `attribute`); `regex` then narrows
// the value to its first capture group. A rule with only a regex runs against
// the page text.
export function applyRule(document: Document, rule: FieldRule): string | null {
  let value: string | null;

  if (rule.selector) {
    const element = document.querySelector(rule.selector);
    if (!element) {
      return null;
    }
    value = rule.attribute ? element.getAttribute(rule.attribute) : element.textContent;
  } else {
    value = document.body?.textContent ?? null;
  }

  if (value !== null && rule.regex) {
    value = firstGroup(rule.regex, value);
  }

  return normalizeText(value);
}

export function applyRules(document: Document, rules: FieldRule[] | undefined): string | null {
  for (const rule of rules ?? []) {
    const value = applyRule(document, rule);
    if (value) {
      return value;
    }
  }
  return null;
}

/**
 * Config-driven extractor for static HTML listings: a list page template
 * with a link selector, and field rules for the detail pages.
 */
export class HtmlExtractor implements Extractor<ShopRecord> {
  readonly sourceId: string;

  private readonly source: SourceDefinition;
  private readonly fetcher: PageFetcher;
  private readonly host: string;
  private readonly detailPattern: RegExp | null;
  private token: string | null = null;

  constructor(source: SourceDefinition, fetcher: PageFetcher) {
    this.source = source;
    this.sourceId = source.id;
    this.fetcher = fetcher;
    this.host = new URL(source.baseUrl).host;
    this.detailPattern = source.listPage.detailPattern
      ? new RegExp(source.listPage.detailPattern)
      : null;
  }

  async init() {
    const { session } = this.source;
    if (!session) {
      return;
    }

    let html: string;
    try {
      html = await this.fetcher.fetchText(session.url);
    } catch (e) {
      throw new SessionFailure(`Unable to open session for ${this.sourceId}: ${errorMessage(e)}`, {
        cause: e,
        details: { url: session.url },
      });
    }

    const token = firstGroup(session.tokenPattern, html);
    if (!token) {
      throw new SessionFailure(`Session token not found for ${this.sourceId}`, {
        details: { url: session.url },
      });
    }

    this.token = token;
    logger.info("Session token acquired", { sourceId: this.sourceId }, "session");
  }

  listPageUrl(page: number): string {
    const template = this.source.listPage.url;
    let url = template.replaceAll("{page}", String(page));

    if (template.includes("{token}")) {
      if (!this.token) {
        throw new SessionFailure(`No session token for ${this.sourceId}`);
      }
      url = url.replaceAll("{token}", encodeURIComponent(this.token));
    }

    return new URL(url, this.source.baseUrl).href;
  }

  async listPage(page: number): Promise<string[]> {
    const pageUrl = this.listPageUrl(page);
    const html = await this.fetcher.fetchText(pageUrl);
    return this.extractLinks(html, pageUrl);
  }

  extractLinks(html: string, pageUrl: string): string[] {
    const document = parseHtml(html);
    const links = new Set<string>();

    for (const anchor of document.querySelectorAll(this.source.listPage.linkSelector)) {
      const href = anchor.getAttribute("href");
      if (!href) {
        continue;
      }

      let url: URL;
      try {
        url = new URL(href, pageUrl);
      } catch (e) {
        logger.debug("Skipping invalid link", { href, error: errorMessage(e) }, "links");
        continue;
      }

      url.hash = "";
      if (url.host !== this.host) {
        continue;
      }
      if (this.detailPattern && !this.detailPattern.test(url.href)) {
        continue;
      }
      links.add(url.href);
    }

    return [...links];
  }

  async fetchRecord(link: string): Promise<ShopRecord | null> {
    const html = await this.fetcher.fetchText(link);
    return this.parseRecord(html, link);
  }

  parseRecord(html: string, link: string): ShopRecord {
    const document = parseHtml(html, link);
    const { fields: rules, extraFields: extraRules } = this.source.detail;

    const name = applyRules(document, rules.name);
    if (!name) {
      throw new ExtractionFailure(`No shop name found at ${link}`, { details: { link } });
    }

    const fields: ShopFields = { name };
    for (const field of DETAIL_FIELDS) {
      if (field !== "name") {
        fields[field] = applyRules(document, rules[field]);
      }
    }

    if (fields.phone) {
      fields.phone = extractPhoneNumber(fields.phone) ?? fields.phone;
    }
    if (!fields.postalCode) {
      fields.postalCode = extractPostalCode(fields.address);
    }

    const extraFields: Record<string, string> = {};
    for (const [key, fieldRules] of Object.entries(extraRules)) {
      const value = applyRules(document, fieldRules);
      if (value) {
        extraFields[key] = value;
      }
    }

    return createShopRecord(this.source, link, fields, extraFields);
  }

  async close() {
    this.token = null;
  }
}
