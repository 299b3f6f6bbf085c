import * as cheerio from "cheerio";
import type { Cheerio, CheerioAPI } from "cheerio";
import type { AnyNode } from "domhandler";

/**
 * A node in a parsed quote page. Strategies only see this interface, never
 * the parser behind it.
 */
export interface QuoteNode {
  readonly tagName: string;
  text(): string;
  attr(name: string): string | undefined;
  parent(): QuoteNode | undefined;
  children(): QuoteNode[];
  findAll(selector: string): QuoteNode[];
}

export interface QuoteDocument {
  find(selector: string): QuoteNode | undefined;
  findAll(selector: string): QuoteNode[];
  /** Visible text of the page (scripts and styles excluded). */
  pageText(): string;
  /** Raw contents of every <script> element, in document order. */
  scripts(type?: string): string[];
}

class CheerioNode implements QuoteNode {
  constructor(
    private readonly $: CheerioAPI,
    private readonly selection: Cheerio<AnyNode>
  ) {}

  get tagName(): string {
    const node = this.selection.get(0);
    return node && "tagName" in node ? node.tagName.toLowerCase() : "";
  }

  text(): string {
    return this.selection.text().replace(/\s+/g, " ").trim();
  }

  attr(name: string): string | undefined {
    return this.selection.attr(name);
  }

  parent(): QuoteNode | undefined {
    const parent = this.selection.parent();
    return parent.length > 0 ? new CheerioNode(this.$, parent) : undefined;
  }

  children(): QuoteNode[] {
    return wrapAll(this.$, this.selection.children());
  }

  findAll(selector: string): QuoteNode[] {
    return wrapAll(this.$, this.selection.find(selector));
  }
}

function wrapAll($: CheerioAPI, selection: Cheerio<AnyNode>): QuoteNode[] {
  return selection.toArray().map((node) => new CheerioNode($, $(node)));
}

export class CheerioQuoteDocument implements QuoteDocument {
  private readonly $: CheerioAPI;
  private visibleText?: string;

  constructor(html: string) {
    this.$ = cheerio.load(html);
  }

  find(selector: string): QuoteNode | undefined {
    return this.findAll(selector)[0];
  }

  findAll(selector: string): QuoteNode[] {
    return wrapAll(this.$, this.$(selector));
  }

  pageText(): string {
    if (this.visibleText === undefined) {
      const body = this.$("body").clone();
      body.find("script, style, noscript, template").remove();
      this.visibleText = body.text().replace(/\s+/g, " ").trim();
    }
    return this.visibleText;
  }

  scripts(type?: string): string[] {
    const selector = type ? `script[type="${type}"]` : "script";
    return this.$(selector)
      .toArray()
      .map((node) => this.$(node).text());
  }
}

export function parseQuoteDocument(html: string): QuoteDocument {
  return new CheerioQuoteDocument(html);
}
