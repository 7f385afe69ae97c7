import { load, type CheerioAPI } from 'cheerio';
import { hasChildren, isTag, isText, type AnyNode } from 'domhandler';
/** Element lookup against a live, rendered page. */
export interface LiveLocator {
  textOf(expression: string): Promise<string | null>;
}

/** What `PageLocator` needs from a Playwright locator. */
export interface LocatorHandle {
  first(): LocatorHandle;
  count(): Promise<number>;
  innerText(options?: { timeout?: number }): Promise<string>;
}

export interface LocatorSource {
  locator(selector: string): LocatorHandle;
}

const LOCATOR_TIMEOUT_MS = 2000;

const ENGINE_PREFIX = /^[a-z0-9_-]+=/i;

// Content of these elements is never rendered as text
const NON_TEXT_TAGS = new Set(['script', 'style', 'template', 'noscript']);

export class PageLocator implements LiveLocator {
  constructor(private page: LocatorSource) {}

  async textOf(expression: string): Promise<string | null> {
    // entries are XPath unless they name a selector engine, e.g. `css=...`
    const selector = ENGINE_PREFIX.test(expression) ? expression : `xpath=${expression}`;
    const target = this.page.locator(selector).first();
    if ((await target.count()) === 0) return null;
    return target.innerText({ timeout: LOCATOR_TIMEOUT_MS });
  }
}

function collectText(nodes: AnyNode[], out: string[]): void {
  for (const node of nodes) {
    if (isText(node)) {
      out.push(node.data);
    } else if (isTag(node) && NON_TEXT_TAGS.has(node.name)) {
      continue;
    } else if (hasChildren(node)) {
      collectText(node.children, out);
    }
  }
}

/**
 * A parsed page. Static markup is always queryable through cheerio; a
 * document built from a rendered page also carries a live locator.
 */
export class ParsedDocument {
  private text: string | null = null;

  private constructor(readonly $: CheerioAPI, readonly live?: LiveLocator) {}

  static fromHtml(html: string, live?: LiveLocator): ParsedDocument {
    return new ParsedDocument(load(html), live);
  }

  get liveLocatorCapable(): boolean {
    return this.live !== undefined;
  }

  /** Text of the first element matching `selector`, script and style content excluded. */
  elementText(selector: string): string {
    const parts: string[] = [];
    collectText(this.$(selector).first().toArray(), parts);
    return parts.join('');
  }

  /** Every text node, newline-joined, computed once per document. */
  visibleText(): string {
    if (this.text === null) {
      const parts: string[] = [];
      collectText(this.$.root().toArray(), parts);
      this.text = parts.join('\n');
    }
    return this.text;
  }
}
