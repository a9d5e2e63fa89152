/**
 * Minimal HTML tag writer. Text and attribute values are always escaped;
 * closing tags must match the innermost open tag.
 */

export type HtmlAttributes = Record<string, string>;

const VOID_TAGS = new Set(['br', 'hr', 'meta', 'link']);

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export class HtmlWriter {
  private chunks: string[] = [];
  private open: string[] = [];

  openTag(name: string, attributes: HtmlAttributes = {}): this {
    const attrs = Object.entries(attributes)
      .map(([key, value]) => ` ${key}="${escapeHtml(value)}"`)
      .join('');
    this.chunks.push(`<${name}${attrs}>`);
    if (!VOID_TAGS.has(name)) this.open.push(name);
    return this;
  }

  closeTag(name: string): this {
    const current = this.open.pop();
    if (current !== name) {
      throw new Error(`Cannot close <${name}>: innermost open tag is ${current ? `<${current}>` : 'none'}`);
    }
    this.chunks.push(`</${name}>`);
    return this;
  }

  /** Open, write text, close */
  element(name: string, text: string, attributes: HtmlAttributes = {}): this {
    return this.openTag(name, attributes).text(text).closeTag(name);
  }

  text(value: string): this {
    this.chunks.push(escapeHtml(value));
    return this;
  }

  /** Unescaped markup, e.g. a doctype */
  raw(markup: string): this {
    this.chunks.push(markup);
    return this;
  }

  nl(): this {
    this.chunks.push('\n');
    return this;
  }

  finish(): string {
    if (this.open.length > 0) {
      throw new Error(`Unclosed tags: ${this.open.map(tag => `<${tag}>`).join(', ')}`);
    }
    return this.chunks.join('');
  }
}
