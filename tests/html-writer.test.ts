/**
 * HTML Writer Tests
 */

import { describe, it, expect } from 'vitest';
import { HtmlWriter, escapeHtml } from '../src/lib/report/index.js';

describe('escapeHtml', () => {
  it('should escape markup and quote characters', () => {
    expect(escapeHtml(`<a href="x">Tom & 'Jerry'</a>`)).toBe(
      '&lt;a href=&quot;x&quot;&gt;Tom &amp; &#39;Jerry&#39;&lt;/a&gt;'
    );
  });

  it('should leave plain text alone', () => {
    expect(escapeHtml('x may be null')).toBe('x may be null');
  });
});

describe('HtmlWriter', () => {
  it('should write nested tags with attributes', () => {
    const html = new HtmlWriter()
      .openTag('td', { class: 'tag' })
      .element('a', 'NullAway', { href: 'https://docs.example/NullAway', target: 'errWin' })
      .closeTag('td')
      .finish();

    expect(html).toBe('<td class="tag"><a href="https://docs.example/NullAway" target="errWin">NullAway</a></td>');
  });

  it('should escape attribute values and text', () => {
    const html = new HtmlWriter().element('a', 'a<b', { href: '/x?a=1&b="2"' }).finish();
    expect(html).toBe('<a href="/x?a=1&amp;b=&quot;2&quot;">a&lt;b</a>');
  });

  it('should not expect void tags to be closed', () => {
    const html = new HtmlWriter().openTag('p').text('a').openTag('hr').openTag('br').closeTag('p').finish();
    expect(html).toBe('<p>a<hr><br></p>');
  });

  it('should write raw markup and newlines verbatim', () => {
    expect(new HtmlWriter().raw('<!DOCTYPE html>').nl().finish()).toBe('<!DOCTYPE html>\n');
  });

  it('should reject a closing tag that does not match', () => {
    const writer = new HtmlWriter().openTag('h3');
    expect(() => writer.closeTag('h2')).toThrow('Cannot close <h2>: innermost open tag is <h3>');
  });

  it('should reject a closing tag with nothing open', () => {
    expect(() => new HtmlWriter().closeTag('div')).toThrow('innermost open tag is none');
  });

  it('should reject unclosed tags on finish', () => {
    const writer = new HtmlWriter().openTag('html').openTag('body');
    expect(() => writer.finish()).toThrow('Unclosed tags: <html>, <body>');
  });
});
