import { describe, it, expect } from 'vitest';
import { extractFragment, extractParagraphs } from '../extract.js';
import { parseMarkup } from '../markup.js';
import { xhtml } from '../../__tests__/fixtures.js';

const unit = xhtml(
  'Two',
  '<section id="s1"><h1>Chapter Two</h1><p>Alpha text.</p></section><section id="s2"><h2>Interlude</h2><p>Beta text.</p></section>',
  '<link rel="stylesheet" href="../Styles/main.css"/><link rel="icon" href="icon.png"/>',
);

describe('extractFragment', () => {
  it('splices the anchored element into a fresh document', () => {
    const extracted = extractFragment(unit, 'Text/ch02.xhtml', 's2', 'Interlude & More');
    expect(extracted.narrowed).toBe(true);
    expect(extracted.markup).toContain('<title>Interlude &amp; More</title>');
    expect(extracted.markup).toContain('Beta text.');
    expect(extracted.markup).not.toContain('Alpha text.');
    expect(extracted.markup).toContain('../Styles/main.css');
    expect(extracted.markup).not.toContain('icon.png');
    expect(() => parseMarkup(extracted.markup, 'out.xhtml')).not.toThrow();
  });

  it('decodes HTML named entities instead of escaping them again', () => {
    const markup = xhtml('Caf&eacute;', '<section id="s"><h1>Chapter&nbsp;One</h1><p>It&rsquo;s here</p></section>');
    const extracted = extractFragment(markup, 'a.xhtml', 's', 'T');
    expect(extracted.narrowed).toBe(true);
    expect(extracted.markup).toContain('<h1>Chapter\u00A0One</h1><p>It\u2019s here</p>');
    expect(extracted.markup).not.toContain('&amp;');
    expect(extractParagraphs(markup, 'a.xhtml')).toEqual(['Chapter One', 'It\u2019s here']);
  });

  it('keeps the whole unit without a fragment or when the anchor is missing', () => {
    expect(extractFragment(unit, 'Text/ch02.xhtml', null, 'Two')).toEqual({ markup: unit, narrowed: false });
    expect(extractFragment(unit, 'Text/ch02.xhtml', 'nope', 'Two')).toEqual({ markup: unit, narrowed: false });
  });

  it('keeps the whole unit when it does not parse', () => {
    expect(extractFragment('', 'Text/bad.xhtml', 's1', 'Bad')).toEqual({ markup: '', narrowed: false });
  });
});

describe('extractParagraphs', () => {
  it('yields one paragraph per block element', () => {
    expect(extractParagraphs(unit, 'Text/ch02.xhtml')).toEqual(['Chapter Two', 'Alpha text.', 'Interlude', 'Beta text.']);
  });

  it('joins inline content and line breaks', () => {
    const markup = xhtml('T', '<p>Hello <em>big</em> world<br/>again</p><div>Next<script>ignored()</script></div>');
    expect(extractParagraphs(markup, 'x.xhtml')).toEqual(['Hello big world again', 'Next']);
  });
});
