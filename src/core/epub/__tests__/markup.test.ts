import { describe, it, expect } from 'vitest';
import { UnitParseError } from '../../errors.js';
import { attrValue, descendantElements, findById, localName, parseMarkup, stripTags, textOf } from '../markup.js';

describe('parseMarkup', () => {
  it('parses XHTML and finds elements by local name', () => {
    const doc = parseMarkup(
      '<html xmlns="http://www.w3.org/1999/xhtml" xmlns:svg="http://www.w3.org/2000/svg" xmlns:xlink="http://www.w3.org/1999/xlink">'
      + '<body><p id="a">  One\n  two </p><svg:svg><svg:image xlink:href="pic.jpg"/></svg:svg></body></html>',
      'unit.xhtml',
    );
    const image = descendantElements(doc, ['image'])[0];
    expect(localName(image)).toBe('image');
    expect(attrValue(image, 'href')).toBe('pic.jpg');

    const p = findById(doc, 'a');
    expect(p && textOf(p)).toBe('One two');
    expect(findById(doc, 'missing')).toBeNull();
  });

  it('fails on a document without a root element', () => {
    expect(() => parseMarkup('', 'empty.xhtml')).toThrow(UnitParseError);
  });
});

describe('stripTags', () => {
  it('drops head, script and tags and decodes entities', () => {
    const markup = '<html><head><title>T</title></head><body><p>A &amp; B&#8212;C</p>'
      + '<script>x()</script><header>Top&nbsp;&#x21;</header></body></html>';
    expect(stripTags(markup)).toBe('A & B—C Top !');
  });

  it('decodes HTML named entities and keeps unknown ones', () => {
    expect(stripTags('<p>It&rsquo;s&nbsp;caf&eacute; &bogus;</p>')).toBe('It\u2019s caf\u00E9 &bogus;');
  });
});
