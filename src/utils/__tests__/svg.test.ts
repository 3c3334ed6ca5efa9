import { describe, it, expect } from 'vitest';
import { attrs, element, escapeXml, svgDocument, text } from '../svg';

describe('svg helpers', () => {
  it('should escape markup characters', () => {
    expect(escapeXml('<a & "b">')).toBe('&lt;a &amp; &quot;b&quot;&gt;');
  });

  it('should round numbers and skip undefined attributes', () => {
    expect(attrs({ x: 1.234, y: undefined, fill: 'a"b' })).toBe('x="1.23" fill="a&quot;b"');
  });

  it('should self-close empty elements', () => {
    expect(element('rect', { x: 1 })).toBe('<rect x="1"/>');
  });

  it('should nest children', () => {
    expect(element('g', {}, ['<a/>', '<b/>'])).toBe('<g><a/><b/></g>');
  });

  it('should escape text content', () => {
    expect(text('a<b', { x: 1 })).toBe('<text x="1">a&lt;b</text>');
  });

  it('should wrap a document with a header and white background', () => {
    const doc = svgDocument(10, 20, []);
    expect(doc.startsWith('<?xml version="1.0" encoding="UTF-8"?>\n<svg ')).toBe(true);
    expect(doc).toContain('viewBox="0 0 10 20"');
    expect(doc).toContain('<rect x="0" y="0" width="10" height="20" fill="white"/>');
    expect(doc.endsWith('</svg>\n')).toBe(true);
  });
});
