/**
 * Small helpers for writing SVG markup as text (no DOM in Node)
 */

const ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeXml(text: string): string {
  return text.replace(/[&<>"']/g, char => ESCAPES[char] ?? char);
}

export type SvgAttributes = Record<string, string | number | undefined>;

// Round coordinates so output stays readable and stable
const formatValue = (value: string | number): string =>
  typeof value === 'number' ? String(Math.round(value * 100) / 100) : escapeXml(value);

export function attrs(attributes: SvgAttributes): string {
  return Object.entries(attributes)
    .filter((entry): entry is [string, string | number] => entry[1] !== undefined)
    .map(([name, value]) => `${name}="${formatValue(value)}"`)
    .join(' ');
}

export function element(name: string, attributes: SvgAttributes, children: string | string[] = ''): string {
  const body = Array.isArray(children) ? children.join('') : children;
  const open = `<${name} ${attrs(attributes)}`.trimEnd();
  return body ? `${open}>${body}</${name}>` : `${open}/>`;
}

export function text(content: string, attributes: SvgAttributes): string {
  return element('text', attributes, escapeXml(content));
}

export function svgDocument(width: number, height: number, children: string[]): string {
  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    element(
      'svg',
      {
        xmlns: 'http://www.w3.org/2000/svg',
        width,
        height,
        viewBox: `0 0 ${width} ${height}`,
        'font-family': 'DejaVu Sans, Arial, sans-serif',
      },
      [element('rect', { x: 0, y: 0, width, height, fill: 'white' }), ...children]
    ),
    '',
  ].join('\n');
}
