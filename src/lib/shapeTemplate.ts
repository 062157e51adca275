import { JSDOM } from 'jsdom';
import type { HexColor } from './types';
import { NO_DATA_FILL } from './constants';
import { ValidationError } from './errors';

const PAINTABLE = 'path, polygon, polyline, rect, circle, ellipse';

// Attributes added to painted shapes that do not set them already
const DEFAULT_STROKE: Record<string, string> = {
  stroke: '#000000',
  'stroke-width': '1',
  'stroke-miterlimit': '10',
};

/**
 * A vector drawing whose shapes can be filled by region id.
 * This is the only thing the renderer knows about the template format.
 */
export interface ShapeTemplate {
  readonly regionIds: string[];
  /** Markup with every region filled; regions missing from `fills` get `noDataFill`. */
  paint: (fills: ReadonlyMap<string, HexColor>, noDataFill?: string) => string;
}

function regionAttribute(el: Element): string | null {
  return el.getAttribute('data-region') ?? el.getAttribute('id');
}

/**
 * Region id per paintable element. Elements are addressed by `data-region`
 * or `id`; a template that names none of them is numbered 1..n in document order.
 */
function addressElements(elements: Element[]): { el: Element; region: string }[] {
  const named = elements.some(el => regionAttribute(el) !== null);

  if (!named) {
    return elements.map((el, i) => ({ el, region: String(i + 1) }));
  }

  const addressed: { el: Element; region: string }[] = [];
  for (const el of elements) {
    const region = regionAttribute(el)?.trim();
    if (region) addressed.push({ el, region });
  }
  return addressed;
}

function stripFillFromStyle(el: Element): void {
  const style = el.getAttribute('style');
  if (style === null) return;

  const kept = style
    .split(';')
    .map(s => s.trim())
    .filter(s => s !== '' && !/^fill\s*:/i.test(s));

  if (kept.length > 0) {
    el.setAttribute('style', kept.join('; '));
  } else {
    el.removeAttribute('style');
  }
}

function openTemplate(markup: string): JSDOM {
  const dom = new JSDOM(markup, { contentType: 'image/svg+xml' });
  const root = dom.window.document.documentElement;

  if (root.localName !== 'svg') {
    dom.window.close();
    throw new ValidationError('Shape template is not an SVG document');
  }
  return dom;
}

export function loadShapeTemplate(markup: string): ShapeTemplate {
  let probe: JSDOM;
  try {
    probe = openTemplate(markup);
  } catch (err) {
    if (err instanceof ValidationError) throw err;
    const reason = err instanceof Error ? err.message : String(err);
    throw new ValidationError(`Shape template could not be parsed: ${reason}`);
  }

  let regionIds: string[];
  try {
    const elements = Array.from(probe.window.document.querySelectorAll(PAINTABLE));
    regionIds = Array.from(new Set(addressElements(elements).map(a => a.region)));
  } finally {
    probe.window.close();
  }

  return {
    regionIds,
    paint: (fills, noDataFill = NO_DATA_FILL) => {
      // a fresh document per call keeps the template itself untouched
      const dom = openTemplate(markup);
      try {
        const document = dom.window.document;

        // class rules in <style> would override the fill attribute
        for (const style of Array.from(document.querySelectorAll('style'))) {
          style.remove();
        }

        const elements = Array.from(document.querySelectorAll(PAINTABLE));
        for (const { el, region } of addressElements(elements)) {
          el.setAttribute('fill', fills.get(region) ?? noDataFill);
          stripFillFromStyle(el);
          for (const [name, value] of Object.entries(DEFAULT_STROKE)) {
            if (!el.hasAttribute(name)) el.setAttribute(name, value);
          }
        }

        const serialized = dom.serialize();
        return serialized.startsWith('<?xml')
          ? serialized
          : `<?xml version="1.0" encoding="UTF-8"?>\n${serialized}`;
      } finally {
        dom.window.close();
      }
    },
  };
}
