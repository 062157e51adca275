import { renderToStaticMarkup } from 'react-dom/server';
import { Colorbar, type ColorStop } from '@/components/Colorbar';
import { COLORBAR_STOPS, METRIC_LABELS } from '@/lib/constants';
import type { MetricScale } from '@/lib/types';

const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>\n';

export function colorbarFileName(scale: MetricScale): string {
  return `colorbar_${scale.range.metric}_${scale.range.scope}.svg`;
}

/**
 * Gradient stops sampled from the same interpolator the mapping rows used
 */
export function colorbarStops(scale: MetricScale, count = COLORBAR_STOPS): ColorStop[] {
  return Array.from({ length: count }, (_, i) => {
    const offset = i / (count - 1);
    return { offset, color: scale.colormap.interpolate(offset) };
  });
}

/**
 * Standalone legend for one computed range
 */
export function renderColorbar(scale: MetricScale): string {
  const { metric, scope, vmin, vmax } = scale.range;
  const markup = renderToStaticMarkup(
    <Colorbar
      id={`colorbar-${metric}-${scope}`}
      title={`${METRIC_LABELS[metric]} color scale`}
      vmin={vmin}
      vmax={vmax}
      stops={colorbarStops(scale)}
    />
  );
  return `${XML_DECLARATION}${markup}\n`;
}
