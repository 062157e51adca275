import type { HexColor } from '@/lib/types';

export interface ColorStop {
  // position along the bar, 0 to 1
  offset: number;
  color: HexColor;
}

interface ColorbarProps {
  id: string;
  title: string;
  vmin: number;
  vmax: number;
  stops: ColorStop[];
  x?: number;
  y?: number;
  width?: number;
  height?: number;
}

const BAR_HEIGHT = 16;
const PADDING = 20;

export function formatTick(value: number): string {
  return value.toFixed(2);
}

/**
 * Horizontal color scale with ticks at vmin, midpoint and vmax
 */
export function Colorbar({ id, title, vmin, vmax, stops, x, y, width = 360, height = 80 }: ColorbarProps) {
  const barWidth = width - PADDING * 2;
  const barTop = 28;
  const ticks = [vmin, (vmin + vmax) / 2, vmax];
  const gradientId = `${id}-gradient`;

  return (
    <svg
      xmlns="http://www.w3.org/2000/svg"
      x={x}
      y={y}
      width={width}
      height={height}
      viewBox={`0 0 ${width} ${height}`}
    >
      <defs>
        <linearGradient id={gradientId} x1="0" y1="0" x2="1" y2="0">
          {stops.map(stop => (
            <stop key={stop.offset} offset={stop.offset} stopColor={stop.color} />
          ))}
        </linearGradient>
      </defs>
      <text x={width / 2} y={16} textAnchor="middle" fontSize={12} fontWeight="bold">
        {title}
      </text>
      <rect
        x={PADDING}
        y={barTop}
        width={barWidth}
        height={BAR_HEIGHT}
        fill={`url(#${gradientId})`}
        stroke="#000000"
        strokeWidth={1}
      />
      {ticks.map((tick, i) => {
        const tickX = PADDING + (barWidth * i) / 2;
        return (
          <g key={i}>
            <line x1={tickX} y1={barTop + BAR_HEIGHT} x2={tickX} y2={barTop + BAR_HEIGHT + 4} stroke="#000000" />
            <text x={tickX} y={barTop + BAR_HEIGHT + 16} textAnchor="middle" fontSize={10}>
              {formatTick(tick)}
            </text>
          </g>
        );
      })}
    </svg>
  );
}
