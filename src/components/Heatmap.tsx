import type { HexColor } from '@/lib/types';
import { NO_DATA_FILL } from '@/lib/constants';
import { Colorbar, type ColorStop } from './Colorbar';

export interface HeatmapCell {
  color: HexColor;
  value: number;
}

// value range and stops of the colors actually drawn
export interface HeatmapLegend {
  vmin: number;
  vmax: number;
  stops: ColorStop[];
}

interface HeatmapProps {
  id: string;
  title: string;
  legendTitle: string;
  groups: string[];
  regions: string[];
  // keyed by heatmapCellKey(group, region)
  cells: ReadonlyMap<string, HeatmapCell>;
  legend: HeatmapLegend;
}

const CELL = 40;
const LEFT = 90;
const TOP = 50;
const LABEL_SPACE = 50;
const LEGEND_HEIGHT = 80;

export const heatmapCellKey = (group: string, region: string) => `${group}\u0000${region}`;

/**
 * Slice x region grid. Cell fills come from the mapping table as they are;
 * pairs without a row are drawn in the no-data fill.
 */
export function Heatmap({ id, title, legendTitle, groups, regions, cells, legend }: HeatmapProps) {
  const gridWidth = regions.length * CELL;
  const gridHeight = groups.length * CELL;
  const width = Math.max(LEFT + gridWidth + 20, 400);
  const height = TOP + gridHeight + LABEL_SPACE + LEGEND_HEIGHT;

  return (
    <svg xmlns="http://www.w3.org/2000/svg" width={width} height={height} viewBox={`0 0 ${width} ${height}`}>
      <text x={width / 2} y={24} textAnchor="middle" fontSize={14} fontWeight="bold">
        {title}
      </text>
      {groups.map((group, row) =>
        regions.map((region, col) => {
          const cell = cells.get(heatmapCellKey(group, region));
          return (
            <rect
              key={heatmapCellKey(group, region)}
              data-group={group}
              data-region={region}
              data-no-data={cell ? undefined : 'true'}
              x={LEFT + col * CELL}
              y={TOP + row * CELL}
              width={CELL}
              height={CELL}
              fill={cell ? cell.color : NO_DATA_FILL}
              stroke="#ffffff"
              strokeWidth={1}
            >
              <title>{cell ? `Group ${group}, Region ${region}: ${cell.value}` : `Group ${group}, Region ${region}: no data`}</title>
            </rect>
          );
        })
      )}
      {groups.map((group, row) => (
        <text key={group} x={LEFT - 8} y={TOP + row * CELL + CELL / 2 + 4} textAnchor="end" fontSize={10}>
          {`Group ${group}`}
        </text>
      ))}
      {regions.map((region, col) => (
        <text
          key={region}
          x={LEFT + col * CELL + CELL / 2}
          y={TOP + gridHeight + 16}
          textAnchor="middle"
          fontSize={10}
        >
          {`Region ${region}`}
        </text>
      ))}
      <Colorbar
        id={`${id}-legend`}
        title={legendTitle}
        vmin={legend.vmin}
        vmax={legend.vmax}
        stops={legend.stops}
        x={0}
        y={TOP + gridHeight + LABEL_SPACE}
        width={width}
        height={LEGEND_HEIGHT}
      />
    </svg>
  );
}
