import React, { useEffect, useMemo, useRef, useState } from 'react';
import { Circle, Group, Layer, Line as KonvaLine, Rect, Stage, Text } from 'react-konva';
import { useStore } from '../store';
import { CHART_COLORS } from '../config';
import { createMapper, niceTicks } from '../utils/chartLayout';
import { formatNumber } from '../utils/format';

const LEGEND_ITEMS = [
    { key: 'data', label: 'Data points', color: CHART_COLORS.data },
    { key: 'fit', label: 'Best fit line', color: CHART_COLORS.fit },
    { key: 'centroid', label: 'G Point', color: CHART_COLORS.centroid },
    { key: 'highlight', label: 'Random points', color: CHART_COLORS.highlight },
] as const;

export const ChartCanvas: React.FC = () => {
    const { chart, theme } = useStore();
    const containerRef = useRef<HTMLDivElement | null>(null);
    const [stageSize, setStageSize] = useState({ width: 0, height: 0 });
    const hasChart = chart !== null;

    useEffect(() => {
        if (!containerRef.current) return;

        const resizeObserver = new ResizeObserver((entries) => {
            for (const entry of entries) {
                setStageSize({
                    width: entry.contentRect.width,
                    height: entry.contentRect.height,
                });
            }
        });

        resizeObserver.observe(containerRef.current);
        return () => resizeObserver.disconnect();
    }, [hasChart]);

    const mapper = useMemo(
        () => (chart ? createMapper(chart.bounds, stageSize.width, stageSize.height) : null),
        [chart, stageSize.width, stageSize.height]
    );

    const ink = theme === 'dark' ? '#e2e8f0' : '#1e293b';
    const gridColor = theme === 'dark' ? '#334155' : '#e2e8f0';

    if (!chart || !mapper) {
        return (
            <div ref={containerRef} className="flex-1 min-h-0 flex items-center justify-center text-slate-400">
                Your chart will appear here
            </div>
        );
    }

    const { bounds } = chart;
    const { X, Y, left, top, width, height } = mapper;
    const xTicks = niceTicks(bounds.xMin, bounds.xMax);
    const yTicks = niceTicks(bounds.yMin, bounds.yMax);
    const pointRadius = chart.mode === 'points' ? 5 : 2.5;
    const legend = LEGEND_ITEMS.filter((item) => item.key !== 'fit' || chart.fitLine)
        .filter((item) => item.key !== 'highlight' || chart.highlighted.length > 0)
        .map((item) => (item.key === 'fit' && chart.fitLabel ? { ...item, label: `Fit: ${chart.fitLabel}` } : item));
    const legendWidth = Math.max(122, ...legend.map((item) => item.label.length * 6 + 30));

    return (
        <div ref={containerRef} className="flex-1 min-h-0">
            <Stage width={stageSize.width} height={stageSize.height}>
                <Layer>
                    <Text x={0} y={12} width={stageSize.width} align="center" text={chart.title} fontSize={15} fontStyle="bold" fill={ink} />
                    <Text x={0} y={34} width={stageSize.width} align="center" text={chart.subtitle} fontSize={12} fill={ink} />

                    <Rect x={left} y={top} width={width} height={height} stroke={gridColor} strokeWidth={1} />

                    {xTicks.map((t) => (
                        <Group key={`x-${t}`}>
                            <KonvaLine points={[X(t), top, X(t), top + height]} stroke={gridColor} strokeWidth={1} />
                            <Text x={X(t) - 30} y={top + height + 6} width={60} align="center" text={formatNumber(t, 4)} fontSize={11} fill={ink} />
                        </Group>
                    ))}
                    {yTicks.map((t) => (
                        <Group key={`y-${t}`}>
                            <KonvaLine points={[left, Y(t), left + width, Y(t)]} stroke={gridColor} strokeWidth={1} />
                            <Text x={left - 64} y={Y(t) - 6} width={58} align="right" text={formatNumber(t, 4)} fontSize={11} fill={ink} />
                        </Group>
                    ))}

                    <Text x={left} y={top + height + 24} width={width} align="center" text="x" fontSize={13} fill={ink} />
                    <Text x={8} y={top + height / 2} text="y" fontSize={13} fill={ink} />

                    <Group clipX={left} clipY={top} clipWidth={width} clipHeight={height}>
                        {chart.points.map((p, i) => (
                            <Circle key={`p-${i}`} x={X(p.x)} y={Y(p.y)} radius={pointRadius} fill={CHART_COLORS.data} />
                        ))}

                        {chart.fitLine && (
                            <KonvaLine
                                points={chart.fitLine.flatMap((p) => [X(p.x), Y(p.y)])}
                                stroke={CHART_COLORS.fit}
                                strokeWidth={2}
                            />
                        )}

                        {chart.highlighted.map(({ point, label }, i) => (
                            <Group key={`h-${i}`}>
                                <Circle x={X(point.x)} y={Y(point.y)} radius={6} fill={CHART_COLORS.highlight} />
                                <Text x={X(point.x) + 8} y={Y(point.y) - 16} text={label} fontSize={10} fill={ink} />
                            </Group>
                        ))}

                        <KonvaLine
                            points={[X(chart.centroid.x) - 7, Y(chart.centroid.y) - 7, X(chart.centroid.x) + 7, Y(chart.centroid.y) + 7]}
                            stroke={CHART_COLORS.centroid}
                            strokeWidth={3}
                        />
                        <KonvaLine
                            points={[X(chart.centroid.x) - 7, Y(chart.centroid.y) + 7, X(chart.centroid.x) + 7, Y(chart.centroid.y) - 7]}
                            stroke={CHART_COLORS.centroid}
                            strokeWidth={3}
                        />
                    </Group>

                    <Group x={left + width - legendWidth - 8} y={top + 8}>
                        <Rect width={legendWidth} height={legend.length * 18 + 8} fill={theme === 'dark' ? '#0f172a' : '#ffffff'} opacity={0.85} cornerRadius={4} />
                        {legend.map((item, i) => (
                            <Group key={item.key} y={12 + i * 18}>
                                <Circle x={12} y={0} radius={4} fill={item.color} />
                                <Text x={22} y={-6} text={item.label} fontSize={11} fill={ink} />
                            </Group>
                        ))}
                    </Group>
                </Layer>
            </Stage>
        </div>
    );
};
