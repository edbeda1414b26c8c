import React, { useRef, useEffect, useState } from 'react';
import * as d3 from 'd3';
import type { ChartDataPoint } from '../lib/chart-data';
import type { OperatingPoint, PeakPower } from '../types';

export interface PolarizationChartProps {
  data: ChartDataPoint[];
  nernstVoltage?: number;
  operatingPoint?: OperatingPoint | null;
  peakPower?: PeakPower | null;
  title?: string;
  showVoltage?: boolean;
  showPower?: boolean;
  showLosses?: boolean;
  showMarkers?: boolean;
  width?: number;
  height?: number;
  className?: string;
}

const VOLTAGE_COLOR = '#1f77b4';
const POWER_COLOR = '#ff7f0e';

const lossStyles: Array<{ key: 'activationLoss' | 'ohmicLoss' | 'concentrationLoss'; label: string; color: string }> = [
  { key: 'activationLoss', label: 'Activation Loss', color: '#10b981' },
  { key: 'ohmicLoss', label: 'Ohmic Loss', color: '#8b5cf6' },
  { key: 'concentrationLoss', label: 'Mass Transport Loss', color: '#ef4444' }
];

// Polarization curves are drawn on 0–1.2 V unless the data needs more room
export const getVoltageDomain = (values: number[], nernstVoltage?: number): [number, number] => {
  const finiteValues = values.filter(value => Number.isFinite(value));
  const maxValue = Math.max(1.2, nernstVoltage ?? 0, d3.max(finiteValues) ?? 0);
  const minValue = Math.min(0, d3.min(finiteValues) ?? 0);
  return [minValue, maxValue === 1.2 ? 1.2 : maxValue * 1.05];
};

export const getPowerDomain = (values: number[]): [number, number] => {
  const finiteValues = values.filter(value => Number.isFinite(value));
  if (finiteValues.length === 0) return [0, 1];

  const minValue = Math.min(0, d3.min(finiteValues) ?? 0);
  const maxValue = d3.max(finiteValues) ?? 0;
  if (maxValue <= minValue) return [minValue, minValue + 1];

  return [minValue, maxValue * 1.1];
};

export const PolarizationChart: React.FC<PolarizationChartProps> = ({
  data,
  nernstVoltage,
  operatingPoint = null,
  peakPower = null,
  title = "Fuel Cell Performance",
  showVoltage = true,
  showPower = true,
  showLosses = false,
  showMarkers = true,
  width,
  height,
  className = ""
}) => {
  const svgRef = useRef<SVGSVGElement>(null);
  const containerRef = useRef<HTMLDivElement>(null);
  const [dimensions, setDimensions] = useState({ width: 800, height: 480 });

  // Auto-calculate dimensions based on container
  useEffect(() => {
    const updateDimensions = () => {
      if (containerRef.current) {
        const containerWidth = containerRef.current.clientWidth;
        const aspectRatio = 10 / 6; // matches a 10×6 in figure
        const calculatedHeight = Math.max(300, Math.min(600, containerWidth / aspectRatio));

        setDimensions({
          width: containerWidth || 800,
          height: height || calculatedHeight
        });
      }
    };

    updateDimensions();

    const resizeObserver = new ResizeObserver(updateDimensions);
    if (containerRef.current) {
      resizeObserver.observe(containerRef.current);
    }

    return () => resizeObserver.disconnect();
  }, [height]);

  const chartWidth = width || dimensions.width;
  const chartHeight = height || dimensions.height;

  useEffect(() => {
    if (!svgRef.current) return;

    // Clear previous content
    d3.select(svgRef.current).selectAll("*").remove();

    if (data.length === 0) return;

    const margin = { top: 20, right: 80, bottom: 50, left: 70 };
    const innerWidth = chartWidth - margin.left - margin.right;
    const innerHeight = chartHeight - margin.top - margin.bottom;

    const svg = d3.select(svgRef.current)
      .attr("width", chartWidth)
      .attr("height", chartHeight);

    const g = svg.append("g")
      .attr("transform", `translate(${margin.left},${margin.top})`);

    // Scales
    const currents = data.map(d => d.currentDensity);
    const xScale = d3.scaleLinear()
      .domain([0, d3.max(currents) ?? 1])
      .range([0, innerWidth]);

    const voltageValues = data.map(d => d.cellVoltage);
    if (showLosses) {
      voltageValues.push(...data.flatMap(d => [d.activationLoss, d.ohmicLoss, d.concentrationLoss]));
    }
    const yVoltage = d3.scaleLinear()
      .domain(getVoltageDomain(voltageValues, nernstVoltage))
      .range([innerHeight, 0]);

    const yPower = d3.scaleLinear()
      .domain(getPowerDomain(data.map(d => d.powerDensity)))
      .range([innerHeight, 0]);

    // X axis
    g.append("g")
      .attr("transform", `translate(0,${innerHeight})`)
      .call(d3.axisBottom(xScale))
      .append("text")
      .attr("x", innerWidth / 2)
      .attr("y", 40)
      .attr("fill", "black")
      .style("text-anchor", "middle")
      .text("Current Density (A/cm²)");

    // Left axis: voltage
    g.append("g")
      .call(d3.axisLeft(yVoltage))
      .append("text")
      .attr("transform", "rotate(-90)")
      .attr("y", -50)
      .attr("x", -innerHeight / 2)
      .attr("fill", VOLTAGE_COLOR)
      .style("text-anchor", "middle")
      .text("Cell Voltage (V)");

    // Right axis: power density
    if (showPower) {
      g.append("g")
        .attr("transform", `translate(${innerWidth},0)`)
        .call(d3.axisRight(yPower))
        .append("text")
        .attr("transform", "rotate(90)")
        .attr("y", -50)
        .attr("x", innerHeight / 2)
        .attr("fill", POWER_COLOR)
        .style("text-anchor", "middle")
        .text("Power Density (W/cm²)");
    }

    // Grid lines
    g.append("g")
      .attr("class", "grid")
      .attr("transform", `translate(0,${innerHeight})`)
      .call(d3.axisBottom(xScale)
        .tickSize(-innerHeight)
        .tickFormat(() => "")
      )
      .style("stroke-dasharray", "3,3")
      .style("opacity", 0.3);

    g.append("g")
      .attr("class", "grid")
      .call(d3.axisLeft(yVoltage)
        .tickSize(-innerWidth)
        .tickFormat(() => "")
      )
      .style("stroke-dasharray", "3,3")
      .style("opacity", 0.3);

    // Open-circuit reference
    if (nernstVoltage !== undefined && Number.isFinite(nernstVoltage)) {
      g.append("line")
        .attr("x1", 0)
        .attr("x2", innerWidth)
        .attr("y1", yVoltage(nernstVoltage))
        .attr("y2", yVoltage(nernstVoltage))
        .attr("stroke", "#9ca3af")
        .attr("stroke-dasharray", "6,4")
        .attr("stroke-width", 1);
    }

    const legendItems: Array<{ color: string; text: string }> = [];

    if (showLosses) {
      lossStyles.forEach(loss => {
        const lossLine = d3.line<ChartDataPoint>()
          .x(d => xScale(d.currentDensity))
          .y(d => yVoltage(d[loss.key]))
          .curve(d3.curveMonotoneX);

        g.append("path")
          .datum(data)
          .attr("fill", "none")
          .attr("stroke", loss.color)
          .attr("stroke-width", 1.5)
          .attr("opacity", 0.8)
          .attr("d", lossLine);

        legendItems.push({ color: loss.color, text: loss.label });
      });
    }

    if (showVoltage) {
      const voltageLine = d3.line<ChartDataPoint>()
        .x(d => xScale(d.currentDensity))
        .y(d => yVoltage(d.cellVoltage))
        .curve(d3.curveMonotoneX);

      g.append("path")
        .datum(data)
        .attr("fill", "none")
        .attr("stroke", VOLTAGE_COLOR)
        .attr("stroke-width", 3)
        .attr("d", voltageLine);

      legendItems.unshift({ color: VOLTAGE_COLOR, text: "Polarization Curve" });
    }

    if (showPower) {
      const powerLine = d3.line<ChartDataPoint>()
        .x(d => xScale(d.currentDensity))
        .y(d => yPower(d.powerDensity))
        .curve(d3.curveMonotoneX);

      g.append("path")
        .datum(data)
        .attr("fill", "none")
        .attr("stroke", POWER_COLOR)
        .attr("stroke-width", 2)
        .attr("stroke-dasharray", "6,4")
        .attr("d", powerLine);

      legendItems.splice(showVoltage ? 1 : 0, 0, { color: POWER_COLOR, text: "Power Density" });
    }

    // Markers
    if (showMarkers) {
      const markerLayer = g.append("g").attr("class", "markers-layer");

      if (operatingPoint && showVoltage) {
        const x = xScale(operatingPoint.currentDensity);
        const y = yVoltage(operatingPoint.cellVoltage);

        markerLayer.append("line")
          .attr("x1", x)
          .attr("x2", x)
          .attr("y1", innerHeight)
          .attr("y2", y)
          .attr("stroke", VOLTAGE_COLOR)
          .attr("stroke-dasharray", "4,4")
          .attr("stroke-width", 1.5);

        markerLayer.append("circle")
          .attr("cx", x)
          .attr("cy", y)
          .attr("r", 5)
          .attr("fill", VOLTAGE_COLOR)
          .attr("stroke", "white")
          .attr("stroke-width", 2);
      }

      if (peakPower && showPower) {
        markerLayer.append("circle")
          .attr("cx", xScale(peakPower.currentDensity))
          .attr("cy", yPower(peakPower.powerDensity))
          .attr("r", 5)
          .attr("fill", POWER_COLOR)
          .attr("stroke", "white")
          .attr("stroke-width", 2);
      }
    }

    // Legend
    const legend = svg.append("g")
      .attr("class", "legend")
      .attr("transform", `translate(${margin.left + 15}, ${margin.top + 10})`);

    legendItems.forEach((item, index) => {
      const legendRow = legend.append("g")
        .attr("transform", `translate(0, ${index * 20})`);

      legendRow.append("rect")
        .attr("width", 15)
        .attr("height", 15)
        .attr("fill", item.color);

      legendRow.append("text")
        .attr("x", 20)
        .attr("y", 12)
        .attr("font-size", "12px")
        .text(item.text);
    });

    // Tooltip
    const tooltip = d3.select("body").append("div")
      .attr("class", "tooltip")
      .style("position", "absolute")
      .style("visibility", "hidden")
      .style("background", "white")
      .style("border", "1px solid #ddd")
      .style("padding", "8px")
      .style("border-radius", "4px")
      .style("font-size", "12px");

    const hoverDot = g.append("circle")
      .attr("r", 4)
      .attr("fill", VOLTAGE_COLOR)
      .style("visibility", "hidden");

    const bisect = d3.bisector<ChartDataPoint, number>(d => d.currentDensity).center;

    g.append("rect")
      .attr("width", innerWidth)
      .attr("height", innerHeight)
      .attr("fill", "transparent")
      .on("mousemove", (event: MouseEvent) => {
        const [mx] = d3.pointer(event);
        const point = data[bisect(data, xScale.invert(mx))];
        if (!point) return;

        hoverDot
          .attr("cx", xScale(point.currentDensity))
          .attr("cy", yVoltage(point.cellVoltage))
          .style("visibility", "visible");

        tooltip.style("visibility", "visible")
          .html(`
            <strong>Current Density:</strong> ${point.currentDensity.toFixed(3)} A/cm²<br/>
            <strong>Cell Voltage:</strong> ${point.cellVoltage.toFixed(4)} V<br/>
            <strong>Power Density:</strong> ${point.powerDensity.toFixed(4)} W/cm²<br/>
            <strong>Activation:</strong> ${point.activationLoss.toFixed(4)} V<br/>
            <strong>Ohmic:</strong> ${point.ohmicLoss.toFixed(4)} V<br/>
            <strong>Mass Transport:</strong> ${point.concentrationLoss.toFixed(4)} V
          `)
          .style("left", (event.pageX + 10) + "px")
          .style("top", (event.pageY - 28) + "px");
      })
      .on("mouseout", () => {
        hoverDot.style("visibility", "hidden");
        tooltip.style("visibility", "hidden");
      });

    return () => {
      tooltip.remove();
    };
  }, [
    data,
    nernstVoltage,
    operatingPoint,
    peakPower,
    showVoltage,
    showPower,
    showLosses,
    showMarkers,
    chartWidth,
    chartHeight
  ]);

  return (
    <div ref={containerRef} className={`w-full ${className}`}>
      <div className="mb-4">
        <h3 className="text-lg font-semibold text-gray-900">{title}</h3>
      </div>
      <svg ref={svgRef}></svg>
    </div>
  );
};
