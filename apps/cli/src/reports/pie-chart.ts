import { mkdirSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { arc, pie, scaleOrdinal, schemeTableau10, type PieArcDatum } from "d3";
import { logError, logInfo } from "../observability/logger.js";

const WIDTH = 640;
const HEIGHT = 480;
const TITLE = "Category Spending Breakdown";

type Slice = [category: string, total: number];

export type ChartOutcome =
  | { written: true; path: string; message: string }
  | { written: false; message: string };

function escapeXml(text: string) {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

export function buildPieChartSvg(spending: ReadonlyMap<string, number>) {
  const slices: Slice[] = [...spending.entries()];
  const total = slices.reduce((sum, [, value]) => sum + value, 0);
  const radius = Math.min(WIDTH, HEIGHT - 60) / 2 - 20;

  const layout = pie<Slice>()
    .value(([, value]) => value)
    .sort(null);
  const sliceArc = arc<PieArcDatum<Slice>>().innerRadius(0).outerRadius(radius);
  const labelArc = arc<PieArcDatum<Slice>>()
    .innerRadius(radius * 0.65)
    .outerRadius(radius * 0.65);
  const color = scaleOrdinal<string, string>()
    .domain(slices.map(([category]) => category))
    .range(schemeTableau10);

  const parts = layout(slices).map((datum) => {
    const [category, value] = datum.data;
    const share = total > 0 ? (value / total) * 100 : 0;
    const [x, y] = labelArc.centroid(datum);
    const label = escapeXml(`${category} (${share.toFixed(1)}%)`);
    return [
      `<path d="${sliceArc(datum) ?? ""}" fill="${color(category)}" stroke="#ffffff" stroke-width="1"/>`,
      `<text x="${x.toFixed(2)}" y="${y.toFixed(2)}" text-anchor="middle" font-size="13">${label}</text>`
    ].join("\n    ");
  });

  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${WIDTH}" height="${HEIGHT}" viewBox="0 0 ${WIDTH} ${HEIGHT}">`,
    `  <title>${TITLE}</title>`,
    `  <text x="${WIDTH / 2}" y="32" text-anchor="middle" font-size="18">${TITLE}</text>`,
    `  <g transform="translate(${WIDTH / 2},${HEIGHT / 2 + 20})">`,
    ...parts.map((part) => `    ${part}`),
    "  </g>",
    "</svg>",
    ""
  ].join("\n");
}

/** Writes the spending pie to `path`; does nothing when there are no expenses. */
export function renderCategoryPieChart(
  spending: ReadonlyMap<string, number>,
  path: string
): ChartOutcome {
  if (spending.size === 0) {
    return { written: false, message: "No expenses available for visualization" };
  }

  try {
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, buildPieChartSvg(spending), "utf8");
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logError("chart.save.failed", { path, message });
    return { written: false, message: `Error saving pie chart: ${message}` };
  }
  logInfo("chart.saved", { path, categories: spending.size });
  return { written: true, path, message: `Pie chart saved to ${path}` };
}
