/**
 * Diagnostic chart renderer.
 *
 * Reads the page template and inlines the series into a single
 * self-contained HTML file: a per-minute timeseries and the sorted
 * distribution of the same values.
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { type SeriesSummary, summarize } from "../metrics/stats.ts";

const TEMPLATE_URL = new URL("./templates/chart.html", import.meta.url);

export interface ChartInput {
  name: string;
  values: readonly number[];
  seed?: number;
}

export interface PreparedChart {
  name: string;
  seed: number | null;
  minutes: number;
  values: readonly number[];
  sorted: number[];
  /** x positions for `sorted`, evenly spaced over 0..100. */
  percentiles: number[];
  summary: SeriesSummary;
}

export function prepareChartData(input: ChartInput): PreparedChart {
  const sorted = [...input.values].sort((a, b) => a - b);
  const n = sorted.length;
  return {
    name: input.name,
    seed: input.seed ?? null,
    minutes: n,
    values: input.values,
    sorted,
    percentiles: sorted.map((_, i) => (n === 1 ? 0 : (i / (n - 1)) * 100)),
    summary: summarize(input.values),
  };
}

export function escapeHtml(s: string): string {
  return s
    .replaceAll("&", "&amp;")
    .replaceAll("<", "&lt;")
    .replaceAll(">", "&gt;")
    .replaceAll('"', "&quot;");
}

/** JSON safe to embed inside a <script> element. */
function scriptJson(value: unknown): string {
  return JSON.stringify(value).replaceAll("<", "\\u003c");
}

export async function renderChartHtml(input: ChartInput): Promise<string> {
  const template = await readFile(TEMPLATE_URL, "utf8");
  const data = `const D = ${scriptJson(prepareChartData(input))};`;
  const title = escapeHtml(input.name);
  return template
    .replaceAll("{{TITLE}}", () => title)
    .replace("{{DATA}}", () => data);
}

export function chartPath(outputDir: string, name: string): string {
  return join(outputDir, `workload_${name}.html`);
}

/** Writes `workload_{name}.html` and returns the paths written. */
export async function savePlots(
  values: readonly number[],
  outputDir: string,
  name: string,
  seed?: number,
): Promise<string[]> {
  await mkdir(outputDir, { recursive: true });
  const path = chartPath(outputDir, name);
  await writeFile(path, await renderChartHtml({ name, values, seed }));
  return [path];
}
