import { InputValidationError } from '@era5-weather/core';
import type { TimeSeriesFrame } from '@era5-weather/core';
import { Liquid } from 'liquidjs';

import { writeFile } from '../fs';
import { buildReportFigures } from './figures';
import type { PlotlyFigure } from './figures';

export const PLOTLY_CDN_URL = 'https://cdn.plot.ly/plotly-2.35.2.min.js';

const liquid = new Liquid({ cache: false, strictFilters: false, strictVariables: false });

const PAGE_TEMPLATE = `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1.0" />
  <title>{{ title | escape }}</title>
  <script src="{{ plotlyUrl }}"></script>
</head>
<body>
  <h1>{{ title | escape }}</h1>
{%- for figure in figures %}
  <div id="{{ figure.id }}" class="figure"></div>
  <script>Plotly.newPlot("{{ figure.id }}", {{ figure.data }}, {{ figure.layout }}, {"responsive": true});</script>
{%- endfor %}
</body>
</html>
`;

// Inline JSON must not be able to close the surrounding <script> element.
function scriptJson(value: unknown): string {
  return JSON.stringify(value).replace(/</g, '\\u003c');
}

export async function renderStaticPage(figures: PlotlyFigure[], title: string): Promise<string> {
  if (figures.length === 0) {
    throw new InputValidationError('No figures provided for rendering.');
  }
  const html = await liquid.parseAndRender(PAGE_TEMPLATE, {
    title,
    plotlyUrl: PLOTLY_CDN_URL,
    figures: figures.map((figure, index) => ({
      id: `figure-${index + 1}`,
      data: scriptJson(figure.data),
      layout: scriptJson(figure.layout)
    }))
  });
  return String(html);
}

export async function writeStaticPage(figures: PlotlyFigure[], outputHtml: string, title: string): Promise<void> {
  await writeFile(outputHtml, await renderStaticPage(figures, title));
}

/** Builds every report figure for one location and writes the page. */
export async function renderReport(frame: TimeSeriesFrame, name: string, outputHtml: string): Promise<void> {
  await writeStaticPage(buildReportFigures(frame, name), outputHtml, `ERA5 data for ${name}`);
}
