import { escapeHtml, type VisualizerPageOptions } from './html';

export const REDOC_BUNDLE_URL = 'https://cdn.redoc.ly/redoc/latest/bundles/redoc.standalone.js';

export function renderRedocPage({ title, specUrl }: VisualizerPageOptions): string {
  return `
<!DOCTYPE html>
<html>
  <head>
    <title>${escapeHtml(title)}</title>
    <meta charset="utf-8"/>
    <meta name="viewport" content="width=device-width, initial-scale=1">
    <style>
      body {
        margin: 0;
        padding: 0;
      }
    </style>
  </head>
  <body>
    <redoc spec-url="${escapeHtml(specUrl)}" expand-responses="200,201"></redoc>
    <script src="${REDOC_BUNDLE_URL}"></script>
  </body>
</html>
  `.trim();
}
