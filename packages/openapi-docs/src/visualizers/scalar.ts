import { escapeHtml, type VisualizerPageOptions } from './html';

export const SCALAR_BUNDLE_URL = 'https://cdn.jsdelivr.net/npm/@scalar/api-reference';

export function renderScalarPage({ title, specUrl }: VisualizerPageOptions): string {
  return `
<!DOCTYPE html>
<html>
  <head>
    <title>${escapeHtml(title)}</title>
    <meta charset="utf-8"/>
    <meta name="viewport" content="width=device-width, initial-scale=1">
  </head>
  <body>
    <script id="api-reference" data-url="${escapeHtml(specUrl)}"></script>
    <script src="${SCALAR_BUNDLE_URL}"></script>
  </body>
</html>
  `.trim();
}
