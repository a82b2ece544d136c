/**
 * Viewer page: one tile per broadcasting camera
 */

export interface IndexPageCamera {
  index: number;
  description: string;
  streamPath: string;
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

const STYLES = `
    body { font-family: sans-serif; background: #1e1e1e; color: #e0e0e0; margin: 0; padding: 20px; }
    h1 { text-align: center; }
    .camera-container { display: flex; flex-wrap: wrap; justify-content: center; gap: 20px; }
    .camera-box { background: #2b2b2b; border-radius: 8px; padding: 10px; flex: 1 1 480px; max-width: 960px; }
    .camera-title { margin: 0 0 8px; font-size: 1.1em; }
    .camera-stream { width: 100%; height: auto; display: block; border-radius: 4px; }
    .info { text-align: center; margin-top: 20px; font-size: 0.9em; color: #a0a0a0; }
    .info a { color: #4fc3f7; }
    .empty { text-align: center; color: #ff8a65; }`;

function renderTile(camera: IndexPageCamera): string {
  const title = escapeHtml(`Camera ${camera.index} - ${camera.description}`);
  const src = escapeHtml(camera.streamPath);
  return `      <div class="camera-box">
        <h2 class="camera-title">${title}</h2>
        <img src="${src}" class="camera-stream" alt="${title}">
      </div>`;
}

export function renderIndexPage(title: string, cameras: IndexPageCamera[]): string {
  const safeTitle = escapeHtml(title);
  const tiles = cameras.length > 0
    ? cameras.map(renderTile).join('\n')
    : '      <p class="empty">No cameras are streaming.</p>';
  const links = cameras
    .map((c) => `<a href="${escapeHtml(c.streamPath)}">Camera ${c.index}</a>`)
    .join(' | ');

  return `<!DOCTYPE html>
<html lang="en">
  <head>
    <meta charset="utf-8">
    <meta name="viewport" content="width=device-width, initial-scale=1">
    <title>${safeTitle}</title>
    <style>${STYLES}
    </style>
  </head>
  <body>
    <h1>${safeTitle}</h1>
    <div class="camera-container">
${tiles}
    </div>
    <p class="info">Refresh the page if streams don't load. Direct stream URLs: ${links}</p>
  </body>
</html>
`;
}
