/**
 * What the pairing page needs to know; the markup itself belongs to the UI
 */
export type PageView =
  | { role: 'desktop'; mobileUrl: string; mobileQrDataUrl: string; tokenExpiresAt: number }
  | { role: 'mobile'; sessionId: string }
  | { role: 'denied'; reason: string };

export interface PageRenderer {
  render(view: PageView): string;
}

// Turns the pairing URL into an image data URL for the desktop page
export type QrEncoder = (url: string) => Promise<string>;

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

/**
 * Bare page that hands the view to the client script as JSON
 */
export class PlainPageRenderer implements PageRenderer {
  render(view: PageView): string {
    const state = escapeHtml(JSON.stringify(view));
    const title = view.role === 'denied' ? 'Access denied' : 'LAN Drop';
    const body = view.role === 'denied' ? `<p>${escapeHtml(view.reason)}</p>` : '<main id="app"></main>';
    return `<!DOCTYPE html>
<html>
<head><meta charset="utf-8"><meta name="viewport" content="width=device-width,initial-scale=1"><title>${title}</title></head>
<body data-state="${state}">
${body}
</body>
</html>`;
  }
}
