/**
 * Open external links in a new tab
 *
 * Literal substring replacement: only anchors written exactly as
 * `<a href="http...` are changed (which covers https). Anchors with other
 * attributes before href, or an existing target, are not recognised.
 */
export function addTargetBlank(html: string): string {
  return html.replaceAll('<a href="http', '<a target="_blank" href="http');
}
