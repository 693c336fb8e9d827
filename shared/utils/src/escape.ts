const HTML_ENTITIES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

const XML_ENTITIES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&apos;",
};

/**
 * Escape special HTML characters
 */
export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (m) => HTML_ENTITIES[m] ?? m);
}

/**
 * Escape special XML characters
 */
export function escapeXml(text: string): string {
  return text.replace(/[&<>"']/g, (m) => XML_ENTITIES[m] ?? m);
}
