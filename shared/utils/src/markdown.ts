import { marked } from "marked";

const MARKDOWN_EXTENSIONS = [".md", ".markdown", ".mkd", ".mkdn"];

/**
 * Whether a file extension denotes Markdown
 */
export function isMarkdownExtension(extension: string): boolean {
  return MARKDOWN_EXTENSIONS.includes(extension.toLowerCase());
}

/**
 * Convert markdown to HTML
 * GitHub Flavored Markdown, single line breaks stay soft
 */
export function markdownToHtml(markdown: string): string {
  return marked.parse(markdown, {
    async: false,
    gfm: true,
    breaks: false,
  });
}

/**
 * First block of a document, split on the first blank line
 */
export function extractExcerpt(content: string, separator = "\n\n"): string {
  const normalized = content.replace(/\r\n/g, "\n").trim();
  const index = normalized.indexOf(separator);
  return index === -1 ? normalized : normalized.slice(0, index).trim();
}

/**
 * Remove HTML tags and collapse whitespace
 */
export function stripHtml(html: string): string {
  return html
    .replace(/<script[\s\S]*?<\/script>/gi, "")
    .replace(/<style[\s\S]*?<\/style>/gi, "")
    .replace(/<!--[\s\S]*?-->/g, "")
    .replace(/<[^>]*>/g, "")
    .replace(/\s+/g, " ")
    .trim();
}
